/**
 * Gate execution query functions: persistence of execution records,
 * history paging and per-gate-type statistics.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface GateExecutionRow {
  id: string
  run_id: string
  gate_id: string
  gate_type: string
  workspace_id: string
  project_id: string
  task_id: string | null
  task_run_id: string | null
  sandbox_execution_id: string | null
  status: string
  created_at: string
  started_at: string | null
  completed_at: string | null
  duration_ms: number | null
  passed: number | null
  passed_with_warnings: number
  critical_issues: number
  high_issues: number
  medium_issues: number
  low_issues: number
  /** JSON array */
  issues: string
  /** JSON object */
  metrics: string
  /** JSON array */
  recommendations: string
  /** JSON object */
  result_details: string
  /** JSON object */
  config_used: string
  error_message: string | null
  counted_at: string | null
}

export type UpsertGateExecutionInput = Omit<GateExecutionRow, 'counted_at'>

/** Statuses after which a row is never rewritten */
const TERMINAL_STATUS_SQL = `('passed', 'failed', 'warning', 'skipped', 'error', 'timeout')`

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Insert an execution, or update it while it is still pending or running.
 * Identity columns and config_used are written on insert only.
 *
 * @returns whether the row was written
 */
export function upsertGateExecution(
  db: BetterSqlite3Database,
  input: UpsertGateExecutionInput
): boolean {
  const result = db
    .prepare<UpsertGateExecutionInput>(`
      INSERT INTO gate_executions (
        id, run_id, gate_id, gate_type, workspace_id, project_id,
        task_id, task_run_id, sandbox_execution_id,
        status, created_at, started_at, completed_at, duration_ms,
        passed, passed_with_warnings,
        critical_issues, high_issues, medium_issues, low_issues,
        issues, metrics, recommendations, result_details, config_used, error_message
      ) VALUES (
        @id, @run_id, @gate_id, @gate_type, @workspace_id, @project_id,
        @task_id, @task_run_id, @sandbox_execution_id,
        @status, @created_at, @started_at, @completed_at, @duration_ms,
        @passed, @passed_with_warnings,
        @critical_issues, @high_issues, @medium_issues, @low_issues,
        @issues, @metrics, @recommendations, @result_details, @config_used, @error_message
      )
      ON CONFLICT(id) DO UPDATE SET
        status               = excluded.status,
        started_at           = excluded.started_at,
        completed_at         = excluded.completed_at,
        duration_ms          = excluded.duration_ms,
        passed               = excluded.passed,
        passed_with_warnings = excluded.passed_with_warnings,
        critical_issues      = excluded.critical_issues,
        high_issues          = excluded.high_issues,
        medium_issues        = excluded.medium_issues,
        low_issues           = excluded.low_issues,
        issues               = excluded.issues,
        metrics              = excluded.metrics,
        recommendations      = excluded.recommendations,
        result_details       = excluded.result_details,
        error_message        = excluded.error_message
      WHERE gate_executions.status NOT IN ${TERMINAL_STATUS_SQL}
    `)
    .run(input)
  return result.changes === 1
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export function getGateExecution(
  db: BetterSqlite3Database,
  id: string
): GateExecutionRow | undefined {
  return db
    .prepare<[string], GateExecutionRow>('SELECT * FROM gate_executions WHERE id = ?')
    .get(id)
}

export function listRunExecutions(db: BetterSqlite3Database, runId: string): GateExecutionRow[] {
  return db
    .prepare<[string], GateExecutionRow>(
      'SELECT * FROM gate_executions WHERE run_id = ? ORDER BY created_at, rowid'
    )
    .all(runId)
}

export interface ExecutionHistoryFilter {
  workspace_id: string
  project_id: string
  gate_type?: string
  limit: number
  offset: number
}

export interface ExecutionHistoryPage {
  total_count: number
  rows: GateExecutionRow[]
}

/** Newest first */
export function listExecutionHistory(
  db: BetterSqlite3Database,
  filter: ExecutionHistoryFilter
): ExecutionHistoryPage {
  const params = {
    workspace_id: filter.workspace_id,
    project_id: filter.project_id,
    gate_type: filter.gate_type ?? null,
    limit: filter.limit,
    offset: filter.offset,
  }
  const where = `
    WHERE workspace_id = @workspace_id AND project_id = @project_id
      AND (@gate_type IS NULL OR gate_type = @gate_type)`

  const total = db
    .prepare<Omit<typeof params, 'limit' | 'offset'>, { n: number }>(
      `SELECT COUNT(*) AS n FROM gate_executions ${where}`
    )
    .get({
      workspace_id: params.workspace_id,
      project_id: params.project_id,
      gate_type: params.gate_type,
    })

  const rows = db
    .prepare<typeof params, GateExecutionRow>(
      `SELECT * FROM gate_executions ${where}
       ORDER BY created_at DESC, rowid DESC
       LIMIT @limit OFFSET @offset`
    )
    .all(params)

  return { total_count: total?.n ?? 0, rows }
}

export interface GateTypeStatisticsRow {
  gate_type: string
  total: number
  passed: number
  warnings: number
  failed: number
  errors: number
  timeouts: number
  skipped: number
  avg_duration_ms: number | null
  total_issues: number
}

/**
 * Per-gate-type outcome counts for executions created at or after `since`.
 * `failed` counts failed, error and timeout together; `errors` and
 * `timeouts` break that number down.
 */
export function getGateTypeStatistics(
  db: BetterSqlite3Database,
  params: { workspace_id: string; project_id: string; since: string }
): GateTypeStatisticsRow[] {
  return db
    .prepare<typeof params, GateTypeStatisticsRow>(`
      SELECT
        gate_type,
        COUNT(*)                                                   AS total,
        SUM(CASE WHEN status = 'passed'  THEN 1 ELSE 0 END)        AS passed,
        SUM(CASE WHEN status = 'warning' THEN 1 ELSE 0 END)        AS warnings,
        SUM(CASE WHEN status IN ('failed', 'error', 'timeout') THEN 1 ELSE 0 END) AS failed,
        SUM(CASE WHEN status = 'error'   THEN 1 ELSE 0 END)        AS errors,
        SUM(CASE WHEN status = 'timeout' THEN 1 ELSE 0 END)        AS timeouts,
        SUM(CASE WHEN status = 'skipped' THEN 1 ELSE 0 END)        AS skipped,
        AVG(duration_ms)                                           AS avg_duration_ms,
        SUM(critical_issues + high_issues + medium_issues + low_issues) AS total_issues
      FROM gate_executions
      WHERE workspace_id = @workspace_id
        AND project_id = @project_id
        AND created_at >= @since
        AND status NOT IN ('pending', 'running')
      GROUP BY gate_type
      ORDER BY gate_type
    `)
    .all(params)
}
