/**
 * Quality gate query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements: no string interpolation, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface QualityGateRow {
  id: string
  workspace_id: string
  project_id: string
  gate_type: string
  name: string
  description: string | null
  is_enabled: number
  is_blocking: number
  /** JSON object */
  threshold_config: string
  timeout_ms: number | null
  total_evaluations: number
  passed_evaluations: number
  failed_evaluations: number
  last_evaluation_at: string | null
  last_result: number | null
  created_at: string
  updated_at: string
}

export interface InsertQualityGateInput {
  id: string
  workspace_id: string
  project_id: string
  gate_type: string
  name: string
  description: string | null
  is_enabled: number
  is_blocking: number
  threshold_config: string
  timeout_ms: number | null
}

/** Columns an explicit config update may change */
export interface QualityGateUpdate {
  name?: string
  description?: string | null
  is_enabled?: number
  is_blocking?: number
  threshold_config?: string
  timeout_ms?: number | null
}

const UPDATABLE_COLUMNS: readonly (keyof QualityGateUpdate)[] = [
  'name',
  'description',
  'is_enabled',
  'is_blocking',
  'threshold_config',
  'timeout_ms',
]

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertQualityGate(db: BetterSqlite3Database, input: InsertQualityGateInput): void {
  db.prepare<InsertQualityGateInput>(`
    INSERT INTO quality_gates (
      id, workspace_id, project_id, gate_type, name, description,
      is_enabled, is_blocking, threshold_config, timeout_ms
    ) VALUES (
      @id, @workspace_id, @project_id, @gate_type, @name, @description,
      @is_enabled, @is_blocking, @threshold_config, @timeout_ms
    )
  `).run(input)
}

export function getQualityGate(db: BetterSqlite3Database, id: string): QualityGateRow | undefined {
  return db.prepare<[string], QualityGateRow>('SELECT * FROM quality_gates WHERE id = ?').get(id)
}

export function getQualityGateByType(
  db: BetterSqlite3Database,
  workspaceId: string,
  projectId: string,
  gateType: string
): QualityGateRow | undefined {
  return db
    .prepare<[string, string, string], QualityGateRow>(
      'SELECT * FROM quality_gates WHERE workspace_id = ? AND project_id = ? AND gate_type = ?'
    )
    .get(workspaceId, projectId, gateType)
}

export function listQualityGates(
  db: BetterSqlite3Database,
  workspaceId: string,
  projectId: string,
  options: { enabledOnly?: boolean } = {}
): QualityGateRow[] {
  const sql =
    options.enabledOnly === true
      ? `SELECT * FROM quality_gates
         WHERE workspace_id = ? AND project_id = ? AND is_enabled = 1
         ORDER BY created_at, gate_type`
      : `SELECT * FROM quality_gates
         WHERE workspace_id = ? AND project_id = ?
         ORDER BY created_at, gate_type`
  return db.prepare<[string, string], QualityGateRow>(sql).all(workspaceId, projectId)
}

/** Distinct gate types of every enabled gate, across all workspaces */
export function listActiveGateTypes(db: BetterSqlite3Database): string[] {
  return db
    .prepare<[], { gate_type: string }>(
      'SELECT DISTINCT gate_type FROM quality_gates WHERE is_enabled = 1 ORDER BY gate_type'
    )
    .all()
    .map((row) => row.gate_type)
}

/**
 * Apply an explicit config update. Counters are never touched here.
 * @returns whether a row was updated
 */
export function updateQualityGate(
  db: BetterSqlite3Database,
  id: string,
  update: QualityGateUpdate,
  updatedAt: string
): boolean {
  const columns = UPDATABLE_COLUMNS.filter((c) => update[c] !== undefined)
  if (columns.length === 0) {
    return getQualityGate(db, id) !== undefined
  }
  // Column names come from the fixed list above, values are bound
  const assignments = columns.map((c) => `${c} = @${c}`).join(', ')
  const params: Record<string, string | number | null> = { id, updated_at: updatedAt }
  for (const column of columns) {
    const value = update[column]
    if (value !== undefined) params[column] = value
  }
  const result = db
    .prepare<Record<string, string | number | null>>(
      `UPDATE quality_gates SET ${assignments}, updated_at = @updated_at WHERE id = @id`
    )
    .run(params)
  return result.changes === 1
}

/**
 * Count one evaluation for a gate, once per execution.
 *
 * Marks the execution as counted and, only if that flipped it, bumps the
 * gate's counters in place. Both statements run in one transaction; there is
 * no read of the current counter values.
 *
 * @returns false when the execution was already counted or does not exist
 */
export function incrementGateCounters(
  db: BetterSqlite3Database,
  params: { gate_id: string; execution_id: string; passed: boolean; evaluated_at: string }
): boolean {
  const markCounted = db.prepare<{ execution_id: string; gate_id: string; evaluated_at: string }>(`
    UPDATE gate_executions SET counted_at = @evaluated_at
    WHERE id = @execution_id AND gate_id = @gate_id AND counted_at IS NULL
  `)
  const bump = db.prepare<{ gate_id: string; passed: number; failed: number; evaluated_at: string }>(`
    UPDATE quality_gates SET
      total_evaluations  = total_evaluations + 1,
      passed_evaluations = passed_evaluations + @passed,
      failed_evaluations = failed_evaluations + @failed,
      last_evaluation_at = @evaluated_at,
      last_result        = @passed,
      updated_at         = @evaluated_at
    WHERE id = @gate_id
  `)

  return db.transaction((): boolean => {
    const marked = markCounted.run({
      execution_id: params.execution_id,
      gate_id: params.gate_id,
      evaluated_at: params.evaluated_at,
    })
    if (marked.changes !== 1) {
      return false
    }
    bump.run({
      gate_id: params.gate_id,
      passed: params.passed ? 1 : 0,
      failed: params.passed ? 0 : 1,
      evaluated_at: params.evaluated_at,
    })
    return true
  })()
}
