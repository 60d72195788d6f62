/**
 * SqliteGateStore: GateConfigStore backed by better-sqlite3.
 *
 * Maps the snake_case rows of the query layer to domain records. JSON
 * columns are decoded through the persistence schemas so a corrupt row
 * surfaces as a StoreDecodeError instead of a half-typed object.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ZodType, ZodTypeDef } from 'zod'
import {
  ConfigError,
  GateNotFoundError,
  StoreDecodeError,
} from '../../core/errors.js'
import type {
  GateConfig,
  GateExecution,
  GateType,
  TargetRef,
} from '../../core/types.js'
import { isGateType } from '../../core/types.js'
import {
  getGateExecution,
  getGateTypeStatistics,
  listExecutionHistory,
  listRunExecutions,
  upsertGateExecution,
  type GateExecutionRow,
  type UpsertGateExecutionInput,
} from '../../persistence/queries/gate-executions.js'
import {
  getQualityGate,
  getQualityGateByType,
  incrementGateCounters,
  insertQualityGate,
  listActiveGateTypes,
  listQualityGates,
  updateQualityGate,
  type QualityGateRow,
  type QualityGateUpdate,
} from '../../persistence/queries/quality-gates.js'
import {
  CreateGateConfigInputSchema,
  GateIssueListJson,
  GateStatusEnum,
  GateTypeEnum,
  MetricsJson,
  RecommendationsJson,
  ResultDetailsJson,
  ThresholdConfigJson,
  UpdateGateConfigInputSchema,
  type CreateGateConfigInput,
  type UpdateGateConfigInput,
} from '../../persistence/schemas/quality-gates.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_GATE_CONFIGS, type DefaultGateDefinition } from '../config/defaults.js'
import type { CounterIncrement, GateConfigStore } from './gate-config-store.js'
import { systemClock, type Clock } from './gate-execution.js'

const logger = createLogger('quality-gates:store')

// ---------------------------------------------------------------------------
// Read models
// ---------------------------------------------------------------------------

export interface ExecutionHistoryQuery {
  workspaceId: string
  projectId: string
  gateType?: GateType
  limit?: number
  offset?: number
}

export interface ExecutionHistory {
  totalCount: number
  limit: number
  offset: number
  executions: GateExecution[]
}

export interface GateTypeStatistics {
  gateType: string
  total: number
  passed: number
  warnings: number
  failed: number
  errors: number
  timeouts: number
  skipped: number
  /** Share of counted executions (passed or warning) over all non-skipped ones, 0-100 */
  successRate: number
  averageDurationMs: number | null
  totalIssues: number
}

export interface GateStatistics {
  periodDays: number
  since: string
  totalExecutions: number
  successRate: number
  byGateType: GateTypeStatistics[]
}

export const DEFAULT_HISTORY_LIMIT = 50
export const DEFAULT_STATISTICS_DAYS = 30

const DAY_MS = 24 * 60 * 60 * 1000

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------

function decodeJson<T>(
  table: string,
  column: string,
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch {
    throw new StoreDecodeError(table, column, 'not valid JSON')
  }
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new StoreDecodeError(table, column, issue?.message ?? 'unexpected shape')
  }
  return parsed.data
}

function decodeEnum<T>(
  table: string,
  column: string,
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new StoreDecodeError(table, column, `unknown value "${raw}"`)
  }
  return parsed.data
}

function toGateConfig(row: QualityGateRow): GateConfig {
  return {
    id: row.id,
    workspaceId: row.workspace_id,
    projectId: row.project_id,
    gateType: decodeEnum('quality_gates', 'gate_type', row.gate_type, GateTypeEnum),
    name: row.name,
    description: row.description,
    isEnabled: row.is_enabled === 1,
    isBlocking: row.is_blocking === 1,
    thresholdConfig: decodeJson(
      'quality_gates',
      'threshold_config',
      row.threshold_config,
      ThresholdConfigJson
    ),
    timeoutMs: row.timeout_ms,
    totalEvaluations: row.total_evaluations,
    passedEvaluations: row.passed_evaluations,
    failedEvaluations: row.failed_evaluations,
    lastEvaluationAt: row.last_evaluation_at,
    lastResult: row.last_result === null ? null : row.last_result === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toTargetRef(row: GateExecutionRow): TargetRef {
  if (row.task_id !== null) return { kind: 'task', id: row.task_id }
  if (row.task_run_id !== null) return { kind: 'task_run', id: row.task_run_id }
  if (row.sandbox_execution_id !== null) {
    return { kind: 'sandbox_execution', id: row.sandbox_execution_id }
  }
  throw new StoreDecodeError('gate_executions', 'task_id', 'execution has no target')
}

function toGateExecution(row: GateExecutionRow): GateExecution {
  const table = 'gate_executions'
  return {
    id: row.id,
    runId: row.run_id,
    gateId: row.gate_id,
    gateType: decodeEnum(table, 'gate_type', row.gate_type, GateTypeEnum),
    workspaceId: row.workspace_id,
    projectId: row.project_id,
    target: toTargetRef(row),
    status: decodeEnum(table, 'status', row.status, GateStatusEnum),
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationMs: row.duration_ms,
    passed: row.passed === null ? null : row.passed === 1,
    passedWithWarnings: row.passed_with_warnings === 1,
    issueCounts: {
      critical: row.critical_issues,
      high: row.high_issues,
      medium: row.medium_issues,
      low: row.low_issues,
    },
    issues: decodeJson(table, 'issues', row.issues, GateIssueListJson),
    metrics: decodeJson(table, 'metrics', row.metrics, MetricsJson),
    recommendations: decodeJson(table, 'recommendations', row.recommendations, RecommendationsJson),
    resultDetails: decodeJson(table, 'result_details', row.result_details, ResultDetailsJson),
    configUsed: decodeJson(table, 'config_used', row.config_used, ThresholdConfigJson),
    errorMessage: row.error_message,
  }
}

function toExecutionRow(execution: GateExecution): UpsertGateExecutionInput {
  const { target } = execution
  return {
    id: execution.id,
    run_id: execution.runId,
    gate_id: execution.gateId,
    gate_type: execution.gateType,
    workspace_id: execution.workspaceId,
    project_id: execution.projectId,
    task_id: target.kind === 'task' ? target.id : null,
    task_run_id: target.kind === 'task_run' ? target.id : null,
    sandbox_execution_id: target.kind === 'sandbox_execution' ? target.id : null,
    status: execution.status,
    created_at: execution.createdAt,
    started_at: execution.startedAt,
    completed_at: execution.completedAt,
    duration_ms: execution.durationMs,
    passed: execution.passed === null ? null : execution.passed ? 1 : 0,
    passed_with_warnings: execution.passedWithWarnings ? 1 : 0,
    critical_issues: execution.issueCounts.critical,
    high_issues: execution.issueCounts.high,
    medium_issues: execution.issueCounts.medium,
    low_issues: execution.issueCounts.low,
    issues: JSON.stringify(execution.issues),
    metrics: JSON.stringify(execution.metrics),
    recommendations: JSON.stringify(execution.recommendations),
    result_details: JSON.stringify(execution.resultDetails),
    config_used: JSON.stringify(execution.configUsed),
    error_message: execution.errorMessage,
  }
}

function toRowUpdate(update: UpdateGateConfigInput): QualityGateUpdate {
  const row: QualityGateUpdate = {}
  if (update.name !== undefined) row.name = update.name
  if (update.description !== undefined) row.description = update.description
  if (update.isEnabled !== undefined) row.is_enabled = update.isEnabled ? 1 : 0
  if (update.isBlocking !== undefined) row.is_blocking = update.isBlocking ? 1 : 0
  if (update.thresholdConfig !== undefined) {
    row.threshold_config = JSON.stringify(update.thresholdConfig)
  }
  if (update.timeoutMs !== undefined) row.timeout_ms = update.timeoutMs
  return row
}

function rate(numerator: number, denominator: number): number {
  if (denominator === 0) return 0
  return Math.round((numerator / denominator) * 1000) / 10
}

// ---------------------------------------------------------------------------
// SqliteGateStore
// ---------------------------------------------------------------------------

export class SqliteGateStore implements GateConfigStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock

  constructor(db: BetterSqlite3Database, clock: Clock = systemClock) {
    this._db = db
    this._clock = clock
  }

  // -- Gate configs ----------------------------------------------------------

  /**
   * @throws {ConfigError} when the input is invalid or the project already
   *   has a gate of that type
   */
  createGateConfig(input: CreateGateConfigInput): GateConfig {
    const parsed = CreateGateConfigInputSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const key = issue?.path.join('.') ?? ''
      throw new ConfigError(`Invalid gate config: ${key}: ${issue?.message ?? 'invalid'}`, { key })
    }
    const data = parsed.data

    const existing = getQualityGateByType(this._db, data.workspaceId, data.projectId, data.gateType)
    if (existing !== undefined) {
      throw new ConfigError(
        `Project ${data.projectId} already has a ${data.gateType} gate (${existing.id})`,
        { gateId: existing.id, gateType: data.gateType }
      )
    }

    const id = generateId('gate')
    insertQualityGate(this._db, {
      id,
      workspace_id: data.workspaceId,
      project_id: data.projectId,
      gate_type: data.gateType,
      name: data.name,
      description: data.description ?? null,
      is_enabled: data.isEnabled ? 1 : 0,
      is_blocking: data.isBlocking ? 1 : 0,
      threshold_config: JSON.stringify(data.thresholdConfig),
      timeout_ms: data.timeoutMs ?? null,
    })
    logger.info({ gateId: id, gateType: data.gateType, projectId: data.projectId }, 'Gate created')
    return this._requireGate(id)
  }

  /**
   * Apply an explicit update. Counters cannot be changed this way.
   * @throws {GateNotFoundError}
   */
  updateGateConfig(id: string, update: UpdateGateConfigInput): GateConfig {
    const parsed = UpdateGateConfigInputSchema.safeParse(update)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const key = issue?.path.join('.') ?? ''
      throw new ConfigError(`Invalid gate update: ${key}: ${issue?.message ?? 'invalid'}`, { key })
    }
    const updated = updateQualityGate(
      this._db,
      id,
      toRowUpdate(parsed.data),
      this._clock().toISOString()
    )
    if (!updated) {
      throw new GateNotFoundError(id)
    }
    return this._requireGate(id)
  }

  getGateConfig(id: string): GateConfig | undefined {
    const row = getQualityGate(this._db, id)
    return row === undefined ? undefined : toGateConfig(row)
  }

  /**
   * Create the default gate set for a project, skipping gate types it
   * already has. Returns the gates created by this call.
   */
  seedDefaultGates(
    workspaceId: string,
    projectId: string,
    definitions: readonly DefaultGateDefinition[] = DEFAULT_GATE_CONFIGS
  ): GateConfig[] {
    return this._db.transaction((): GateConfig[] => {
      const created: GateConfig[] = []
      for (const def of definitions) {
        if (getQualityGateByType(this._db, workspaceId, projectId, def.gateType) !== undefined) {
          continue
        }
        created.push(
          this.createGateConfig({
            workspaceId,
            projectId,
            gateType: def.gateType,
            name: def.name,
            description: def.description,
            isBlocking: def.isBlocking,
            thresholdConfig: def.thresholdConfig,
          })
        )
      }
      return created
    })()
  }

  getEnabledGates(workspaceId: string, projectId: string): GateConfig[] {
    return listQualityGates(this._db, workspaceId, projectId, { enabledOnly: true }).map(toGateConfig)
  }

  getGates(workspaceId: string, projectId: string): GateConfig[] {
    return listQualityGates(this._db, workspaceId, projectId).map(toGateConfig)
  }

  getActiveGateTypes(): GateType[] {
    return listActiveGateTypes(this._db).filter(isGateType)
  }

  // -- Executions ------------------------------------------------------------

  saveExecution(execution: GateExecution): void {
    const written = upsertGateExecution(this._db, toExecutionRow(execution))
    if (!written) {
      logger.debug(
        { executionId: execution.id, status: execution.status },
        'Execution already terminal, update ignored'
      )
    }
  }

  atomicIncrementCounters(gateId: string, passed: boolean, increment: CounterIncrement): boolean {
    return incrementGateCounters(this._db, {
      gate_id: gateId,
      execution_id: increment.executionId,
      passed,
      evaluated_at: increment.evaluatedAt,
    })
  }

  getExecution(id: string): GateExecution | undefined {
    const row = getGateExecution(this._db, id)
    return row === undefined ? undefined : toGateExecution(row)
  }

  getRunExecutions(runId: string): GateExecution[] {
    return listRunExecutions(this._db, runId).map(toGateExecution)
  }

  getExecutionHistory(query: ExecutionHistoryQuery): ExecutionHistory {
    const limit = query.limit ?? DEFAULT_HISTORY_LIMIT
    const offset = query.offset ?? 0
    const page = listExecutionHistory(this._db, {
      workspace_id: query.workspaceId,
      project_id: query.projectId,
      gate_type: query.gateType,
      limit,
      offset,
    })
    return {
      totalCount: page.total_count,
      limit,
      offset,
      executions: page.rows.map(toGateExecution),
    }
  }

  /** Outcome statistics over the last `days` days, per gate type and overall */
  getStatistics(
    workspaceId: string,
    projectId: string,
    days: number = DEFAULT_STATISTICS_DAYS
  ): GateStatistics {
    const since = new Date(this._clock().getTime() - days * DAY_MS).toISOString()
    const rows = getGateTypeStatistics(this._db, {
      workspace_id: workspaceId,
      project_id: projectId,
      since,
    })

    const byGateType = rows.map((row): GateTypeStatistics => {
      const succeeded = row.passed + row.warnings
      return {
        gateType: row.gate_type,
        total: row.total,
        passed: row.passed,
        warnings: row.warnings,
        failed: row.failed,
        errors: row.errors,
        timeouts: row.timeouts,
        skipped: row.skipped,
        successRate: rate(succeeded, row.total - row.skipped),
        averageDurationMs: row.avg_duration_ms === null ? null : Math.round(row.avg_duration_ms),
        totalIssues: row.total_issues,
      }
    })

    const totalExecutions = byGateType.reduce((sum, s) => sum + s.total, 0)
    const succeeded = byGateType.reduce((sum, s) => sum + s.passed + s.warnings, 0)
    const skipped = byGateType.reduce((sum, s) => sum + s.skipped, 0)

    return {
      periodDays: days,
      since,
      totalExecutions,
      successRate: rate(succeeded, totalExecutions - skipped),
      byGateType,
    }
  }

  private _requireGate(id: string): GateConfig {
    const gate = this.getGateConfig(id)
    if (gate === undefined) {
      throw new GateNotFoundError(id)
    }
    return gate
  }
}

export function createSqliteGateStore(
  db: BetterSqlite3Database,
  clock: Clock = systemClock
): SqliteGateStore {
  return new SqliteGateStore(db, clock)
}
