/**
 * Shared types for the Quality Gates module.
 */

import type {
  GateExecution,
  GateIssue,
  GateTarget,
  GateType,
  ThresholdConfig,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Checker contract
// ---------------------------------------------------------------------------

/**
 * Outcome of a single checker evaluation.
 */
export interface GateResult {
  passed: boolean
  /** Passed, but with non-fatal findings worth surfacing */
  passedWithWarnings: boolean
  issues: GateIssue[]
  metrics: Record<string, number>
  /** Ordered, formatted as `[PRIORITY] Area: suggestion` */
  recommendations: string[]
  details: Record<string, unknown>
}

export interface EvaluationContext {
  /** Aborted when the gate times out or its run is cancelled */
  signal?: AbortSignal
}

/**
 * A checker turns one artifact plus a threshold config into a GateResult.
 *
 * Checkers are stateless: the same inputs always give the same result and
 * concurrent calls never interfere. They throw ConfigError for a bad
 * threshold config and ArtifactError for an artifact they cannot read.
 */
export interface GateChecker<T extends GateType = GateType> {
  readonly gateType: T
  readonly description: string
  evaluate(
    artifact: unknown,
    thresholds: ThresholdConfig,
    context?: EvaluationContext
  ): GateResult | Promise<GateResult>
}

/** One checker per gate type, checked for exhaustiveness by the compiler */
export type CheckerMap = { [K in GateType]: GateChecker<K> }

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Aborting cancels every non-terminal execution of this run */
  signal?: AbortSignal
  /** Also record disabled gates, as skipped */
  dryRunDisabled?: boolean
}

export type RunStatus = 'passed' | 'warning' | 'failed'

export interface RunSummary {
  status: RunStatus
  total: number
  passedGateIds: string[]
  warningGateIds: string[]
  failedGateIds: string[]
  errorGateIds: string[]
  timeoutGateIds: string[]
  skippedGateIds: string[]
  /** Every recommendation of every execution, in execution order */
  recommendations: string[]
}

export interface RunResult {
  runId: string
  target: GateTarget
  executions: GateExecution[]
  blocking: boolean
  blockingGateIds: string[]
  summary: RunSummary
  startedAt: string
  completedAt: string
  durationMs: number
}
