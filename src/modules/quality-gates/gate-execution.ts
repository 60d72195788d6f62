/**
 * GateExecution lifecycle: immutable execution records and the status
 * state machine:
 *
 *   pending -> running -> {passed, failed, warning, skipped, error, timeout}
 *   pending -> skipped
 *
 * Every function returns a new frozen record; nothing leaves a terminal state.
 */

import { GateStateError } from '../../core/errors.js'
import type {
  GateConfig,
  GateExecution,
  GateIssue,
  GateStatus,
  GateTarget,
  IssueCounts,
  TerminalGateStatus,
} from '../../core/types.js'
import { isTerminalStatus } from '../../core/types.js'
import { frozenCopy, generateId } from '../../utils/helpers.js'
import type { GateResult } from './types.js'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

const ALLOWED_TRANSITIONS: Record<GateStatus, readonly GateStatus[]> = {
  pending: ['running', 'skipped'],
  running: ['passed', 'failed', 'warning', 'skipped', 'error', 'timeout'],
  passed: [],
  failed: [],
  warning: [],
  skipped: [],
  error: [],
  timeout: [],
}

export function canTransition(from: GateStatus, to: GateStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to)
}

function assertTransition(execution: GateExecution, to: GateStatus): void {
  if (!canTransition(execution.status, to)) {
    throw new GateStateError(execution.id, execution.status, to)
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function freeze(execution: GateExecution): GateExecution {
  return Object.freeze(execution)
}

export function emptyIssueCounts(): IssueCounts {
  return { critical: 0, high: 0, medium: 0, low: 0 }
}

export function countIssues(issues: readonly GateIssue[]): IssueCounts {
  const counts = emptyIssueCounts()
  for (const issue of issues) {
    counts[issue.severity]++
  }
  return counts
}

/** Status for a checker result that returned normally */
export function statusFromResult(result: GateResult): 'passed' | 'failed' | 'warning' {
  if (!result.passed) return 'failed'
  return result.passedWithWarnings ? 'warning' : 'passed'
}

// ---------------------------------------------------------------------------
// Constructors and transitions
// ---------------------------------------------------------------------------

export interface CreateExecutionInput {
  runId: string
  gate: GateConfig
  target: GateTarget
  id?: string
}

/**
 * Create a pending execution. The gate's threshold config is deep-copied and
 * frozen into `configUsed`, so later edits to the gate do not reach it.
 */
export function createPendingExecution(
  input: CreateExecutionInput,
  clock: Clock = systemClock
): GateExecution {
  const { gate, target } = input
  return freeze({
    id: input.id ?? generateId('exec'),
    runId: input.runId,
    gateId: gate.id,
    gateType: gate.gateType,
    workspaceId: target.workspaceId,
    projectId: target.projectId,
    target: Object.freeze({ ...target.ref }),
    status: 'pending',
    createdAt: clock().toISOString(),
    startedAt: null,
    completedAt: null,
    durationMs: null,
    passed: null,
    passedWithWarnings: false,
    issueCounts: Object.freeze(emptyIssueCounts()),
    issues: Object.freeze([]),
    metrics: Object.freeze({}),
    recommendations: Object.freeze([]),
    resultDetails: Object.freeze({}),
    configUsed: frozenCopy(gate.thresholdConfig),
    errorMessage: null,
  })
}

export function markRunning(execution: GateExecution, clock: Clock = systemClock): GateExecution {
  assertTransition(execution, 'running')
  return freeze({
    ...execution,
    status: 'running',
    startedAt: clock().toISOString(),
  })
}

/** What a terminal transition records beyond the status itself */
export interface CompletionInput {
  status: TerminalGateStatus
  result?: GateResult
  errorMessage?: string
  details?: Record<string, unknown>
}

/**
 * Move an execution to a terminal status.
 *
 * `passed` is derived from the status: true for passed/warning, false for
 * failed/error/timeout, and false for skipped. Issue counts are tallied from
 * the result's issues; error, timeout and skipped carry none.
 */
export function completeExecution(
  execution: GateExecution,
  input: CompletionInput,
  clock: Clock = systemClock
): GateExecution {
  assertTransition(execution, input.status)

  const completedAt = clock()
  const startedMs = Date.parse(execution.startedAt ?? execution.createdAt)
  const durationMs = Math.max(0, completedAt.getTime() - startedMs)

  const keepResult = input.status === 'passed' || input.status === 'failed' || input.status === 'warning'
  const result = keepResult ? input.result : undefined
  const issues = result?.issues ?? []

  return freeze({
    ...execution,
    status: input.status,
    completedAt: completedAt.toISOString(),
    durationMs,
    passed: input.status === 'passed' || input.status === 'warning',
    passedWithWarnings: result?.passedWithWarnings ?? false,
    issueCounts: Object.freeze(countIssues(issues)),
    issues: frozenCopy(issues),
    metrics: frozenCopy(result?.metrics ?? {}),
    recommendations: frozenCopy(result?.recommendations ?? []),
    resultDetails: frozenCopy({ ...(result?.details ?? {}), ...(input.details ?? {}) }),
    errorMessage: input.errorMessage ?? null,
  })
}

/** Cancel a non-terminal execution as skipped, recording why */
export function skipExecution(
  execution: GateExecution,
  reason: string,
  clock: Clock = systemClock
): GateExecution {
  return completeExecution(
    execution,
    { status: 'skipped', details: { cancellation_reason: reason } },
    clock
  )
}

export function isTerminal(execution: GateExecution): boolean {
  return isTerminalStatus(execution.status)
}

/** Whether the aggregator counts this execution (terminal and not skipped) */
export function isCountable(execution: GateExecution): boolean {
  return isTerminal(execution) && execution.status !== 'skipped'
}
