/**
 * Core types for qualitygate
 * Shared type definitions used across all modules
 */

// ---------------------------------------------------------------------------
// Gate types and statuses
// ---------------------------------------------------------------------------

/** Every gate type the engine knows how to evaluate */
export const GATE_TYPES = [
  'lint',
  'coverage',
  'security',
  'performance',
  'contract',
  'complexity',
  'type_check',
] as const

export type GateType = (typeof GATE_TYPES)[number]

/** Status of a gate execution */
export type GateStatus =
  | 'pending'
  | 'running'
  | 'passed'
  | 'failed'
  | 'warning'
  | 'skipped'
  | 'error'
  | 'timeout'

export const TERMINAL_STATUSES = [
  'passed',
  'failed',
  'warning',
  'skipped',
  'error',
  'timeout',
] as const

export type TerminalGateStatus = (typeof TERMINAL_STATUSES)[number]

/** Terminal statuses that count as a failure for counters and blocking */
export const FAILING_STATUSES: readonly TerminalGateStatus[] = ['failed', 'error', 'timeout']

/** Severity of an issue reported by a checker */
export type IssueSeverity = 'critical' | 'high' | 'medium' | 'low'

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ['critical', 'high', 'medium', 'low']

export function isGateType(value: string): value is GateType {
  return (GATE_TYPES as readonly string[]).includes(value)
}

export function isTerminalStatus(status: GateStatus): status is TerminalGateStatus {
  return (TERMINAL_STATUSES as readonly string[]).includes(status)
}

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

/** What a gate execution evaluates: exactly one task, task run or sandbox execution */
export type TargetKind = 'task' | 'task_run' | 'sandbox_execution'

export interface TargetRef {
  kind: TargetKind
  id: string
}

/** A target together with the workspace/project whose gates apply to it */
export interface GateTarget {
  workspaceId: string
  projectId: string
  ref: TargetRef
}

// ---------------------------------------------------------------------------
// Gate configuration
// ---------------------------------------------------------------------------

/** Open, per-gate-type threshold mapping */
export type ThresholdConfig = Record<string, unknown>

export interface GateConfig {
  id: string
  workspaceId: string
  projectId: string
  gateType: GateType
  name: string
  description: string | null
  isEnabled: boolean
  isBlocking: boolean
  thresholdConfig: ThresholdConfig
  /** Per-gate timeout override; null falls back to the engine default */
  timeoutMs: number | null
  totalEvaluations: number
  passedEvaluations: number
  failedEvaluations: number
  lastEvaluationAt: string | null
  lastResult: boolean | null
  createdAt: string
  updatedAt: string
}

// ---------------------------------------------------------------------------
// Issues and execution records
// ---------------------------------------------------------------------------

export interface GateIssue {
  severity: IssueSeverity
  message: string
  /** Where the issue was found, e.g. `src/app.ts:12:4` or `GET /users` */
  location: string | null
  rule?: string
}

export interface IssueCounts {
  critical: number
  high: number
  medium: number
  low: number
}

export interface GateExecution {
  id: string
  runId: string
  gateId: string
  gateType: GateType
  workspaceId: string
  projectId: string
  target: TargetRef
  status: GateStatus
  createdAt: string
  startedAt: string | null
  completedAt: string | null
  durationMs: number | null
  /** null until the execution is terminal */
  passed: boolean | null
  passedWithWarnings: boolean
  issueCounts: IssueCounts
  issues: readonly GateIssue[]
  metrics: Readonly<Record<string, number>>
  recommendations: readonly string[]
  resultDetails: Readonly<Record<string, unknown>>
  /** Threshold config snapshot taken at dispatch */
  configUsed: Readonly<ThresholdConfig>
  errorMessage: string | null
}
