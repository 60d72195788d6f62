/**
 * QualityGateEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{subject}:{action} (e.g., "gate:run:started")
 */

import type { GateExecution, GateTarget, TerminalGateStatus } from './types.js'

// ---------------------------------------------------------------------------
// QualityGateEvents map
// ---------------------------------------------------------------------------

export interface QualityGateEvents {
  /** A run has loaded its gate configs and created its pending executions */
  'gate:run:started': {
    runId: string
    target: GateTarget
    gateIds: string[]
  }

  /**
   * An execution was persisted after a status transition.
   * Emitted in order pending -> running -> terminal for each execution.
   */
  'gate:execution:updated': {
    runId: string
    execution: GateExecution
  }

  /** Counters of a gate were incremented for a terminal execution */
  'gate:counters:updated': {
    gateId: string
    executionId: string
    passed: boolean
  }

  /** A run finished (normally or through caller abort) */
  'gate:run:completed': {
    runId: string
    status: Exclude<TerminalGateStatus, 'skipped' | 'error' | 'timeout'>
    blocking: boolean
    blockingGateIds: string[]
    durationMs: number
  }
}
