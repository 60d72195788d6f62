/**
 * GateRunner: interface contract for evaluating every gate of a target.
 *
 * GateRunner is responsible for:
 *  - Creating one execution per considered gate, all pending up front
 *  - Evaluating them concurrently, bounded by `maxParallelGates`
 *  - Enforcing the per-gate timeout and caller cancellation
 *  - Persisting and publishing every status transition
 *  - Counting each terminal execution exactly once through the ResultAggregator
 *
 * A single gate's failure never fails the run. Only a fault in the store or
 * the artifact provider rejects `runGates`, with a GateEnvironmentError.
 */

import type { GateTarget } from '../../core/types.js'
import type { RunOptions, RunResult } from './types.js'

export interface GateRunnerConfig {
  /** Timeout for gates without their own `timeoutMs` */
  defaultTimeoutMs: number
  /** Gates of one run evaluated at the same time */
  maxParallelGates: number
}

export const DEFAULT_RUNNER_CONFIG: GateRunnerConfig = {
  defaultTimeoutMs: 300_000,
  maxParallelGates: 4,
}

export interface GateRunner {
  /**
   * Evaluate every enabled gate of the target's workspace/project.
   *
   * @throws {GateEnvironmentError} when the store or artifact provider fails
   */
  runGates(target: GateTarget, options?: RunOptions): Promise<RunResult>

  /** Abort every run in flight; their non-terminal executions become skipped */
  abortAll(reason: string): void

  /** Number of runs in flight */
  readonly activeRuns: number
}

/** Values of `resultDetails.cancellation_reason` on skipped executions */
export const CANCELLATION_REASONS = {
  cancelled: 'cancelled',
  shutdown: 'shutdown',
  environmentFault: 'environment_fault',
  gateDisabled: 'gate_disabled',
} as const
