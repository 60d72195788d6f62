/**
 * GateConfigStore: the persistence the engine consumes.
 *
 * SqliteGateStore is the shipped implementation; tests and embedders may
 * supply their own.
 */

import type { GateConfig, GateExecution, GateType } from '../../core/types.js'

export interface CounterIncrement {
  executionId: string
  /** ISO timestamp recorded as the gate's last evaluation time */
  evaluatedAt: string
}

export interface GateConfigStore {
  /** Enabled gates for a workspace/project */
  getEnabledGates(workspaceId: string, projectId: string): GateConfig[] | Promise<GateConfig[]>

  /** All gates for a workspace/project, enabled or not */
  getGates(workspaceId: string, projectId: string): GateConfig[] | Promise<GateConfig[]>

  /** Distinct gate types of every enabled gate, across all projects */
  getActiveGateTypes(): GateType[] | Promise<GateType[]>

  /**
   * Insert or update an execution. An execution already stored with a
   * terminal status is never overwritten.
   */
  saveExecution(execution: GateExecution): void | Promise<void>

  /**
   * Atomically add one evaluation to a gate's counters. Idempotent per
   * execution id: returns false when that execution was already counted.
   */
  atomicIncrementCounters(
    gateId: string,
    passed: boolean,
    increment: CounterIncrement
  ): boolean | Promise<boolean>
}
