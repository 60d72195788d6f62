/**
 * Shared builders for quality-gate tests: gate configs, targets, checkers
 * and an in-memory store.
 */

import type {
  GateConfig,
  GateExecution,
  GateTarget,
  GateType,
  ThresholdConfig,
} from '../../../core/types.js'
import type { CounterIncrement, GateConfigStore } from '../gate-config-store.js'
import type { GateChecker, GateResult } from '../types.js'
import type { ArtifactProvider } from '../artifact-provider.js'

export const TARGET: GateTarget = {
  workspaceId: 'ws-1',
  projectId: 'proj-1',
  ref: { kind: 'task', id: 'task-1' },
}

export function makeGate(
  gateType: GateType,
  overrides: Partial<GateConfig> = {},
  thresholdConfig: ThresholdConfig = {}
): GateConfig {
  return {
    id: `gate-${gateType}`,
    workspaceId: TARGET.workspaceId,
    projectId: TARGET.projectId,
    gateType,
    name: `${gateType} gate`,
    description: null,
    isEnabled: true,
    isBlocking: true,
    thresholdConfig,
    timeoutMs: null,
    totalEvaluations: 0,
    passedEvaluations: 0,
    failedEvaluations: 0,
    lastEvaluationAt: null,
    lastResult: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export function makeResult(overrides: Partial<GateResult> = {}): GateResult {
  return {
    passed: true,
    passedWithWarnings: false,
    issues: [],
    metrics: {},
    recommendations: [],
    details: {},
    ...overrides,
  }
}

export function passingChecker<T extends GateType>(gateType: T): GateChecker<T> {
  return {
    gateType,
    description: `passes every ${gateType} artifact`,
    evaluate: () => makeResult(),
  }
}

export function checkerFrom<T extends GateType>(
  gateType: T,
  evaluate: GateChecker<T>['evaluate']
): GateChecker<T> {
  return { gateType, description: `test ${gateType} checker`, evaluate }
}

/**
 * GateConfigStore backed by arrays, recording every saved execution state.
 */
export class InMemoryGateStore implements GateConfigStore {
  readonly gates: GateConfig[]
  /** Every saveExecution call, in order */
  readonly saved: GateExecution[] = []
  readonly latest = new Map<string, GateExecution>()
  readonly counted = new Set<string>()

  constructor(gates: GateConfig[] = []) {
    this.gates = gates
  }

  getEnabledGates(workspaceId: string, projectId: string): GateConfig[] {
    return this.getGates(workspaceId, projectId).filter((g) => g.isEnabled)
  }

  getGates(workspaceId: string, projectId: string): GateConfig[] {
    return this.gates.filter((g) => g.workspaceId === workspaceId && g.projectId === projectId)
  }

  getActiveGateTypes(): GateType[] {
    return [...new Set(this.gates.filter((g) => g.isEnabled).map((g) => g.gateType))]
  }

  saveExecution(execution: GateExecution): void {
    const existing = this.latest.get(execution.id)
    if (existing !== undefined && existing.status !== 'pending' && existing.status !== 'running') {
      return
    }
    this.saved.push(execution)
    this.latest.set(execution.id, execution)
  }

  atomicIncrementCounters(gateId: string, passed: boolean, increment: CounterIncrement): boolean {
    if (this.counted.has(increment.executionId)) return false
    const index = this.gates.findIndex((g) => g.id === gateId)
    const gate = this.gates[index]
    if (gate === undefined) return false
    this.counted.add(increment.executionId)
    this.gates[index] = {
      ...gate,
      totalEvaluations: gate.totalEvaluations + 1,
      passedEvaluations: gate.passedEvaluations + (passed ? 1 : 0),
      failedEvaluations: gate.failedEvaluations + (passed ? 0 : 1),
      lastEvaluationAt: increment.evaluatedAt,
      lastResult: passed,
    }
    return true
  }

  statusHistory(executionId: string): string[] {
    return this.saved.filter((e) => e.id === executionId).map((e) => e.status)
  }
}

/** Artifact provider returning a fixed artifact per gate type */
export function staticArtifacts(
  artifacts: Partial<Record<GateType, unknown>>
): ArtifactProvider {
  return {
    getArtifact: async (_target, gateType) => artifacts[gateType] ?? null,
  }
}
