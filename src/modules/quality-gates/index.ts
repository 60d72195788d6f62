/**
 * quality-gates module: gate evaluation engine
 *
 * Public API re-exports for the quality-gates module.
 */

// Types
export type {
  CheckerMap,
  EvaluationContext,
  GateChecker,
  GateResult,
  RunOptions,
  RunResult,
  RunStatus,
  RunSummary,
} from './types.js'

// Engine
export { QualityGateEngine, createQualityGateEngine } from './gate-engine.js'
export type { QualityGateEngineOptions } from './gate-engine.js'

// Runner
export type { GateRunner, GateRunnerConfig } from './gate-runner.js'
export { CANCELLATION_REASONS, DEFAULT_RUNNER_CONFIG } from './gate-runner.js'
export { GateRunnerImpl, createGateRunner } from './gate-runner-impl.js'
export type { GateRunnerOptions } from './gate-runner-impl.js'

// Registry and checkers
export { GateRegistry } from './gate-registry.js'
export { BUILT_IN_CHECKERS, registerBuiltInCheckers } from './checkers/index.js'

// Execution lifecycle and aggregation
export {
  canTransition,
  completeExecution,
  createPendingExecution,
  markRunning,
  skipExecution,
  systemClock,
} from './gate-execution.js'
export type { Clock } from './gate-execution.js'
export { ResultAggregator } from './result-aggregator.js'
export type { BlockingDecision } from './result-aggregator.js'

// Collaborators
export type { ArtifactProvider } from './artifact-provider.js'
export { FileArtifactProvider } from './file-artifact-provider.js'
export type { CounterIncrement, GateConfigStore } from './gate-config-store.js'
export { SqliteGateStore, createSqliteGateStore } from './sqlite-gate-store.js'
export type {
  ExecutionHistory,
  ExecutionHistoryQuery,
  GateStatistics,
  GateTypeStatistics,
} from './sqlite-gate-store.js'
