/**
 * QualityGateEngine: startup wiring and the public surface of the module.
 *
 * Lifecycle:
 *  1. construct, optionally `registerGate()` custom checkers
 *  2. `initialize()` installs the built-in checkers for any type still
 *     unclaimed, fails fast if an enabled gate has no checker, then
 *     freezes the registry. After a failure the missing checker can still
 *     be registered and `initialize()` retried.
 *  3. `runGates()` as often as needed, concurrently if wanted
 *  4. `shutdown()` aborts runs still in flight
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { QualityGateError } from '../../core/errors.js'
import type { GateTarget, GateType } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactProvider } from './artifact-provider.js'
import { registerBuiltInCheckers } from './checkers/index.js'
import type { GateConfigStore } from './gate-config-store.js'
import { GateRegistry } from './gate-registry.js'
import { CANCELLATION_REASONS } from './gate-runner.js'
import type { GateRunnerConfig } from './gate-runner.js'
import { GateRunnerImpl } from './gate-runner-impl.js'
import type { Clock } from './gate-execution.js'
import { ResultAggregator } from './result-aggregator.js'
import type { GateChecker, RunOptions, RunResult } from './types.js'

const logger = createLogger('quality-gates:engine')

export interface QualityGateEngineOptions {
  store: GateConfigStore
  artifacts: ArtifactProvider
  eventBus?: TypedEventBus
  config?: Partial<GateRunnerConfig>
  /** Skip installing the built-in checkers */
  withoutBuiltIns?: boolean
  registry?: GateRegistry
  clock?: Clock
}

export class QualityGateEngine implements BaseService {
  private readonly _store: GateConfigStore
  private readonly _registry: GateRegistry
  private readonly _runner: GateRunnerImpl
  private readonly _aggregator: ResultAggregator
  private readonly _withBuiltIns: boolean
  private _initialized = false

  constructor(options: QualityGateEngineOptions) {
    this._store = options.store
    this._registry = options.registry ?? new GateRegistry()
    this._withBuiltIns = options.withoutBuiltIns !== true
    this._aggregator = new ResultAggregator(options.store, options.eventBus)
    this._runner = new GateRunnerImpl({
      registry: this._registry,
      store: options.store,
      artifacts: options.artifacts,
      eventBus: options.eventBus,
      aggregator: this._aggregator,
      config: options.config,
      clock: options.clock,
    })
  }

  get registry(): GateRegistry {
    return this._registry
  }

  get aggregator(): ResultAggregator {
    return this._aggregator
  }

  get isInitialized(): boolean {
    return this._initialized
  }

  /**
   * Register a checker. Only allowed before `initialize()`; a checker
   * registered here replaces the built-in one for its type.
   */
  registerGate<T extends GateType>(gateType: T, checker: GateChecker<T>): void {
    this._registry.register(gateType, checker)
  }

  async initialize(): Promise<void> {
    if (this._initialized) return
    if (this._withBuiltIns) {
      registerBuiltInCheckers(this._registry)
    }
    const activeTypes = await this._store.getActiveGateTypes()
    this._registry.assertCovers(activeTypes)
    this._registry.freeze()

    this._initialized = true
    logger.info(
      { checkers: this._registry.registeredTypes, activeTypes },
      'Quality gate engine initialized'
    )
  }

  async runGates(target: GateTarget, options?: RunOptions): Promise<RunResult> {
    if (!this._initialized) {
      throw new QualityGateError(
        'Quality gate engine must be initialized before running gates',
        'ENGINE_NOT_INITIALIZED'
      )
    }
    return this._runner.runGates(target, options)
  }

  async shutdown(): Promise<void> {
    if (this._runner.activeRuns > 0) {
      logger.info({ activeRuns: this._runner.activeRuns }, 'Aborting in-flight gate runs')
      this._runner.abortAll(CANCELLATION_REASONS.shutdown)
    }
    this._initialized = false
  }
}

export function createQualityGateEngine(options: QualityGateEngineOptions): QualityGateEngine {
  return new QualityGateEngine(options)
}
