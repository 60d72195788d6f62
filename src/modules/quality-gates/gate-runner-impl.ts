/**
 * GateRunnerImpl: concrete implementation of GateRunner.
 *
 * Each run gets its own AbortController. Aborting it (caller signal, engine
 * shutdown, or an environment fault) releases queued gates from the
 * semaphore and interrupts running evaluations; their executions are then
 * recorded as skipped with the cancellation reason. Each gate's timeout
 * starts once it holds a slot and covers both the artifact fetch and the
 * checker.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  ArtifactError,
  CheckerNotRegisteredError,
  CheckerRuntimeError,
  EvaluationTimeoutError,
  GateEnvironmentError,
  QualityGateError,
} from '../../core/errors.js'
import type { GateConfig, GateExecution, GateTarget, GateType } from '../../core/types.js'
import { Semaphore } from '../../utils/concurrency.js'
import { errorMessage, generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactProvider } from './artifact-provider.js'
import type { GateConfigStore } from './gate-config-store.js'
import {
  completeExecution,
  createPendingExecution,
  isTerminal,
  markRunning,
  skipExecution,
  statusFromResult,
  systemClock,
} from './gate-execution.js'
import type { Clock, CompletionInput } from './gate-execution.js'
import type { GateRegistry } from './gate-registry.js'
import { CANCELLATION_REASONS, DEFAULT_RUNNER_CONFIG } from './gate-runner.js'
import type { GateRunner, GateRunnerConfig } from './gate-runner.js'
import { ResultAggregator } from './result-aggregator.js'
import type { GateResult, RunOptions, RunResult } from './types.js'

const logger = createLogger('quality-gates:runner')

// ---------------------------------------------------------------------------
// Internal types
// ---------------------------------------------------------------------------

/** How the fetch-then-evaluate attempt of one gate ended */
type GateOutcome =
  | { kind: 'result'; result: GateResult }
  | { kind: 'error'; message: string; code: string }
  | { kind: 'timeout' }
  | { kind: 'cancelled' }
  | { kind: 'unavailable'; error: unknown }

/** How one awaited step ended under a gate deadline */
type Settled<T> =
  | { kind: 'value'; value: T }
  | { kind: 'thrown'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' }

/**
 * Per-gate time budget covering the artifact fetch and the checker.
 * `signal` aborts when the budget runs out or the run is aborted.
 */
interface GateDeadline {
  readonly signal: AbortSignal
  readonly timedOut: boolean
  dispose(): void
}

/** Mutable bookkeeping for one run */
interface RunState {
  runId: string
  target: GateTarget
  controller: AbortController
  /** Latest record of every execution, in gate order */
  executions: Map<string, GateExecution>
  /** Latest record of every execution the store accepted */
  saved: Map<string, GateExecution>
  fault: GateEnvironmentError | null
}

function cancellationReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason
  if (reason instanceof GateEnvironmentError) return CANCELLATION_REASONS.environmentFault
  if (typeof reason === 'string') return reason
  return CANCELLATION_REASONS.cancelled
}

function startDeadline(
  gateType: GateType,
  timeoutMs: number,
  runSignal: AbortSignal
): GateDeadline {
  const controller = new AbortController()
  let timedOut = false
  const onRunAbort = (): void => {
    controller.abort(runSignal.reason)
  }
  const timer = setTimeout(() => {
    if (controller.signal.aborted) return
    timedOut = true
    controller.abort(new EvaluationTimeoutError(gateType, timeoutMs))
  }, timeoutMs)

  if (runSignal.aborted) {
    onRunAbort()
  } else {
    runSignal.addEventListener('abort', onRunAbort, { once: true })
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut
    },
    dispose() {
      clearTimeout(timer)
      runSignal.removeEventListener('abort', onRunAbort)
    },
  }
}

/**
 * Await `work`, settling early when the deadline aborts. Whatever `work`
 * produces after that is dropped.
 */
function settle<T>(work: () => T | Promise<T>, deadline: GateDeadline): Promise<Settled<T>> {
  const { signal } = deadline
  return new Promise<Settled<T>>((resolve) => {
    const onAbort = (): void => {
      resolve(deadline.timedOut ? { kind: 'timeout' } : { kind: 'cancelled' })
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })

    void Promise.resolve()
      .then(work)
      .then(
        (value) => {
          resolve({ kind: 'value', value })
        },
        (error: unknown) => {
          resolve({ kind: 'thrown', error })
        }
      )
      .finally(() => {
        signal.removeEventListener('abort', onAbort)
      })
  })
}

// ---------------------------------------------------------------------------
// GateRunnerImpl
// ---------------------------------------------------------------------------

export interface GateRunnerOptions {
  registry: GateRegistry
  store: GateConfigStore
  artifacts: ArtifactProvider
  eventBus?: TypedEventBus
  aggregator?: ResultAggregator
  config?: Partial<GateRunnerConfig>
  clock?: Clock
}

export class GateRunnerImpl implements GateRunner {
  private readonly _registry: GateRegistry
  private readonly _store: GateConfigStore
  private readonly _artifacts: ArtifactProvider
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _aggregator: ResultAggregator
  private readonly _config: GateRunnerConfig
  private readonly _clock: Clock
  private readonly _active: Set<AbortController> = new Set()

  constructor(options: GateRunnerOptions) {
    this._registry = options.registry
    this._store = options.store
    this._artifacts = options.artifacts
    this._eventBus = options.eventBus
    this._aggregator = options.aggregator ?? new ResultAggregator(options.store, options.eventBus)
    this._config = { ...DEFAULT_RUNNER_CONFIG, ...options.config }
    this._clock = options.clock ?? systemClock
  }

  get activeRuns(): number {
    return this._active.size
  }

  abortAll(reason: string): void {
    for (const controller of this._active) {
      controller.abort(reason)
    }
  }

  async runGates(target: GateTarget, options: RunOptions = {}): Promise<RunResult> {
    const started = this._clock()
    const state: RunState = {
      runId: generateId('run'),
      target,
      controller: new AbortController(),
      executions: new Map(),
      saved: new Map(),
      fault: null,
    }

    const callerSignal = options.signal
    const onCallerAbort = (): void => {
      state.controller.abort(CANCELLATION_REASONS.cancelled)
    }
    if (callerSignal?.aborted === true) {
      onCallerAbort()
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true })
    }
    this._active.add(state.controller)

    try {
      const gates = await this._loadGates(target, options.dryRunDisabled === true)
      const runnable = await this._createExecutions(state, gates)

      this._eventBus?.emit('gate:run:started', {
        runId: state.runId,
        target,
        gateIds: gates.map((g) => g.id),
      })
      logger.info(
        { runId: state.runId, gates: gates.length, runnable: runnable.length },
        'Gate run started'
      )

      const semaphore = new Semaphore(this._config.maxParallelGates)
      await Promise.all(
        runnable.map(({ gate, executionId }) => this._runGate(state, semaphore, gate, executionId))
      )

      if (state.fault !== null) {
        throw new GateEnvironmentError(state.fault.message, state.fault.context, this._completed(state))
      }

      return this._finish(state, gates, started)
    } finally {
      callerSignal?.removeEventListener('abort', onCallerAbort)
      this._active.delete(state.controller)
    }
  }

  // -------------------------------------------------------------------------
  // Run setup
  // -------------------------------------------------------------------------

  private async _loadGates(target: GateTarget, includeDisabled: boolean): Promise<GateConfig[]> {
    try {
      return includeDisabled
        ? await this._store.getGates(target.workspaceId, target.projectId)
        : await this._store.getEnabledGates(target.workspaceId, target.projectId)
    } catch (err) {
      logger.error({ err, target }, 'Gate config store unavailable')
      throw new GateEnvironmentError(`Gate config store unavailable: ${errorMessage(err)}`, {
        workspaceId: target.workspaceId,
        projectId: target.projectId,
      })
    }
  }

  /**
   * Persist a pending execution for every gate. Disabled gates (dry run only)
   * go straight to skipped. Returns the gates left to evaluate.
   */
  private async _createExecutions(
    state: RunState,
    gates: GateConfig[]
  ): Promise<{ gate: GateConfig; executionId: string }[]> {
    const runnable: { gate: GateConfig; executionId: string }[] = []

    for (const gate of gates) {
      const pending = createPendingExecution({ runId: state.runId, gate, target: state.target }, this._clock)
      await this._persist(state, pending)
      if (state.fault !== null) break

      if (gate.isEnabled) {
        runnable.push({ gate, executionId: pending.id })
      } else {
        await this._persist(state, skipExecution(pending, CANCELLATION_REASONS.gateDisabled, this._clock))
      }
    }

    if (state.fault !== null) {
      await this._skipRemaining(state)
      return []
    }
    return runnable
  }

  // -------------------------------------------------------------------------
  // Per-gate evaluation
  // -------------------------------------------------------------------------

  private async _runGate(
    state: RunState,
    semaphore: Semaphore,
    gate: GateConfig,
    executionId: string
  ): Promise<void> {
    const signal = state.controller.signal
    // Acquisition only fails when the run is aborted while this gate is queued
    const release = await semaphore.acquire(signal).catch(() => null)
    if (release === null) {
      await this._skip(state, executionId, cancellationReason(signal))
      return
    }

    try {
      await this._evaluateGate(state, gate, executionId)
    } finally {
      release()
    }
  }

  private async _evaluateGate(state: RunState, gate: GateConfig, executionId: string): Promise<void> {
    const signal = state.controller.signal
    if (signal.aborted) {
      await this._skip(state, executionId, cancellationReason(signal))
      return
    }

    const running = markRunning(this._current(state, executionId), this._clock)
    await this._persist(state, running)
    if (signal.aborted) {
      await this._skip(state, executionId, cancellationReason(signal))
      return
    }

    const timeoutMs = gate.timeoutMs ?? this._config.defaultTimeoutMs
    const outcome = await this._attempt(state, gate, running, timeoutMs)

    switch (outcome.kind) {
      case 'result':
        await this._complete(state, running, {
          status: statusFromResult(outcome.result),
          result: outcome.result,
        })
        return
      case 'error':
        await this._complete(state, running, {
          status: 'error',
          errorMessage: outcome.message,
          details: { error_code: outcome.code },
        })
        return
      case 'timeout': {
        const err = new EvaluationTimeoutError(gate.gateType, timeoutMs)
        await this._complete(state, running, {
          status: 'timeout',
          errorMessage: err.message,
          details: { error_code: err.code, timeout_ms: timeoutMs },
        })
        return
      }
      case 'cancelled':
        await this._skip(state, executionId, cancellationReason(signal))
        return
      case 'unavailable':
        this._fault(
          state,
          new GateEnvironmentError(`Artifact provider unavailable: ${errorMessage(outcome.error)}`, {
            gateId: gate.id,
            gateType: gate.gateType,
          })
        )
        await this._skip(state, executionId, CANCELLATION_REASONS.environmentFault)
        return
    }
  }

  /**
   * Fetch the artifact and run the checker under one deadline, so a
   * provider that never answers times out the same way a slow checker does.
   * The checker's signal aborts on timeout or when the run is aborted.
   */
  private async _attempt(
    state: RunState,
    gate: GateConfig,
    running: GateExecution,
    timeoutMs: number
  ): Promise<GateOutcome> {
    if (!this._registry.has(gate.gateType)) {
      const err = new CheckerNotRegisteredError(gate.gateType)
      return { kind: 'error', message: err.message, code: err.code }
    }
    const checker = this._registry.lookup(gate.gateType)

    const deadline = startDeadline(gate.gateType, timeoutMs, state.controller.signal)
    try {
      const fetched = await settle(
        () => this._artifacts.getArtifact(state.target, gate.gateType),
        deadline
      )
      if (fetched.kind === 'thrown') {
        return fetched.error instanceof ArtifactError
          ? { kind: 'error', message: fetched.error.message, code: fetched.error.code }
          : { kind: 'unavailable', error: fetched.error }
      }
      if (fetched.kind !== 'value') return fetched

      const artifact = fetched.value
      if (artifact === null || artifact === undefined) {
        return {
          kind: 'error',
          message: `No artifact available for ${gate.gateType} gate`,
          code: 'NO_ARTIFACT',
        }
      }

      const evaluated = await settle(
        () => checker.evaluate(artifact, { ...running.configUsed }, { signal: deadline.signal }),
        deadline
      )
      switch (evaluated.kind) {
        case 'value':
          return { kind: 'result', result: evaluated.value }
        case 'thrown': {
          const err =
            evaluated.error instanceof QualityGateError
              ? evaluated.error
              : new CheckerRuntimeError(gate.gateType, evaluated.error)
          return { kind: 'error', message: err.message, code: err.code }
        }
        default:
          return evaluated
      }
    } finally {
      deadline.dispose()
    }
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private async _complete(
    state: RunState,
    running: GateExecution,
    input: CompletionInput
  ): Promise<void> {
    const terminal = completeExecution(running, input, this._clock)
    if (!(await this._persist(state, terminal))) return

    const log = { runId: state.runId, gateId: terminal.gateId, gateType: terminal.gateType }
    if (terminal.status === 'error' || terminal.status === 'timeout') {
      logger.warn({ ...log, status: terminal.status, error: terminal.errorMessage }, 'Gate did not complete')
    } else {
      logger.info({ ...log, status: terminal.status, durationMs: terminal.durationMs }, 'Gate evaluated')
    }

    // A saved terminal record is counted even once the run has faulted
    try {
      await this._aggregator.record(terminal)
    } catch (err) {
      if (state.fault !== null) {
        logger.error({ err, executionId: terminal.id }, 'Could not update gate counters after environment fault')
        return
      }
      this._fault(
        state,
        new GateEnvironmentError(`Failed to update gate counters: ${errorMessage(err)}`, {
          gateId: terminal.gateId,
          executionId: terminal.id,
        })
      )
    }
  }

  private async _skip(state: RunState, executionId: string, reason: string): Promise<void> {
    const current = this._current(state, executionId)
    if (isTerminal(current)) return
    await this._persist(state, skipExecution(current, reason, this._clock))
  }

  private async _skipRemaining(state: RunState): Promise<void> {
    for (const execution of [...state.executions.values()]) {
      if (!isTerminal(execution)) {
        await this._skip(state, execution.id, CANCELLATION_REASONS.environmentFault)
      }
    }
  }

  /**
   * Record the new state, save it and publish it. A failing save faults the
   * run; once the run is faulted, saves are best effort. Resolves to whether
   * the store accepted the record.
   */
  private async _persist(state: RunState, execution: GateExecution): Promise<boolean> {
    state.executions.set(execution.id, execution)
    try {
      await this._store.saveExecution(execution)
    } catch (err) {
      if (state.fault !== null) {
        logger.error({ err, executionId: execution.id }, 'Could not save execution after environment fault')
      } else {
        this._fault(
          state,
          new GateEnvironmentError(`Failed to save gate execution: ${errorMessage(err)}`, {
            executionId: execution.id,
            gateId: execution.gateId,
          })
        )
        if (!isTerminal(execution)) {
          await this._skip(state, execution.id, CANCELLATION_REASONS.environmentFault)
        }
      }
      return false
    }
    state.saved.set(execution.id, execution)
    this._eventBus?.emit('gate:execution:updated', { runId: state.runId, execution })
    return true
  }

  private _fault(state: RunState, err: GateEnvironmentError): void {
    if (state.fault !== null) return
    logger.error({ runId: state.runId, code: err.code, context: err.context }, err.message)
    state.fault = err
    state.controller.abort(err)
  }

  /** Saved terminal executions of a faulted run, apart from those the fault cut short */
  private _completed(state: RunState): GateExecution[] {
    return [...state.saved.values()].filter(
      (e) =>
        isTerminal(e) &&
        e.resultDetails['cancellation_reason'] !== CANCELLATION_REASONS.environmentFault
    )
  }

  private _current(state: RunState, executionId: string): GateExecution {
    const execution = state.executions.get(executionId)
    if (execution === undefined) {
      throw new Error(`Unknown execution ${executionId} in run ${state.runId}`)
    }
    return execution
  }

  // -------------------------------------------------------------------------
  // Result
  // -------------------------------------------------------------------------

  private _finish(state: RunState, gates: GateConfig[], started: Date): RunResult {
    const executions = [...state.executions.values()]
    const { blocking, blockingGateIds } = this._aggregator.deriveBlocking(executions, gates)
    const summary = this._aggregator.summarize(executions, gates)
    const completed = this._clock()
    const durationMs = Math.max(0, completed.getTime() - started.getTime())

    this._eventBus?.emit('gate:run:completed', {
      runId: state.runId,
      status: summary.status,
      blocking,
      blockingGateIds,
      durationMs,
    })
    logger.info({ runId: state.runId, status: summary.status, blocking, durationMs }, 'Gate run completed')

    return {
      runId: state.runId,
      target: state.target,
      executions,
      blocking,
      blockingGateIds,
      summary,
      startedAt: started.toISOString(),
      completedAt: completed.toISOString(),
      durationMs,
    }
  }
}

/**
 * Create a GateRunnerImpl with the given collaborators.
 */
export function createGateRunner(options: GateRunnerOptions): GateRunnerImpl {
  return new GateRunnerImpl(options)
}
