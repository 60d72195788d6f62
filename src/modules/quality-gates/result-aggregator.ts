/**
 * ResultAggregator: folds terminal executions into gate counters, the
 * blocking decision and the run summary.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { GateConfig, GateExecution } from '../../core/types.js'
import { FAILING_STATUSES } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { GateConfigStore } from './gate-config-store.js'
import { isCountable } from './gate-execution.js'
import type { RunSummary } from './types.js'

const logger = createLogger('quality-gates:aggregator')

export interface BlockingDecision {
  blocking: boolean
  blockingGateIds: string[]
}

function isFailing(execution: GateExecution): boolean {
  return (FAILING_STATUSES as readonly string[]).includes(execution.status)
}

export class ResultAggregator {
  constructor(
    private readonly _store: Pick<GateConfigStore, 'atomicIncrementCounters'>,
    private readonly _eventBus?: TypedEventBus
  ) {}

  /**
   * Count a terminal execution against its gate. Skipped and non-terminal
   * executions are ignored. Returns whether the counters changed; a repeat
   * call for the same execution is a no-op at the store.
   */
  async record(execution: GateExecution): Promise<boolean> {
    if (!isCountable(execution)) {
      return false
    }
    const passed = execution.status === 'passed' || execution.status === 'warning'
    const counted = await this._store.atomicIncrementCounters(execution.gateId, passed, {
      executionId: execution.id,
      evaluatedAt: execution.completedAt ?? new Date().toISOString(),
    })

    if (counted) {
      this._eventBus?.emit('gate:counters:updated', {
        gateId: execution.gateId,
        executionId: execution.id,
        passed,
      })
    } else {
      logger.debug({ executionId: execution.id }, 'Execution already counted')
    }
    return counted
  }

  /**
   * A run blocks when any execution of a blocking gate ended failed, error or
   * timeout. Executions of unknown gates never block.
   */
  deriveBlocking(
    executions: readonly GateExecution[],
    configs: readonly GateConfig[]
  ): BlockingDecision {
    const blockingGates = new Set(configs.filter((c) => c.isBlocking).map((c) => c.id))
    const blockingGateIds = executions
      .filter((e) => blockingGates.has(e.gateId) && isFailing(e))
      .map((e) => e.gateId)
    return { blocking: blockingGateIds.length > 0, blockingGateIds }
  }

  summarize(executions: readonly GateExecution[], configs: readonly GateConfig[]): RunSummary {
    const { blocking } = this.deriveBlocking(executions, configs)
    const ids = (status: GateExecution['status']): string[] =>
      executions.filter((e) => e.status === status).map((e) => e.gateId)

    const summary: RunSummary = {
      status: 'passed',
      total: executions.length,
      passedGateIds: ids('passed'),
      warningGateIds: ids('warning'),
      failedGateIds: ids('failed'),
      errorGateIds: ids('error'),
      timeoutGateIds: ids('timeout'),
      skippedGateIds: ids('skipped'),
      recommendations: executions.flatMap((e) => e.recommendations),
    }

    const nonBlockingFailure = executions.some(isFailing)
    if (blocking) {
      summary.status = 'failed'
    } else if (summary.warningGateIds.length > 0 || nonBlockingFailure) {
      summary.status = 'warning'
    }
    return summary
  }
}
