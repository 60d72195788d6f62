/**
 * Service lifecycle.
 *
 * The CLI opens the database, then the gate engine on top of it. Each is
 * started through a ServiceLifecycle, which stops whatever did start, in
 * reverse order, when the command finishes or a later start fails.
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('core:services')

/**
 * Long-lived service (database, gate engine).
 */
export interface BaseService {
  /** Open connections and check startup invariants. */
  initialize(): Promise<void>

  /** Release resources. Must tolerate being called after a failed initialize. */
  shutdown(): Promise<void>
}

interface StartedService {
  name: string
  service: BaseService
}

/**
 * @example
 * const services = new ServiceLifecycle()
 * const database = await services.start('database', createDatabaseService(path))
 * await services.start('engine', createQualityGateEngine({ store, artifacts }))
 * // ...
 * await services.stopAll()
 */
export class ServiceLifecycle {
  private readonly _started: StartedService[] = []

  /**
   * Initialize a service and track it for `stopAll()`. A service whose
   * initialize rejects is not tracked.
   *
   * @throws {Error} if a service with the same name is already started
   */
  async start<T extends BaseService>(name: string, service: T): Promise<T> {
    if (this._started.some((entry) => entry.name === name)) {
      throw new Error(`Service "${name}" is already started`)
    }
    await service.initialize()
    this._started.push({ name, service })
    logger.debug({ service: name }, 'Service started')
    return service
  }

  /**
   * Stop started services, last started first. Every service is stopped
   * even when one fails; the failures are then thrown together. Calling it
   * again afterwards does nothing.
   */
  async stopAll(): Promise<void> {
    const errors: Error[] = []
    let entry = this._started.pop()
    while (entry !== undefined) {
      try {
        await entry.service.shutdown()
        logger.debug({ service: entry.name }, 'Service stopped')
      } catch (err) {
        logger.warn({ err, service: entry.name }, 'Service failed to stop')
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
      entry = this._started.pop()
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to stop ${errors.length} service(s)`)
    }
  }
}
