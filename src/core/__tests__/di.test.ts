/**
 * Unit tests for ServiceLifecycle.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ServiceLifecycle } from '../di.js'
import type { BaseService } from '../di.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function recordingService(name: string, calls: string[]): BaseService {
  return {
    initialize: vi.fn(async () => {
      calls.push(`init:${name}`)
    }),
    shutdown: vi.fn(async () => {
      calls.push(`shutdown:${name}`)
    }),
  }
}

// ---------------------------------------------------------------------------
// ServiceLifecycle
// ---------------------------------------------------------------------------

describe('ServiceLifecycle', () => {
  let services: ServiceLifecycle
  let calls: string[]

  beforeEach(() => {
    services = new ServiceLifecycle()
    calls = []
  })

  it('returns the started service', async () => {
    const database = recordingService('database', calls)
    await expect(services.start('database', database)).resolves.toBe(database)
    expect(calls).toEqual(['init:database'])
  })

  it('rejects a second service under the same name', async () => {
    await services.start('database', recordingService('a', calls))
    await expect(services.start('database', recordingService('b', calls))).rejects.toThrow(
      'Service "database" is already started'
    )
    expect(calls).toEqual(['init:a'])
  })

  it('stops services in reverse start order, once', async () => {
    await services.start('database', recordingService('database', calls))
    await services.start('engine', recordingService('engine', calls))

    await services.stopAll()
    await services.stopAll()

    expect(calls).toEqual(['init:database', 'init:engine', 'shutdown:engine', 'shutdown:database'])
  })

  it('does not stop a service whose start failed', async () => {
    const engine: BaseService = {
      initialize: vi.fn().mockRejectedValue(new Error('no checker for coverage')),
      shutdown: vi.fn().mockResolvedValue(undefined),
    }
    await services.start('database', recordingService('database', calls))

    await expect(services.start('engine', engine)).rejects.toThrow('no checker for coverage')
    await services.stopAll()

    expect(engine.shutdown).not.toHaveBeenCalled()
    expect(calls).toEqual(['init:database', 'shutdown:database'])
  })

  it('stops every service before reporting stop failures together', async () => {
    const failing: BaseService = {
      initialize: vi.fn().mockResolvedValue(undefined),
      shutdown: vi.fn().mockRejectedValue(new Error('close failed')),
    }
    await services.start('database', recordingService('database', calls))
    await services.start('engine', failing)

    const error = await services.stopAll().catch((err: unknown) => err)

    expect(error).toBeInstanceOf(AggregateError)
    if (error instanceof AggregateError) {
      expect(error.errors).toHaveLength(1)
      expect(error.message).toBe('Failed to stop 1 service(s)')
    }
    expect(calls).toEqual(['init:database', 'shutdown:database'])
  })
})
