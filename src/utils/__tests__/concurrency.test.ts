/**
 * Unit tests for the Semaphore.
 */

import { describe, it, expect } from 'vitest'
import { Semaphore } from '../concurrency.js'

describe('Semaphore', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError)
  })

  it('grants up to the limit and queues the rest in FIFO order', async () => {
    const semaphore = new Semaphore(2)
    const order: string[] = []

    const releaseA = await semaphore.acquire()
    const releaseB = await semaphore.acquire()
    const c = semaphore.acquire().then((release) => {
      order.push('c')
      return release
    })
    const d = semaphore.acquire().then((release) => {
      order.push('d')
      return release
    })

    expect(semaphore.running).toBe(2)
    expect(semaphore.waiting).toBe(2)

    releaseA()
    const releaseC = await c
    releaseB()
    const releaseD = await d

    expect(order).toEqual(['c', 'd'])
    releaseC()
    releaseD()
    expect(semaphore.running).toBe(0)
  })

  it('ignores a second call to the same release function', async () => {
    const semaphore = new Semaphore(1)
    const release = await semaphore.acquire()

    release()
    release()

    expect(semaphore.running).toBe(0)
  })

  it('drops a queued waiter whose signal aborts', async () => {
    const semaphore = new Semaphore(1)
    const release = await semaphore.acquire()
    const controller = new AbortController()
    const queued = semaphore.acquire(controller.signal)

    controller.abort('cancelled')

    await expect(queued).rejects.toThrow('cancelled')
    expect(semaphore.waiting).toBe(0)
    release()
    expect(semaphore.running).toBe(0)
  })

  it('rejects at once for an aborted signal', async () => {
    const semaphore = new Semaphore(1)
    await expect(semaphore.acquire(AbortSignal.abort('shutdown'))).rejects.toThrow('shutdown')
    expect(semaphore.running).toBe(0)
  })
})
