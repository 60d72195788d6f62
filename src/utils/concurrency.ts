/**
 * Concurrency primitives: a counting semaphore whose acquisition can be
 * abandoned through an AbortSignal.
 */

import { abortReason } from './helpers.js'

interface Waiter {
  resolve: (release: () => void) => void
  reject: (err: Error) => void
  signal: AbortSignal | undefined
  onAbort: () => void
}

export class Semaphore {
  private _running = 0
  private readonly _queue: Waiter[] = []

  constructor(private readonly _limit: number) {
    if (!Number.isInteger(_limit) || _limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${String(_limit)}`)
    }
  }

  get running(): number {
    return this._running
  }

  get waiting(): number {
    return this._queue.length
  }

  /**
   * Wait for a slot. Resolves with a release function that must be called
   * exactly once; extra calls are ignored. Rejects with the abort reason if
   * the signal fires while still queued.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted === true) {
      return Promise.reject(abortReason(signal))
    }
    if (this._running < this._limit) {
      this._running++
      return Promise.resolve(this._releaser())
    }
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          const idx = this._queue.indexOf(waiter)
          if (idx !== -1) {
            this._queue.splice(idx, 1)
            reject(abortReason(signal))
          }
        },
      }
      signal?.addEventListener('abort', waiter.onAbort, { once: true })
      this._queue.push(waiter)
    })
  }

  private _releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      this._running--
      this._dequeue()
    }
  }

  private _dequeue(): void {
    if (this._running >= this._limit) return
    const next = this._queue.shift()
    if (next === undefined) return
    next.signal?.removeEventListener('abort', next.onAbort)
    this._running++
    next.resolve(this._releaser())
  }
}
