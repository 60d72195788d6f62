/**
 * Unit tests for src/utils/helpers.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { abortReason, errorMessage, formatDuration, frozenCopy, generateId, sleep } from '../helpers.js'

afterEach(() => {
  vi.useRealTimers()
})

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers()
    let done = false
    const pending = sleep(1000).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(999)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it('rejects with the abort reason when the signal fires', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)

    controller.abort(new Error('gate timed out'))

    await expect(pending).rejects.toThrow('gate timed out')
  })

  it('rejects immediately for an already aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort('shutdown'))).rejects.toThrow('shutdown')
  })
})

describe('abortReason', () => {
  it('wraps non-Error reasons', () => {
    const controller = new AbortController()
    controller.abort('cancelled')
    expect(abortReason(controller.signal).message).toBe('cancelled')
    expect(abortReason(undefined).message).toBe('Aborted')
  })
})

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(5000)).toBe('5.0s')
    expect(formatDuration(125_000)).toBe('2m 5s')
  })
})

describe('generateId', () => {
  it('prefixes a uuid', () => {
    expect(generateId('exec')).toMatch(/^exec-[0-9a-f-]{36}$/)
    expect(generateId()).toMatch(/^[0-9a-f-]{36}$/)
  })
})

describe('frozenCopy', () => {
  it('returns a deep copy that cannot be mutated', () => {
    const source = { endpoints: [{ path: '/users' }] }
    const copy = frozenCopy(source)

    source.endpoints[0] = { path: '/changed' }

    expect(copy.endpoints[0]?.path).toBe('/users')
    expect(Object.isFrozen(copy)).toBe(true)
    expect(Object.isFrozen(copy.endpoints)).toBe(true)
    expect(Object.isFrozen(copy.endpoints[0])).toBe(true)
  })
})

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full')
    expect(errorMessage(42)).toBe('42')
  })
})
