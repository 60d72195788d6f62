/**
 * Unit tests for the GateExecution lifecycle.
 */

import { describe, it, expect } from 'vitest'
import { GateStateError } from '../../../core/errors.js'
import type { GateIssue } from '../../../core/types.js'
import {
  canTransition,
  completeExecution,
  countIssues,
  createPendingExecution,
  isCountable,
  markRunning,
  skipExecution,
  statusFromResult,
} from '../gate-execution.js'
import type { Clock } from '../gate-execution.js'
import { TARGET, makeGate, makeResult } from './fixtures.js'

/** Clock that returns each given instant in turn, then repeats the last */
function steppingClock(...instants: string[]): Clock {
  let index = 0
  return () => {
    const iso = instants[Math.min(index, instants.length - 1)] ?? '2026-01-01T00:00:00.000Z'
    index++
    return new Date(iso)
  }
}

const T0 = '2026-03-01T10:00:00.000Z'
const T1 = '2026-03-01T10:00:01.000Z'
const T2 = '2026-03-01T10:00:03.500Z'

function pending() {
  return createPendingExecution(
    { runId: 'run-1', gate: makeGate('lint', {}, { max_errors: 0 }), target: TARGET, id: 'exec-1' },
    steppingClock(T0)
  )
}

// ---------------------------------------------------------------------------
// createPendingExecution
// ---------------------------------------------------------------------------

describe('createPendingExecution', () => {
  it('starts pending with empty results', () => {
    const execution = pending()
    expect(execution.id).toBe('exec-1')
    expect(execution.runId).toBe('run-1')
    expect(execution.gateId).toBe('gate-lint')
    expect(execution.status).toBe('pending')
    expect(execution.createdAt).toBe(T0)
    expect(execution.passed).toBeNull()
    expect(execution.issueCounts).toEqual({ critical: 0, high: 0, medium: 0, low: 0 })
    expect(execution.target).toEqual({ kind: 'task', id: 'task-1' })
  })

  it('snapshots the threshold config', () => {
    const gate = makeGate('lint', {}, { max_errors: 0 })
    const execution = createPendingExecution({ runId: 'run-1', gate, target: TARGET })

    gate.thresholdConfig['max_errors'] = 10

    expect(execution.configUsed).toEqual({ max_errors: 0 })
    expect(Object.isFrozen(execution.configUsed)).toBe(true)
    expect(Object.isFrozen(execution)).toBe(true)
  })

  it('generates an exec- id when none is given', () => {
    const execution = createPendingExecution({ runId: 'run-1', gate: makeGate('lint'), target: TARGET })
    expect(execution.id).toMatch(/^exec-/)
  })
})

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

describe('transitions', () => {
  it('allows pending to running and pending to skipped only', () => {
    expect(canTransition('pending', 'running')).toBe(true)
    expect(canTransition('pending', 'skipped')).toBe(true)
    expect(canTransition('pending', 'passed')).toBe(false)
  })

  it('never leaves a terminal status', () => {
    for (const status of ['passed', 'failed', 'warning', 'skipped', 'error', 'timeout'] as const) {
      expect(canTransition(status, 'running')).toBe(false)
      expect(canTransition(status, 'passed')).toBe(false)
    }
  })

  it('markRunning records startedAt', () => {
    const running = markRunning(pending(), steppingClock(T1))
    expect(running.status).toBe('running')
    expect(running.startedAt).toBe(T1)
  })

  it('throws GateStateError on an illegal transition', () => {
    const done = completeExecution(markRunning(pending()), { status: 'passed', result: makeResult() })
    expect(() => markRunning(done)).toThrow(GateStateError)
    expect(() => completeExecution(pending(), { status: 'passed' })).toThrow(GateStateError)
  })
})

// ---------------------------------------------------------------------------
// completeExecution
// ---------------------------------------------------------------------------

describe('completeExecution', () => {
  const issues: GateIssue[] = [
    { severity: 'high', message: 'a', location: null },
    { severity: 'high', message: 'b', location: null },
    { severity: 'low', message: 'c', location: 'src/a.ts:1:1' },
  ]

  it('records the result and the duration from startedAt', () => {
    const running = markRunning(pending(), steppingClock(T1))
    const result = makeResult({
      passed: false,
      issues,
      metrics: { errors: 2 },
      recommendations: ['[HIGH] Lint: fix errors'],
      details: { files: 3 },
    })

    const done = completeExecution(running, { status: 'failed', result }, steppingClock(T2))

    expect(done.status).toBe('failed')
    expect(done.passed).toBe(false)
    expect(done.completedAt).toBe(T2)
    expect(done.durationMs).toBe(2500)
    expect(done.issueCounts).toEqual({ critical: 0, high: 2, medium: 0, low: 1 })
    expect(done.metrics).toEqual({ errors: 2 })
    expect(done.recommendations).toEqual(['[HIGH] Lint: fix errors'])
    expect(done.resultDetails).toEqual({ files: 3 })
    expect(done.errorMessage).toBeNull()
  })

  it('derives passed=true for warning', () => {
    const done = completeExecution(markRunning(pending()), {
      status: 'warning',
      result: makeResult({ passedWithWarnings: true }),
    })
    expect(done.passed).toBe(true)
    expect(done.passedWithWarnings).toBe(true)
  })

  it('drops result content for error and merges details', () => {
    const done = completeExecution(markRunning(pending()), {
      status: 'error',
      result: makeResult({ issues, metrics: { errors: 2 } }),
      errorMessage: 'boom',
      details: { error_code: 'CHECKER_RUNTIME_ERROR' },
    })
    expect(done.passed).toBe(false)
    expect(done.issues).toEqual([])
    expect(done.metrics).toEqual({})
    expect(done.errorMessage).toBe('boom')
    expect(done.resultDetails).toEqual({ error_code: 'CHECKER_RUNTIME_ERROR' })
  })

  it('measures from createdAt when the execution never started', () => {
    const done = skipExecution(pending(), 'gate_disabled', steppingClock(T1))
    expect(done.status).toBe('skipped')
    expect(done.passed).toBe(false)
    expect(done.durationMs).toBe(1000)
    expect(done.resultDetails).toEqual({ cancellation_reason: 'gate_disabled' })
  })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('helpers', () => {
  it('statusFromResult maps passed, warning and failed', () => {
    expect(statusFromResult(makeResult())).toBe('passed')
    expect(statusFromResult(makeResult({ passedWithWarnings: true }))).toBe('warning')
    expect(statusFromResult(makeResult({ passed: false, passedWithWarnings: true }))).toBe('failed')
  })

  it('countIssues tallies by severity', () => {
    expect(
      countIssues([
        { severity: 'critical', message: 'x', location: null },
        { severity: 'medium', message: 'y', location: null },
      ])
    ).toEqual({ critical: 1, high: 0, medium: 1, low: 0 })
  })

  it('isCountable excludes skipped and non-terminal executions', () => {
    const p = pending()
    expect(isCountable(p)).toBe(false)
    expect(isCountable(markRunning(p))).toBe(false)
    expect(isCountable(skipExecution(p, 'cancelled'))).toBe(false)
    expect(isCountable(completeExecution(markRunning(p), { status: 'timeout' }))).toBe(true)
  })
})
