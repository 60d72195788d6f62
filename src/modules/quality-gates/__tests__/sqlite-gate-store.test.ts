/**
 * Unit tests for SqliteGateStore against an in-memory database.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import Database from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConfigError, GateNotFoundError, StoreDecodeError } from '../../../core/errors.js'
import type { GateConfig, GateExecution, GateIssue, TerminalGateStatus } from '../../../core/types.js'
import { runMigrations } from '../../../persistence/migrations/index.js'
import {
  completeExecution,
  createPendingExecution,
  markRunning,
  skipExecution,
} from '../gate-execution.js'
import { SqliteGateStore } from '../sqlite-gate-store.js'
import { TARGET, makeResult } from './fixtures.js'

const NOW = '2026-03-31T00:00:00.000Z'

function buildExecution(
  gate: GateConfig,
  status: TerminalGateStatus,
  createdAt: string,
  durationMs = 0,
  issues: GateIssue[] = [],
  workspaceTarget = TARGET
): GateExecution {
  const start = new Date(createdAt)
  const at = (): Date => start
  const pending = createPendingExecution({ runId: 'run-1', gate, target: workspaceTarget }, at)
  if (status === 'skipped') return skipExecution(pending, 'cancelled', at)
  return completeExecution(
    markRunning(pending, at),
    {
      status,
      result: makeResult({
        passed: status === 'passed' || status === 'warning',
        passedWithWarnings: status === 'warning',
        issues,
      }),
    },
    () => new Date(start.getTime() + durationMs)
  )
}

describe('SqliteGateStore', () => {
  let db: BetterSqlite3Database
  let store: SqliteGateStore

  function createGate(gateType: 'lint' | 'coverage', overrides: { isEnabled?: boolean } = {}): GateConfig {
    return store.createGateConfig({
      workspaceId: TARGET.workspaceId,
      projectId: TARGET.projectId,
      gateType,
      name: `${gateType} gate`,
      ...overrides,
    })
  }

  beforeEach(() => {
    db = new Database(':memory:')
    runMigrations(db)
    store = new SqliteGateStore(db, () => new Date(NOW))
  })

  // -------------------------------------------------------------------------
  // Gate configs
  // -------------------------------------------------------------------------

  describe('createGateConfig', () => {
    it('applies defaults and starts counters at zero', () => {
      const gate = createGate('lint')

      expect(gate.id).toMatch(/^gate-/)
      expect(gate).toMatchObject({
        workspaceId: 'ws-1',
        projectId: 'proj-1',
        gateType: 'lint',
        name: 'lint gate',
        description: null,
        isEnabled: true,
        isBlocking: true,
        thresholdConfig: {},
        timeoutMs: null,
        totalEvaluations: 0,
        passedEvaluations: 0,
        failedEvaluations: 0,
        lastEvaluationAt: null,
        lastResult: null,
      })
    })

    it('rejects invalid input with the offending key', () => {
      expect(() =>
        store.createGateConfig({ workspaceId: 'ws-1', projectId: 'proj-1', gateType: 'lint', name: '' })
      ).toThrow('Invalid gate config: name: String must contain at least 1 character(s)')
    })

    it('rejects a second gate of the same type in a project', () => {
      const first = createGate('lint')
      expect(() => createGate('lint')).toThrow(ConfigError)
      expect(() => createGate('lint')).toThrow(`Project proj-1 already has a lint gate (${first.id})`)
    })
  })

  describe('updateGateConfig', () => {
    it('changes only the given fields and stamps updatedAt', () => {
      const gate = createGate('coverage')

      const updated = store.updateGateConfig(gate.id, {
        isBlocking: false,
        thresholdConfig: { min_percentage: 90 },
      })

      expect(updated.isBlocking).toBe(false)
      expect(updated.isEnabled).toBe(true)
      expect(updated.thresholdConfig).toEqual({ min_percentage: 90 })
      expect(updated.name).toBe('coverage gate')
      expect(updated.updatedAt).toBe(NOW)
    })

    it('throws GateNotFoundError for an unknown id', () => {
      expect(() => store.updateGateConfig('gate-missing', { name: 'x' })).toThrow(GateNotFoundError)
    })

    it('rejects an invalid timeout', () => {
      const gate = createGate('lint')
      expect(() => store.updateGateConfig(gate.id, { timeoutMs: 0 })).toThrow(ConfigError)
    })
  })

  describe('seedDefaultGates', () => {
    it('creates one gate per type and is idempotent', () => {
      const created = store.seedDefaultGates('ws-1', 'proj-1')
      expect(created).toHaveLength(7)
      expect(store.seedDefaultGates('ws-1', 'proj-1')).toEqual([])
      expect(store.getGates('ws-1', 'proj-1')).toHaveLength(7)
    })

    it('only fills in missing types', () => {
      createGate('lint')
      const created = store.seedDefaultGates('ws-1', 'proj-1')
      expect(created.map((g) => g.gateType)).not.toContain('lint')
      expect(created).toHaveLength(6)
    })

    it('creates performance and complexity as non-blocking', () => {
      const created = store.seedDefaultGates('ws-1', 'proj-1')
      const nonBlocking = created.filter((g) => !g.isBlocking).map((g) => g.gateType)
      expect(nonBlocking.sort()).toEqual(['complexity', 'performance'])
    })
  })

  describe('gate queries', () => {
    it('separates enabled gates from all gates', () => {
      createGate('lint')
      createGate('coverage', { isEnabled: false })

      expect(store.getEnabledGates('ws-1', 'proj-1').map((g) => g.gateType)).toEqual(['lint'])
      expect(store.getGates('ws-1', 'proj-1')).toHaveLength(2)
      expect(store.getGates('ws-1', 'other')).toEqual([])
    })

    it('lists distinct active gate types across projects', () => {
      createGate('lint')
      createGate('coverage', { isEnabled: false })
      store.createGateConfig({ workspaceId: 'ws-2', projectId: 'proj-9', gateType: 'lint', name: 'Lint' })

      expect(store.getActiveGateTypes()).toEqual(['lint'])
    })

    it('raises StoreDecodeError for a corrupt threshold config', () => {
      const gate = createGate('lint')
      db.prepare('UPDATE quality_gates SET threshold_config = ? WHERE id = ?').run('{oops', gate.id)

      expect(() => store.getGateConfig(gate.id)).toThrow(StoreDecodeError)
      expect(() => store.getGateConfig(gate.id)).toThrow(
        'Cannot decode quality_gates.threshold_config: not valid JSON'
      )
    })
  })

  // -------------------------------------------------------------------------
  // Executions and counters
  // -------------------------------------------------------------------------

  describe('saveExecution', () => {
    it('stores an execution through its transitions', () => {
      const gate = createGate('lint')
      const issues: GateIssue[] = [
        { severity: 'high', message: 'Unexpected var', location: 'src/a.ts:3:5', rule: 'no-var' },
      ]
      const at = (): Date => new Date('2026-03-20T10:00:00.000Z')
      const pending = createPendingExecution(
        { runId: 'run-1', gate: { ...gate, thresholdConfig: { max_warnings: 5 } }, target: TARGET },
        at
      )
      const running = markRunning(pending, at)
      const done = completeExecution(
        running,
        {
          status: 'failed',
          result: makeResult({
            passed: false,
            issues,
            metrics: { errors: 1 },
            recommendations: ['[CRITICAL] Linting: Fix 1 lint error(s) before merging'],
            details: { over_warning_limit: false },
          }),
        },
        () => new Date('2026-03-20T10:00:01.500Z')
      )

      store.saveExecution(pending)
      expect(store.getExecution(pending.id)?.status).toBe('pending')
      store.saveExecution(running)
      store.saveExecution(done)

      expect(done.durationMs).toBe(1500)
      expect(store.getExecution(done.id)).toEqual(done)
    })

    it('never overwrites a terminal execution', () => {
      const gate = createGate('lint')
      const passed = buildExecution(gate, 'passed', '2026-03-20T10:00:00.000Z', 100)
      store.saveExecution(passed)

      store.saveExecution({ ...passed, status: 'skipped', passed: false })

      expect(store.getExecution(passed.id)?.status).toBe('passed')
    })

    it('returns the executions of a run in creation order', () => {
      const gate = createGate('lint')
      const first = buildExecution(gate, 'passed', '2026-03-20T10:00:00.000Z')
      const second = buildExecution(gate, 'failed', '2026-03-20T10:01:00.000Z')
      store.saveExecution(second)
      store.saveExecution(first)

      expect(store.getRunExecutions('run-1').map((e) => e.id)).toEqual([first.id, second.id])
    })
  })

  describe('atomicIncrementCounters', () => {
    it('counts an execution once', () => {
      const gate = createGate('lint')
      const failed = buildExecution(gate, 'failed', '2026-03-20T10:00:00.000Z')
      store.saveExecution(failed)
      const increment = { executionId: failed.id, evaluatedAt: '2026-03-20T10:00:05.000Z' }

      expect(store.atomicIncrementCounters(gate.id, false, increment)).toBe(true)
      expect(store.atomicIncrementCounters(gate.id, false, increment)).toBe(false)

      expect(store.getGateConfig(gate.id)).toMatchObject({
        totalEvaluations: 1,
        passedEvaluations: 0,
        failedEvaluations: 1,
        lastEvaluationAt: '2026-03-20T10:00:05.000Z',
        lastResult: false,
      })
    })

    it('does nothing for an execution that was never saved', () => {
      const gate = createGate('lint')
      const increment = { executionId: 'exec-missing', evaluatedAt: NOW }
      expect(store.atomicIncrementCounters(gate.id, true, increment)).toBe(false)
      expect(store.getGateConfig(gate.id)?.totalEvaluations).toBe(0)
    })
  })

  // -------------------------------------------------------------------------
  // History and statistics
  // -------------------------------------------------------------------------

  describe('getExecutionHistory', () => {
    let ids: string[]

    beforeEach(() => {
      const lint = createGate('lint')
      const coverage = createGate('coverage')
      const executions = [
        buildExecution(lint, 'passed', '2026-03-20T10:00:00.000Z'),
        buildExecution(coverage, 'failed', '2026-03-20T10:01:00.000Z'),
        buildExecution(lint, 'warning', '2026-03-20T10:02:00.000Z'),
      ]
      for (const execution of executions) store.saveExecution(execution)
      ids = executions.map((e) => e.id)
      store.saveExecution(
        buildExecution(lint, 'passed', '2026-03-20T10:03:00.000Z', 0, [], {
          ...TARGET,
          projectId: 'proj-other',
        })
      )
    })

    it('returns the newest executions of the project first', () => {
      const history = store.getExecutionHistory({ workspaceId: 'ws-1', projectId: 'proj-1' })
      expect(history.totalCount).toBe(3)
      expect(history.limit).toBe(50)
      expect(history.offset).toBe(0)
      expect(history.executions.map((e) => e.id)).toEqual([ids[2], ids[1], ids[0]])
    })

    it('filters by gate type', () => {
      const history = store.getExecutionHistory({
        workspaceId: 'ws-1',
        projectId: 'proj-1',
        gateType: 'lint',
      })
      expect(history.totalCount).toBe(2)
      expect(history.executions.map((e) => e.id)).toEqual([ids[2], ids[0]])
    })

    it('pages with limit and offset', () => {
      const history = store.getExecutionHistory({
        workspaceId: 'ws-1',
        projectId: 'proj-1',
        limit: 1,
        offset: 1,
      })
      expect(history.totalCount).toBe(3)
      expect(history.executions.map((e) => e.id)).toEqual([ids[1]])
    })
  })

  describe('getStatistics', () => {
    beforeEach(() => {
      const lint = createGate('lint')
      const coverage = createGate('coverage')
      const low: GateIssue = { severity: 'low', message: 'l', location: null }
      const high: GateIssue = { severity: 'high', message: 'h', location: null }

      const executions = [
        buildExecution(lint, 'passed', '2026-03-20T10:00:00.000Z', 1000),
        buildExecution(lint, 'warning', '2026-03-20T10:01:00.000Z', 3000, [low]),
        buildExecution(lint, 'failed', '2026-03-20T10:02:00.000Z', 2000, [high, high]),
        buildExecution(lint, 'skipped', '2026-03-20T10:03:00.000Z'),
        buildExecution(coverage, 'timeout', '2026-03-20T10:04:00.000Z', 5000),
        buildExecution(coverage, 'error', '2026-03-20T10:05:00.000Z', 1000),
        // Outside the 30-day window
        buildExecution(lint, 'failed', '2026-02-01T00:00:00.000Z', 1000),
      ]
      for (const execution of executions) store.saveExecution(execution)
      // Still running, not counted
      store.saveExecution(
        markRunning(createPendingExecution({ runId: 'run-2', gate: lint, target: TARGET }))
      )
    })

    it('aggregates terminal executions per gate type', () => {
      const stats = store.getStatistics('ws-1', 'proj-1')

      expect(stats.periodDays).toBe(30)
      expect(stats.since).toBe('2026-03-01T00:00:00.000Z')
      expect(stats.byGateType).toEqual([
        {
          gateType: 'coverage',
          total: 2,
          passed: 0,
          warnings: 0,
          failed: 2,
          errors: 1,
          timeouts: 1,
          skipped: 0,
          successRate: 0,
          averageDurationMs: 3000,
          totalIssues: 0,
        },
        {
          gateType: 'lint',
          total: 4,
          passed: 1,
          warnings: 1,
          failed: 1,
          errors: 0,
          timeouts: 0,
          skipped: 1,
          successRate: 66.7,
          averageDurationMs: 1500,
          totalIssues: 3,
        },
      ])
    })

    it('computes the overall success rate without skipped executions', () => {
      const stats = store.getStatistics('ws-1', 'proj-1')
      expect(stats.totalExecutions).toBe(6)
      expect(stats.successRate).toBe(40)
    })

    it('returns zeros for a project without executions', () => {
      const stats = store.getStatistics('ws-1', 'empty', 7)
      expect(stats).toEqual({
        periodDays: 7,
        since: '2026-03-24T00:00:00.000Z',
        totalExecutions: 0,
        successRate: 0,
        byGateType: [],
      })
    })
  })
})
