/**
 * Unit tests for the contract checker.
 */

import { describe, it, expect } from 'vitest'
import { ConfigError } from '../../../../core/errors.js'
import { contractChecker } from '../contract-checker.js'

const USER_SCHEMA = {
  type: 'object',
  required: ['id', 'email'],
  properties: {
    id: { type: 'integer' },
    email: { type: 'string' },
  },
}

const THRESHOLDS = {
  endpoints: [{ method: 'get', path: '/users/1', response_schema: USER_SCHEMA, expected_status: 200 }],
}

describe('contractChecker', () => {
  it('passes a response that matches its schema and status', async () => {
    const result = await contractChecker.evaluate(
      { responses: [{ method: 'GET', path: '/users/1', status: 200, body: { id: 1, email: 'a@example.com' } }] },
      THRESHOLDS
    )

    expect(result.passed).toBe(true)
    expect(result.metrics).toEqual({
      endpoints_total: 1,
      endpoints_passed: 1,
      endpoints_failed: 0,
      violations: 0,
    })
  })

  it('reports a status mismatch and every schema error', async () => {
    const result = await contractChecker.evaluate(
      { responses: [{ method: 'GET', path: '/users/1', status: 500, body: { id: 'one' } }] },
      THRESHOLDS
    )

    expect(result.passed).toBe(false)
    expect(result.issues).toEqual([
      {
        severity: 'high',
        message: 'Expected status 200, got 500',
        location: 'GET /users/1',
        rule: 'expected_status',
      },
      {
        severity: 'high',
        message: "Response body (root) must have required property 'email'",
        location: 'GET /users/1',
        rule: 'required',
      },
      {
        severity: 'high',
        message: 'Response body /id must be integer',
        location: 'GET /users/1/id',
        rule: 'type',
      },
    ])
    expect(result.recommendations).toEqual([
      '[HIGH] API Contract: Align GET /users/1 with its declared contract',
    ])
    expect(result.metrics['endpoints_failed']).toBe(1)
  })

  it('reports endpoints with no recorded response', async () => {
    const result = await contractChecker.evaluate({ responses: [] }, THRESHOLDS)

    expect(result.passed).toBe(false)
    expect(result.issues).toEqual([
      {
        severity: 'high',
        message: 'No response recorded for GET /users/1',
        location: 'GET /users/1',
        rule: 'response_present',
      },
    ])
  })

  it('passes when no endpoints are declared', async () => {
    const result = await contractChecker.evaluate({ responses: [] }, { endpoints: [], validation: {} })
    expect(result.passed).toBe(true)
    expect(result.metrics['endpoints_total']).toBe(0)
  })

  it('raises ConfigError for a schema that does not compile', () => {
    try {
      contractChecker.evaluate(
        { responses: [{ method: 'GET', path: '/x', status: 200, body: {} }] },
        { endpoints: [{ method: 'GET', path: '/x', response_schema: { type: 'no-such-type' } }] }
      )
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.context['key']).toBe('endpoints.0.response_schema')
      }
    }
  })
})
