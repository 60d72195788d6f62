/**
 * Unit tests for the configuration schemas and defaults.
 */

import { describe, it, expect } from 'vitest'
import { GATE_TYPES } from '../../../core/types.js'
import {
  LogLevelSchema,
  PartialQualityGateConfigSchema,
  QualityGateConfigSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG, DEFAULT_GATE_CONFIGS } from '../defaults.js'

describe('QualityGateConfigSchema', () => {
  it('accepts the built-in defaults', () => {
    expect(QualityGateConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects an unknown log level', () => {
    expect(LogLevelSchema.safeParse('verbose').success).toBe(false)
    expect(QualityGateConfigSchema.safeParse({ ...DEFAULT_CONFIG, log_level: 'verbose' }).success).toBe(
      false
    )
  })

  it('bounds max_parallel_gates to 1..64', () => {
    const parse = (n: number): boolean =>
      QualityGateConfigSchema.safeParse({ ...DEFAULT_CONFIG, max_parallel_gates: n }).success
    expect(parse(0)).toBe(false)
    expect(parse(1)).toBe(true)
    expect(parse(64)).toBe(true)
    expect(parse(65)).toBe(false)
  })

  it('rejects a non-integer timeout', () => {
    expect(
      QualityGateConfigSchema.safeParse({ ...DEFAULT_CONFIG, default_timeout_ms: 1.5 }).success
    ).toBe(false)
  })

  it('rejects unknown keys', () => {
    const result = QualityGateConfigSchema.safeParse({ ...DEFAULT_CONFIG, retries: 3 })
    expect(result.success).toBe(false)
  })
})

describe('PartialQualityGateConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(PartialQualityGateConfigSchema.parse({})).toEqual({})
  })

  it('still rejects unknown keys', () => {
    expect(PartialQualityGateConfigSchema.safeParse({ retries: 3 }).success).toBe(false)
  })
})

describe('DEFAULT_GATE_CONFIGS', () => {
  it('defines one gate per gate type', () => {
    expect(DEFAULT_GATE_CONFIGS.map((d) => d.gateType)).toEqual([...GATE_TYPES])
  })

  it('requires 80% coverage by default', () => {
    const coverage = DEFAULT_GATE_CONFIGS.find((d) => d.gateType === 'coverage')
    expect(coverage?.thresholdConfig).toEqual({ min_percentage: 80 })
  })
})
