/**
 * Performance checker: evaluates load-test output against latency and
 * throughput bounds.
 */

import { z } from 'zod'
import type { GateIssue } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { parseArtifact, parseThresholds, recommendation } from './shared.js'

const PerformanceThresholdsSchema = z
  .object({
    max_response_time_ms: z.number().positive(),
    min_throughput_rps: z.number().min(0),
  })
  .passthrough()

const PerformanceArtifactSchema = z.object({
  p95_latency_ms: z.number().min(0),
  throughput_rps: z.number().min(0),
  avg_latency_ms: z.number().min(0).optional(),
  p99_latency_ms: z.number().min(0).optional(),
  error_rate: z.number().min(0).max(1).optional(),
})

export type PerformanceArtifact = z.infer<typeof PerformanceArtifactSchema>

export const performanceChecker: GateChecker<'performance'> = {
  gateType: 'performance',
  description: 'Requires p95 latency and throughput to stay within bounds',

  evaluate(artifact, thresholds): GateResult {
    const config = parseThresholds('performance', PerformanceThresholdsSchema, thresholds)
    const report = parseArtifact('performance', PerformanceArtifactSchema, artifact)

    const latencyOk = report.p95_latency_ms <= config.max_response_time_ms
    const throughputOk = report.throughput_rps >= config.min_throughput_rps

    const issues: GateIssue[] = []
    const recommendations: string[] = []

    if (!latencyOk) {
      issues.push({
        severity: 'high',
        message: `p95 latency ${String(report.p95_latency_ms)}ms exceeds ${String(config.max_response_time_ms)}ms`,
        location: null,
        rule: 'max_response_time_ms',
      })
      recommendations.push(
        recommendation('high', 'Performance', 'Profile slow endpoints and cache or batch expensive calls')
      )
    }
    if (!throughputOk) {
      issues.push({
        severity: 'high',
        message: `Throughput ${String(report.throughput_rps)} rps is below ${String(config.min_throughput_rps)} rps`,
        location: null,
        rule: 'min_throughput_rps',
      })
      recommendations.push(
        recommendation('high', 'Performance', 'Increase concurrency or remove contention on hot paths')
      )
    }

    const metrics: Record<string, number> = {
      p95_latency_ms: report.p95_latency_ms,
      throughput_rps: report.throughput_rps,
      max_response_time_ms: config.max_response_time_ms,
      min_throughput_rps: config.min_throughput_rps,
    }
    if (report.avg_latency_ms !== undefined) metrics.avg_latency_ms = report.avg_latency_ms
    if (report.p99_latency_ms !== undefined) metrics.p99_latency_ms = report.p99_latency_ms
    if (report.error_rate !== undefined) metrics.error_rate = report.error_rate

    return {
      passed: latencyOk && throughputOk,
      passedWithWarnings: false,
      issues,
      metrics,
      recommendations,
      details: {
        latency_within_bound: latencyOk,
        throughput_within_bound: throughputOk,
      },
    }
  },
}
