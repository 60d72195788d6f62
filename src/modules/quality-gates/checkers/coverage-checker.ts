/**
 * Coverage checker: compares measured line coverage with `min_percentage`.
 */

import { z } from 'zod'
import type { GateIssue } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { parseArtifact, parseThresholds, recommendation } from './shared.js'

/** A failing run within this many points of the minimum is reported as near-miss */
const GRACE_POINTS = 10

const CoverageThresholdsSchema = z
  .object({
    min_percentage: z.number().min(0).max(100),
  })
  .passthrough()

const CoverageArtifactSchema = z.object({
  percentage: z.number().min(0).max(100),
  files: z
    .array(
      z.object({
        path: z.string(),
        percentage: z.number().min(0).max(100),
      })
    )
    .optional(),
})

export type CoverageArtifact = z.infer<typeof CoverageArtifactSchema>

export const coverageChecker: GateChecker<'coverage'> = {
  gateType: 'coverage',
  description: 'Requires measured test coverage to reach the configured minimum',

  evaluate(artifact, thresholds): GateResult {
    const { min_percentage: minimum } = parseThresholds(
      'coverage',
      CoverageThresholdsSchema,
      thresholds
    )
    const report = parseArtifact('coverage', CoverageArtifactSchema, artifact)

    const measured = report.percentage
    const passed = measured >= minimum
    const gap = Math.max(0, minimum - measured)

    const issues: GateIssue[] = []
    const recommendations: string[] = []

    if (!passed) {
      issues.push({
        severity: 'high',
        message: `Coverage ${measured.toFixed(1)}% is below the required ${minimum.toFixed(1)}%`,
        location: null,
      })
      recommendations.push(
        recommendation(
          'high',
          'Test Coverage',
          `Increase test coverage by ${gap.toFixed(1)}% to meet the ${minimum.toFixed(1)}% requirement`
        )
      )
    }

    const lowFiles = (report.files ?? [])
      .filter((f) => f.percentage < minimum)
      .sort((a, b) => a.percentage - b.percentage)
    for (const file of lowFiles) {
      recommendations.push(
        recommendation(
          'medium',
          'Test Coverage',
          `Add tests for ${file.path} (${file.percentage.toFixed(1)}%)`
        )
      )
    }

    return {
      passed,
      passedWithWarnings: false,
      issues,
      metrics: {
        coverage_percentage: measured,
        min_percentage: minimum,
        gap_to_target: gap,
        files_below_minimum: lowFiles.length,
      },
      recommendations,
      details: {
        within_grace: !passed && gap <= GRACE_POINTS,
      },
    }
  },
}
