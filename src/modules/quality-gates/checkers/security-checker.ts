/**
 * Security checker: evaluates a dependency vulnerability audit.
 *
 * Pass: no critical vulnerability AND (critical_only OR no vulnerability at all).
 * Vulnerabilities in dev-only dependencies are ignored unless
 * `allow_dev_dependencies` is explicitly false.
 */

import { z } from 'zod'
import type { GateIssue, IssueSeverity } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { parseArtifact, parseThresholds, recommendation } from './shared.js'

const SecurityThresholdsSchema = z
  .object({
    critical_only: z.boolean(),
    allow_dev_dependencies: z.boolean().optional(),
  })
  .passthrough()

const VulnerabilitySchema = z.object({
  id: z.string(),
  package: z.string(),
  // npm audit reports "moderate" where other scanners say "medium"
  severity: z
    .enum(['critical', 'high', 'medium', 'moderate', 'low'])
    .transform((s): IssueSeverity => (s === 'moderate' ? 'medium' : s)),
  title: z.string(),
  dev_only: z.boolean().optional(),
  fixed_in: z.string().optional(),
})

const SecurityArtifactSchema = z.object({
  vulnerabilities: z.array(VulnerabilitySchema),
})

export type SecurityArtifact = z.input<typeof SecurityArtifactSchema>

export const securityChecker: GateChecker<'security'> = {
  gateType: 'security',
  description: 'Blocks on known vulnerabilities in dependencies',

  evaluate(artifact, thresholds): GateResult {
    const config = parseThresholds('security', SecurityThresholdsSchema, thresholds)
    const report = parseArtifact('security', SecurityArtifactSchema, artifact)

    const includeDev = config.allow_dev_dependencies === false
    const counted = report.vulnerabilities.filter((v) => includeDev || v.dev_only !== true)
    const ignoredDev = report.vulnerabilities.length - counted.length

    const bySeverity: Record<IssueSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0 }
    for (const v of counted) {
      bySeverity[v.severity]++
    }

    const passed = bySeverity.critical === 0 && (config.critical_only || counted.length === 0)

    const issues = counted.map(
      (v): GateIssue => ({
        severity: v.severity,
        message: `${v.package}: ${v.title} (${v.id})`,
        location: v.package,
        rule: v.id,
      })
    )

    const recommendations: string[] = []
    for (const v of counted) {
      if (v.fixed_in === undefined) continue
      recommendations.push(
        recommendation(v.severity, 'Security', `Upgrade ${v.package} to ${v.fixed_in} to fix ${v.id}`)
      )
    }
    const unfixable = counted.filter((v) => v.fixed_in === undefined && v.severity === 'critical')
    if (unfixable.length > 0) {
      recommendations.push(
        recommendation(
          'critical',
          'Security',
          `Replace or remove ${unfixable.map((v) => v.package).join(', ')}: no fixed release is available`
        )
      )
    }

    return {
      passed,
      passedWithWarnings: passed && counted.length > 0,
      issues,
      metrics: {
        total_vulnerabilities: counted.length,
        critical: bySeverity.critical,
        high: bySeverity.high,
        medium: bySeverity.medium,
        low: bySeverity.low,
        ignored_dev_only: ignoredDev,
      },
      recommendations,
      details: {
        critical_only: config.critical_only,
        dev_dependencies_included: includeDev,
      },
    }
  },
}
