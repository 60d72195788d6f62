/**
 * Lint checker: evaluates the error/warning totals reported by a linter.
 *
 * Pass: errors == 0 AND (fail_on_warning == false OR warnings == 0)
 *       AND warnings <= max_warnings
 *
 * Lint errors are reported as critical issues, warnings as high.
 */

import { z } from 'zod'
import type { GateIssue } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { formatLocation, parseArtifact, parseThresholds, recommendation } from './shared.js'

const LintThresholdsSchema = z
  .object({
    fail_on_warning: z.boolean(),
    max_warnings: z.number().int().min(0),
    /** Errors always fail the gate; the key is accepted for compatibility */
    fail_on_error: z.boolean().optional(),
  })
  .passthrough()

const LintFindingSchema = z.object({
  severity: z.enum(['error', 'warning']),
  message: z.string(),
  file: z.string().optional(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  rule: z.string().optional(),
})

const LintArtifactSchema = z.object({
  errors: z.number().int().min(0),
  warnings: z.number().int().min(0),
  findings: z.array(LintFindingSchema).optional(),
})

export type LintArtifact = z.infer<typeof LintArtifactSchema>

export const lintChecker: GateChecker<'lint'> = {
  gateType: 'lint',
  description: 'Fails on lint errors and on warnings beyond the configured policy',

  evaluate(artifact, thresholds): GateResult {
    const config = parseThresholds('lint', LintThresholdsSchema, thresholds)
    const report = parseArtifact('lint', LintArtifactSchema, artifact)

    const { errors, warnings } = report
    const warningsBlocked = config.fail_on_warning && warnings > 0
    const overLimit = warnings > config.max_warnings
    const passed = errors === 0 && !warningsBlocked && !overLimit

    const issues = (report.findings ?? []).map((f): GateIssue => ({
      severity: f.severity === 'error' ? 'critical' : 'high',
      message: f.message,
      location: formatLocation(f.file, f.line, f.column),
      ...(f.rule !== undefined ? { rule: f.rule } : {}),
    }))

    const recommendations: string[] = []
    if (errors > 0) {
      recommendations.push(
        recommendation('critical', 'Linting', `Fix ${String(errors)} lint error(s) before merging`)
      )
    }
    if (overLimit) {
      recommendations.push(
        recommendation(
          'high',
          'Linting',
          `Reduce warnings from ${String(warnings)} to at most ${String(config.max_warnings)}`
        )
      )
    } else if (warnings > 0) {
      recommendations.push(
        recommendation('medium', 'Linting', `Address ${String(warnings)} remaining lint warning(s)`)
      )
    }

    return {
      passed,
      passedWithWarnings: passed && warnings > 0,
      issues,
      metrics: {
        errors,
        warnings,
        max_warnings: config.max_warnings,
      },
      recommendations,
      details: {
        fail_on_warning: config.fail_on_warning,
        warnings_blocked: warningsBlocked,
        over_warning_limit: overLimit,
      },
    }
  },
}
