/**
 * Complexity checker: bounds the worst cyclomatic and cognitive complexity
 * of any function in the analysed code.
 */

import { z } from 'zod'
import type { GateIssue, IssueSeverity } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { formatLocation, parseArtifact, parseThresholds, recommendation } from './shared.js'

const ComplexityThresholdsSchema = z
  .object({
    max_cyclomatic: z.number().int().positive(),
    max_cognitive: z.number().int().positive(),
  })
  .passthrough()

const ComplexityArtifactSchema = z.object({
  functions: z.array(
    z.object({
      name: z.string(),
      file: z.string(),
      line: z.number().int().optional(),
      cyclomatic: z.number().int().min(0),
      cognitive: z.number().int().min(0),
    })
  ),
})

export type ComplexityArtifact = z.infer<typeof ComplexityArtifactSchema>

/** Exceeding a limit by more than this factor raises the issue to high */
const HIGH_SEVERITY_FACTOR = 2

function severityFor(value: number, limit: number): IssueSeverity {
  return value > limit * HIGH_SEVERITY_FACTOR ? 'high' : 'medium'
}

export const complexityChecker: GateChecker<'complexity'> = {
  gateType: 'complexity',
  description: 'Limits cyclomatic and cognitive complexity per function',

  evaluate(artifact, thresholds): GateResult {
    const config = parseThresholds('complexity', ComplexityThresholdsSchema, thresholds)
    const { functions } = parseArtifact('complexity', ComplexityArtifactSchema, artifact)

    return evaluateFunctions(functions, config.max_cyclomatic, config.max_cognitive)
  },
}

function evaluateFunctions(
  functions: ComplexityArtifact['functions'],
  maxCyclomatic: number,
  maxCognitive: number
): GateResult {
  let worstCyclomatic = 0
  let worstCognitive = 0
  const issues: GateIssue[] = []
  const offenders = new Set<string>()

  for (const fn of functions) {
    worstCyclomatic = Math.max(worstCyclomatic, fn.cyclomatic)
    worstCognitive = Math.max(worstCognitive, fn.cognitive)
    const location = formatLocation(fn.file, fn.line)

    if (fn.cyclomatic > maxCyclomatic) {
      issues.push({
        severity: severityFor(fn.cyclomatic, maxCyclomatic),
        message: `${fn.name} has cyclomatic complexity ${String(fn.cyclomatic)} (max ${String(maxCyclomatic)})`,
        location,
        rule: 'max_cyclomatic',
      })
      offenders.add(fn.name)
    }
    if (fn.cognitive > maxCognitive) {
      issues.push({
        severity: severityFor(fn.cognitive, maxCognitive),
        message: `${fn.name} has cognitive complexity ${String(fn.cognitive)} (max ${String(maxCognitive)})`,
        location,
        rule: 'max_cognitive',
      })
      offenders.add(fn.name)
    }
  }

  const passed = worstCyclomatic <= maxCyclomatic && worstCognitive <= maxCognitive
  const recommendations =
    offenders.size > 0
      ? [
          recommendation(
            'medium',
            'Complexity',
            `Split ${[...offenders].join(', ')} into smaller functions`
          ),
        ]
      : []

  return {
    passed,
    passedWithWarnings: false,
    issues,
    metrics: {
      functions_analyzed: functions.length,
      max_cyclomatic: worstCyclomatic,
      max_cognitive: worstCognitive,
      functions_over_limit: offenders.size,
    },
    recommendations,
    details: {
      cyclomatic_limit: maxCyclomatic,
      cognitive_limit: maxCognitive,
    },
  }
}
