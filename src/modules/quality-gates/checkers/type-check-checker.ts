/**
 * Type-check checker: evaluates compiler diagnostics.
 *
 * Type errors always fail the gate. Implicit-any diagnostics fail it only in
 * strict mode; otherwise they are reported as low-severity warnings.
 */

import { z } from 'zod'
import type { GateIssue } from '../../../core/types.js'
import type { GateChecker, GateResult } from '../types.js'
import { formatLocation, parseArtifact, parseThresholds, recommendation } from './shared.js'

const TypeCheckThresholdsSchema = z
  .object({
    strict_mode: z.boolean(),
  })
  .passthrough()

const TypeCheckArtifactSchema = z.object({
  diagnostics: z.array(
    z.object({
      kind: z.enum(['error', 'implicit_any']),
      message: z.string(),
      code: z.string().optional(),
      file: z.string().optional(),
      line: z.number().int().optional(),
      column: z.number().int().optional(),
    })
  ),
})

export type TypeCheckArtifact = z.infer<typeof TypeCheckArtifactSchema>

export const typeCheckChecker: GateChecker<'type_check'> = {
  gateType: 'type_check',
  description: 'Fails on type errors, and on implicit any in strict mode',

  evaluate(artifact, thresholds): GateResult {
    const { strict_mode: strict } = parseThresholds(
      'type_check',
      TypeCheckThresholdsSchema,
      thresholds
    )
    const { diagnostics } = parseArtifact('type_check', TypeCheckArtifactSchema, artifact)

    let typeErrors = 0
    let implicitAny = 0
    const issues = diagnostics.map((d): GateIssue => {
      if (d.kind === 'error') {
        typeErrors++
      } else {
        implicitAny++
      }
      return {
        severity: d.kind === 'error' ? 'high' : strict ? 'medium' : 'low',
        message: d.message,
        location: formatLocation(d.file, d.line, d.column),
        ...(d.code !== undefined ? { rule: d.code } : {}),
      }
    })

    const passed = typeErrors === 0 && (!strict || implicitAny === 0)

    const recommendations: string[] = []
    if (typeErrors > 0) {
      recommendations.push(
        recommendation('high', 'Type Checking', `Resolve ${String(typeErrors)} type error(s)`)
      )
    }
    if (implicitAny > 0) {
      recommendations.push(
        recommendation(
          strict ? 'medium' : 'low',
          'Type Checking',
          `Add explicit types for ${String(implicitAny)} implicit any location(s)`
        )
      )
    }

    return {
      passed,
      passedWithWarnings: passed && !strict && implicitAny > 0,
      issues,
      metrics: {
        type_errors: typeErrors,
        implicit_any: implicitAny,
      },
      recommendations,
      details: {
        strict_mode: strict,
      },
    }
  },
}
