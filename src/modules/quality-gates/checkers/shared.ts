/**
 * Helpers shared by the built-in checkers: threshold and artifact parsing
 * with zod, recommendation formatting, issue locations.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { ArtifactError, ConfigError } from '../../../core/errors.js'
import type { GateType, IssueSeverity, ThresholdConfig } from '../../../core/types.js'

export type RecommendationPriority = IssueSeverity

/**
 * Format a recommendation as `[PRIORITY] Area: suggestion`.
 */
export function recommendation(
  priority: RecommendationPriority,
  area: string,
  suggestion: string
): string {
  return `[${priority.toUpperCase()}] ${area}: ${suggestion}`
}

/**
 * Parse a threshold config. Keys the schema does not list pass through untouched.
 *
 * @throws {ConfigError} with `context.key` set to the first offending key
 */
export function parseThresholds<T>(
  gateType: GateType,
  schema: ZodType<T, ZodTypeDef, unknown>,
  thresholds: ThresholdConfig
): T {
  const result = schema.safeParse(thresholds)
  if (result.success) {
    return result.data
  }
  const first = result.error.issues[0]
  const key = first !== undefined && first.path.length > 0 ? first.path.join('.') : '(root)'
  const detail = first?.message ?? result.error.message
  throw new ConfigError(`Invalid threshold config for ${gateType} gate: ${key}: ${detail}`, {
    gateType,
    key,
  })
}

/**
 * Parse an artifact into the shape a checker reads.
 *
 * @throws {ArtifactError} naming the first offending path
 */
export function parseArtifact<T>(
  gateType: GateType,
  schema: ZodType<T, ZodTypeDef, unknown>,
  artifact: unknown
): T {
  const result = schema.safeParse(artifact)
  if (result.success) {
    return result.data
  }
  const first = result.error.issues[0]
  const path = first !== undefined && first.path.length > 0 ? first.path.join('.') : '(root)'
  const detail = first?.message ?? result.error.message
  throw new ArtifactError(`Malformed ${gateType} artifact: ${path}: ${detail}`, {
    gateType,
    path,
  })
}

/** `file:line:column`, omitting the parts that are unknown */
export function formatLocation(
  file: string | undefined,
  line?: number,
  column?: number
): string | null {
  if (file === undefined) return null
  if (line === undefined) return file
  if (column === undefined) return `${file}:${String(line)}`
  return `${file}:${String(line)}:${String(column)}`
}
