/**
 * Zod validation schemas for the qualitygate configuration.
 */

import { z } from 'zod'

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const QualityGateConfigSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Timeout for gates without their own timeout_ms */
    default_timeout_ms: z.number().int().min(1),
    /** Gates of one run evaluated at the same time */
    max_parallel_gates: z.number().int().min(1).max(64),
    /** SQLite file holding gate configs and execution history */
    database_path: z.string().min(1),
    /** Directory the CLI reads `<gate_type>.json` artifacts from */
    artifacts_dir: z.string().min(1),
  })
  .strict()

export type QualityGateConfig = z.infer<typeof QualityGateConfigSchema>

export const PartialQualityGateConfigSchema = QualityGateConfigSchema.partial()
export type PartialQualityGateConfig = z.infer<typeof PartialQualityGateConfigSchema>
