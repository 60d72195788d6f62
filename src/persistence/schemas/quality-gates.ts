/**
 * Zod schemas for the quality gate persistence layer: inputs accepted by
 * the store and the JSON documents stored in TEXT columns.
 */

import { z } from 'zod'
import { GATE_TYPES } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const GateTypeEnum = z.enum(GATE_TYPES)

export const GateStatusEnum = z.enum([
  'pending',
  'running',
  'passed',
  'failed',
  'warning',
  'skipped',
  'error',
  'timeout',
])

export const IssueSeverityEnum = z.enum(['critical', 'high', 'medium', 'low'])

// ---------------------------------------------------------------------------
// JSON columns
// ---------------------------------------------------------------------------

export const ThresholdConfigJson = z.record(z.unknown())

export const GateIssueJson = z.object({
  severity: IssueSeverityEnum,
  message: z.string(),
  location: z.string().nullable(),
  rule: z.string().optional(),
})

export const GateIssueListJson = z.array(GateIssueJson)

export const MetricsJson = z.record(z.number())

export const RecommendationsJson = z.array(z.string())

export const ResultDetailsJson = z.record(z.unknown())

// ---------------------------------------------------------------------------
// Store inputs
// ---------------------------------------------------------------------------

export const CreateGateConfigInputSchema = z.object({
  workspaceId: z.string().min(1),
  projectId: z.string().min(1),
  gateType: GateTypeEnum,
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  isEnabled: z.boolean().default(true),
  isBlocking: z.boolean().default(true),
  thresholdConfig: ThresholdConfigJson.default({}),
  timeoutMs: z.number().int().positive().nullable().optional(),
})

/** Accepted by createGateConfig; defaults are applied on parse */
export type CreateGateConfigInput = z.input<typeof CreateGateConfigInputSchema>

export const UpdateGateConfigInputSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullable(),
    isEnabled: z.boolean(),
    isBlocking: z.boolean(),
    thresholdConfig: ThresholdConfigJson,
    timeoutMs: z.number().int().positive().nullable(),
  })
  .partial()
  .strict()

export type UpdateGateConfigInput = z.infer<typeof UpdateGateConfigInputSchema>
