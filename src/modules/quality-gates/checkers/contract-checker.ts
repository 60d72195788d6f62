/**
 * Contract checker: validates recorded API responses against the JSON
 * schemas and status codes declared for each endpoint.
 *
 * Every violation (missing response, unexpected status, schema error) is a
 * high-severity issue; the gate passes only when there are none.
 */

import ajvModule from 'ajv'
import type { ErrorObject, ValidateFunction } from 'ajv'
import { z } from 'zod'
import { ConfigError } from '../../../core/errors.js'
import type { GateIssue } from '../../../core/types.js'
import { errorMessage } from '../../../utils/helpers.js'
import type { GateChecker, GateResult } from '../types.js'
import { parseArtifact, parseThresholds, recommendation } from './shared.js'

// ajv is published as CommonJS; its class sits on the default export
const Ajv = ajvModule.default

const EndpointSchema = z
  .object({
    method: z.string().min(1),
    path: z.string().min(1),
    response_schema: z.record(z.unknown()).optional(),
    expected_status: z.number().int().min(100).max(599).optional(),
  })
  .passthrough()

const ContractThresholdsSchema = z
  .object({
    endpoints: z.array(EndpointSchema),
  })
  .passthrough()

const ContractArtifactSchema = z.object({
  responses: z.array(
    z.object({
      method: z.string(),
      path: z.string(),
      status: z.number().int(),
      body: z.unknown(),
    })
  ),
})

export type ContractArtifact = z.infer<typeof ContractArtifactSchema>

type AjvInstance = InstanceType<typeof Ajv>

function compileResponseSchema(
  ajv: AjvInstance,
  schema: Record<string, unknown>,
  index: number
): ValidateFunction {
  const key = `endpoints.${String(index)}.response_schema`
  try {
    return ajv.compile(schema)
  } catch (err) {
    throw new ConfigError(
      `Invalid threshold config for contract gate: ${key}: ${errorMessage(err)}`,
      { gateType: 'contract', key }
    )
  }
}

function describeSchemaError(err: ErrorObject): string {
  return err.message ?? err.keyword
}

export const contractChecker: GateChecker<'contract'> = {
  gateType: 'contract',
  description: 'Validates API responses against declared schemas and status codes',

  evaluate(artifact, thresholds): GateResult {
    const { endpoints } = parseThresholds('contract', ContractThresholdsSchema, thresholds)
    const { responses } = parseArtifact('contract', ContractArtifactSchema, artifact)

    // A fresh instance per call keeps compiled schemas from leaking between evaluations
    const ajv = new Ajv({ allErrors: true, strict: false })

    const issues: GateIssue[] = []
    const failedEndpoints: string[] = []

    endpoints.forEach((endpoint, index) => {
      const method = endpoint.method.toUpperCase()
      const label = `${method} ${endpoint.path}`
      const before = issues.length

      const response = responses.find(
        (r) => r.method.toUpperCase() === method && r.path === endpoint.path
      )

      if (response === undefined) {
        issues.push({
          severity: 'high',
          message: `No response recorded for ${label}`,
          location: label,
          rule: 'response_present',
        })
      } else {
        if (endpoint.expected_status !== undefined && response.status !== endpoint.expected_status) {
          issues.push({
            severity: 'high',
            message: `Expected status ${String(endpoint.expected_status)}, got ${String(response.status)}`,
            location: label,
            rule: 'expected_status',
          })
        }

        if (endpoint.response_schema !== undefined) {
          const validate = compileResponseSchema(ajv, endpoint.response_schema, index)
          if (!validate(response.body)) {
            for (const schemaError of validate.errors ?? []) {
              issues.push({
                severity: 'high',
                message: `Response body ${schemaError.instancePath || '(root)'} ${describeSchemaError(schemaError)}`,
                location: `${label}${schemaError.instancePath}`,
                rule: schemaError.keyword,
              })
            }
          }
        }
      }

      if (issues.length > before) {
        failedEndpoints.push(label)
      }
    })

    const recommendations = failedEndpoints.map((label) =>
      recommendation('high', 'API Contract', `Align ${label} with its declared contract`)
    )

    return {
      passed: issues.length === 0,
      passedWithWarnings: false,
      issues,
      metrics: {
        endpoints_total: endpoints.length,
        endpoints_passed: endpoints.length - failedEndpoints.length,
        endpoints_failed: failedEndpoints.length,
        violations: issues.length,
      },
      recommendations,
      details: {
        failed_endpoints: failedEndpoints,
      },
    }
  },
}
