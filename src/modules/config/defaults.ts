/**
 * Built-in defaults: engine configuration and the default gate set a project
 * is seeded with.
 *
 * Engine defaults are the lowest priority; they are overridden by:
 *   config file → environment variables → explicit overrides
 */

import type { GateType, ThresholdConfig } from '../../core/types.js'
import type { QualityGateConfig } from './config-schema.js'

export const DEFAULT_CONFIG: QualityGateConfig = {
  log_level: 'warn',
  default_timeout_ms: 300_000,
  max_parallel_gates: 4,
  database_path: '.qualitygate/state.db',
  artifacts_dir: '.qualitygate/artifacts',
}

export interface DefaultGateDefinition {
  gateType: GateType
  name: string
  description: string
  isBlocking: boolean
  thresholdConfig: ThresholdConfig
}

/** The gate set created by `seedDefaultGates`, one per gate type */
export const DEFAULT_GATE_CONFIGS: readonly DefaultGateDefinition[] = [
  {
    gateType: 'lint',
    name: 'Code Linting',
    description: 'Static analysis for code quality and style',
    isBlocking: true,
    thresholdConfig: { fail_on_error: true, fail_on_warning: false, max_warnings: 10 },
  },
  {
    gateType: 'coverage',
    name: 'Test Coverage',
    description: 'Minimum test coverage requirement',
    isBlocking: true,
    thresholdConfig: { min_percentage: 80 },
  },
  {
    gateType: 'security',
    name: 'Security Audit',
    description: 'Dependency vulnerability scan',
    isBlocking: true,
    thresholdConfig: { allow_dev_dependencies: false, critical_only: false },
  },
  {
    gateType: 'performance',
    name: 'Performance Tests',
    description: 'Response time and throughput bounds',
    isBlocking: false,
    thresholdConfig: { max_response_time_ms: 500, min_throughput_rps: 100 },
  },
  {
    gateType: 'contract',
    name: 'API Contract',
    description: 'API responses match their declared contracts',
    isBlocking: true,
    thresholdConfig: { endpoints: [], validation: {} },
  },
  {
    gateType: 'complexity',
    name: 'Code Complexity',
    description: 'Cyclomatic and cognitive complexity limits',
    isBlocking: false,
    thresholdConfig: { max_cyclomatic: 10, max_cognitive: 15 },
  },
  {
    gateType: 'type_check',
    name: 'Type Checking',
    description: 'Static type checking',
    isBlocking: true,
    thresholdConfig: { strict_mode: false },
  },
]
