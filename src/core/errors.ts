/**
 * Error definitions for qualitygate
 * Provides the structured error hierarchy used by the engine, checkers and stores
 */

import type { GateExecution } from './types.js'

/** Base error class for all qualitygate errors */
export class QualityGateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'QualityGateError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QualityGateError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * For threshold configs, `context.key` names the offending key.
 */
export class ConfigError extends QualityGateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when an artifact does not have the shape its checker expects */
export class ArtifactError extends QualityGateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ARTIFACT_ERROR', context)
    this.name = 'ArtifactError'
  }
}

/** Error thrown when no checker is registered for a gate type */
export class CheckerNotRegisteredError extends QualityGateError {
  constructor(gateType: string) {
    super(`No checker registered for gate type "${gateType}"`, 'CHECKER_NOT_REGISTERED', {
      gateType,
    })
    this.name = 'CheckerNotRegisteredError'
  }
}

/** Error thrown when a gate type is registered twice */
export class CheckerAlreadyRegisteredError extends QualityGateError {
  constructor(gateType: string) {
    super(`A checker is already registered for gate type "${gateType}"`, 'CHECKER_ALREADY_REGISTERED', {
      gateType,
    })
    this.name = 'CheckerAlreadyRegisteredError'
  }
}

/** Error thrown when the registry is mutated after startup */
export class RegistryFrozenError extends QualityGateError {
  constructor(gateType: string) {
    super(
      `Cannot register checker for "${gateType}": the gate registry is frozen after startup`,
      'REGISTRY_FROZEN',
      { gateType }
    )
    this.name = 'RegistryFrozenError'
  }
}

/** Error thrown at startup when configured gate types have no checker */
export class RegistryIncompleteError extends QualityGateError {
  constructor(missing: string[]) {
    super(
      `No checker registered for configured gate type(s): ${missing.join(', ')}`,
      'REGISTRY_INCOMPLETE',
      { missing }
    )
    this.name = 'RegistryIncompleteError'
  }
}

/** Error thrown when a checker exceeds its per-gate timeout */
export class EvaluationTimeoutError extends QualityGateError {
  constructor(gateType: string, timeoutMs: number) {
    super(
      `Evaluation of ${gateType} gate timed out after ${String(timeoutMs)}ms`,
      'EVALUATION_TIMEOUT',
      { gateType, timeoutMs }
    )
    this.name = 'EvaluationTimeoutError'
  }
}

/** Wraps anything a checker throws that is not already a QualityGateError */
export class CheckerRuntimeError extends QualityGateError {
  constructor(gateType: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Checker for ${gateType} gate failed: ${detail}`, 'CHECKER_RUNTIME_ERROR', {
      gateType,
      cause: detail,
    })
    this.name = 'CheckerRuntimeError'
  }
}

/** Error thrown when a gate config id does not exist */
export class GateNotFoundError extends QualityGateError {
  constructor(gateId: string) {
    super(`Quality gate "${gateId}" not found`, 'GATE_NOT_FOUND', { gateId })
    this.name = 'GateNotFoundError'
  }
}

/** Error thrown when a stored row cannot be decoded into its domain type */
export class StoreDecodeError extends QualityGateError {
  constructor(table: string, column: string, detail: string) {
    super(`Cannot decode ${table}.${column}: ${detail}`, 'STORE_DECODE_ERROR', { table, column })
    this.name = 'StoreDecodeError'
  }
}

/** Error thrown on an illegal gate execution status transition */
export class GateStateError extends QualityGateError {
  constructor(executionId: string, from: string, to: string) {
    super(
      `Illegal status transition for execution ${executionId}: ${from} -> ${to}`,
      'GATE_STATE_ERROR',
      { executionId, from, to }
    )
    this.name = 'GateStateError'
  }
}

/**
 * Error thrown when a collaborator the engine depends on (config store,
 * artifact provider) is unavailable.
 *
 * `executions` carries every execution of the affected run whose terminal
 * record was saved (and so counted), apart from the gates the fault itself
 * cut short.
 */
export class GateEnvironmentError extends QualityGateError {
  public readonly executions: readonly GateExecution[]

  constructor(
    message: string,
    context: Record<string, unknown> = {},
    executions: readonly GateExecution[] = []
  ) {
    super(message, 'GATE_ENVIRONMENT_ERROR', context)
    this.name = 'GateEnvironmentError'
    this.executions = executions
  }
}
