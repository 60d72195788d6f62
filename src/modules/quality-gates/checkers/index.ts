/**
 * Built-in checkers, one per gate type.
 */

import { GATE_TYPES } from '../../../core/types.js'
import type { GateRegistry } from '../gate-registry.js'
import type { CheckerMap } from '../types.js'
import { complexityChecker } from './complexity-checker.js'
import { contractChecker } from './contract-checker.js'
import { coverageChecker } from './coverage-checker.js'
import { lintChecker } from './lint-checker.js'
import { performanceChecker } from './performance-checker.js'
import { securityChecker } from './security-checker.js'
import { typeCheckChecker } from './type-check-checker.js'

export const BUILT_IN_CHECKERS: CheckerMap = {
  lint: lintChecker,
  coverage: coverageChecker,
  security: securityChecker,
  performance: performanceChecker,
  contract: contractChecker,
  complexity: complexityChecker,
  type_check: typeCheckChecker,
}

/**
 * Register every built-in checker that the registry does not already have,
 * so custom checkers registered first take precedence.
 */
export function registerBuiltInCheckers(registry: GateRegistry): void {
  for (const gateType of GATE_TYPES) {
    if (!registry.has(gateType)) {
      registry.register(gateType, BUILT_IN_CHECKERS[gateType])
    }
  }
}

export {
  complexityChecker,
  contractChecker,
  coverageChecker,
  lintChecker,
  performanceChecker,
  securityChecker,
  typeCheckChecker,
}
export { recommendation, formatLocation } from './shared.js'
