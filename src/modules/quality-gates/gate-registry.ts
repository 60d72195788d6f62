/**
 * Gate Registry: maps each gate type to the checker that evaluates it.
 *
 * Populated once during startup, then frozen. Lookups after that point are
 * read-only, so concurrent runs can share one registry.
 */

import type { GateType } from '../../core/types.js'
import {
  CheckerAlreadyRegisteredError,
  CheckerNotRegisteredError,
  RegistryFrozenError,
  RegistryIncompleteError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { GateChecker } from './types.js'

const logger = createLogger('quality-gates:registry')

export class GateRegistry {
  private readonly _checkers: Map<GateType, GateChecker> = new Map()
  private _frozen = false

  /**
   * Register the checker for a gate type.
   *
   * @throws {RegistryFrozenError} after freeze()
   * @throws {CheckerAlreadyRegisteredError} if the type already has a checker
   */
  register<T extends GateType>(gateType: T, checker: GateChecker<T>): void {
    if (this._frozen) {
      throw new RegistryFrozenError(gateType)
    }
    if (this._checkers.has(gateType)) {
      throw new CheckerAlreadyRegisteredError(gateType)
    }
    this._checkers.set(gateType, checker)
    logger.debug({ gateType }, 'Checker registered')
  }

  /**
   * @throws {CheckerNotRegisteredError}
   */
  lookup(gateType: GateType): GateChecker {
    const checker = this._checkers.get(gateType)
    if (checker === undefined) {
      throw new CheckerNotRegisteredError(gateType)
    }
    return checker
  }

  has(gateType: GateType): boolean {
    return this._checkers.has(gateType)
  }

  get registeredTypes(): GateType[] {
    return Array.from(this._checkers.keys())
  }

  get isFrozen(): boolean {
    return this._frozen
  }

  freeze(): void {
    this._frozen = true
  }

  /**
   * Fail unless every given gate type has a checker.
   *
   * @throws {RegistryIncompleteError} listing every missing type
   */
  assertCovers(gateTypes: Iterable<GateType>): void {
    const missing = [...new Set(gateTypes)].filter((t) => !this._checkers.has(t)).sort()
    if (missing.length > 0) {
      throw new RegistryIncompleteError(missing)
    }
  }
}
