/**
 * Unit tests for GateRegistry.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
  CheckerAlreadyRegisteredError,
  CheckerNotRegisteredError,
  RegistryFrozenError,
  RegistryIncompleteError,
} from '../../../core/errors.js'
import { GateRegistry } from '../gate-registry.js'
import type { GateChecker } from '../types.js'
import { passingChecker } from './fixtures.js'

describe('GateRegistry', () => {
  let registry: GateRegistry
  let lint: GateChecker<'lint'>

  beforeEach(() => {
    registry = new GateRegistry()
    lint = passingChecker('lint')
  })

  it('looks up a registered checker', () => {
    registry.register('lint', lint)
    expect(registry.lookup('lint')).toBe(lint)
    expect(registry.has('lint')).toBe(true)
    expect(registry.registeredTypes).toEqual(['lint'])
  })

  it('throws CheckerNotRegisteredError for an unknown type', () => {
    expect(() => registry.lookup('coverage')).toThrow(CheckerNotRegisteredError)
  })

  it('refuses to register a type twice', () => {
    registry.register('lint', lint)
    expect(() => registry.register('lint', passingChecker('lint'))).toThrow(
      CheckerAlreadyRegisteredError
    )
  })

  it('refuses registration after freeze', () => {
    registry.freeze()
    expect(registry.isFrozen).toBe(true)
    expect(() => registry.register('lint', lint)).toThrow(RegistryFrozenError)
  })

  it('lists every missing type, sorted and deduplicated', () => {
    registry.register('lint', lint)

    try {
      registry.assertCovers(['type_check', 'lint', 'coverage', 'coverage'])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(RegistryIncompleteError)
      if (err instanceof RegistryIncompleteError) {
        expect(err.context['missing']).toEqual(['coverage', 'type_check'])
      }
    }
  })

  it('accepts a covered set', () => {
    registry.register('lint', lint)
    expect(() => registry.assertCovers(['lint'])).not.toThrow()
    expect(() => registry.assertCovers([])).not.toThrow()
  })
})
