/**
 * TypedEventBus: typed internal pub/sub for gate run progress.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - Event names and payloads are checked against `QualityGateEvents` at compile time.
 *  - The bus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { QualityGateEvents } from './event-bus.types.js'

export type QualityGateEventName = keyof QualityGateEvents & string

export type QualityGateEventHandler<K extends QualityGateEventName> = (
  payload: QualityGateEvents[K]
) => void

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  /** Emit an event. All registered handlers run before emit() returns. */
  emit<K extends QualityGateEventName>(event: K, payload: QualityGateEvents[K]): void

  on<K extends QualityGateEventName>(event: K, handler: QualityGateEventHandler<K>): void

  /** Unsubscribe a handler. A handler that was never registered is ignored. */
  off<K extends QualityGateEventName>(event: K, handler: QualityGateEventHandler<K>): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('gate:execution:updated', ({ execution }) => {
 *   console.log(`${execution.gateType} is ${execution.status}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // One listener per CLI reporter and engine subscriber is the norm; allow headroom
    this._emitter.setMaxListeners(50)
  }

  emit<K extends QualityGateEventName>(event: K, payload: QualityGateEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends QualityGateEventName>(event: K, handler: QualityGateEventHandler<K>): void {
    this._emitter.on(event, handler)
  }

  off<K extends QualityGateEventName>(event: K, handler: QualityGateEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
