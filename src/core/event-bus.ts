/**
 * TypedEventBus — typed internal pub/sub between the collection pipeline and its observers.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 */

import { EventEmitter } from 'node:events'
import type { CollectionEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `CollectionEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof CollectionEvents>(event: K, payload: CollectionEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof CollectionEvents>(
    event: K,
    handler: (payload: CollectionEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof CollectionEvents>(
    event: K,
    handler: (payload: CollectionEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('pair:failed', ({ failure }) => {
 *   console.log(`${failure.resourceGroup} failed: ${failure.kind}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
  }

  emit<K extends keyof CollectionEvents>(event: K, payload: CollectionEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof CollectionEvents>(
    event: K,
    handler: (payload: CollectionEvents[K]) => void
  ): void {
    // EventEmitter passes arguments as rest params; cast to satisfy TypeScript
    this._emitter.on(event, handler as (arg: unknown) => void)
  }

  off<K extends keyof CollectionEvents>(
    event: K,
    handler: (payload: CollectionEvents[K]) => void
  ): void {
    this._emitter.off(event, handler as (arg: unknown) => void)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
