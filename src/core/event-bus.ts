/**
 * TypedEventBus: typed internal pub/sub for job and round notifications.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is synchronous; handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - EventBus does not depend on any module.
 */

import { EventEmitter } from 'node:events'
import type { DeliberationEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `DeliberationEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous; all registered handlers run before emit() returns.
   */
  emit<K extends keyof DeliberationEvents>(event: K, payload: DeliberationEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof DeliberationEvents>(
    event: K,
    handler: (payload: DeliberationEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof DeliberationEvents>(
    event: K,
    handler: (payload: DeliberationEvents[K]) => void
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
 * bus.on('job:progress', ({ jobId, round }) => {
 *   console.log(`Job ${jobId} entered round ${round}`)
 * })
 * bus.emit('job:progress', { jobId: 'dlb-1', round: 1, message: 'Running independent analysis...' })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof DeliberationEvents>(event: K, payload: DeliberationEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof DeliberationEvents>(
    event: K,
    handler: (payload: DeliberationEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof DeliberationEvents>(
    event: K,
    handler: (payload: DeliberationEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
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
