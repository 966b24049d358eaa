/**
 * Unit tests for TypedEventBus.
 *
 * Covers:
 *  - Emit/subscribe with the correct payload
 *  - Unsubscribe removes handler
 *  - Multiple handlers for the same event all invoked, in order
 *  - Dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { CollectionEvents } from '../event-bus.types.js'

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = vi.fn<(payload: CollectionEvents['pipeline:pacing']) => void>()
    bus.on('pipeline:pacing', handler)

    bus.emit('pipeline:pacing', { delayMs: 1000 })

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith({ delayMs: 1000 })
  })

  it('does not invoke handler for a different event', () => {
    const handler = vi.fn<(payload: CollectionEvents['pipeline:pacing']) => void>()
    bus.on('pipeline:pacing', handler)

    bus.emit('pipeline:complete', { rowCount: 1, failureCount: 0, durationMs: 5 })

    expect(handler).not.toHaveBeenCalled()
  })

  it('stops invoking a handler after off()', () => {
    const handler = vi.fn<(payload: CollectionEvents['pair:failed']) => void>()
    const payload: CollectionEvents['pair:failed'] = {
      failure: { subscriptionId: 'sub-1', resourceGroup: 'rg-x', kind: 'FatalError', message: 'HTTP 404' },
    }
    bus.on('pair:failed', handler)
    bus.emit('pair:failed', payload)
    bus.off('pair:failed', handler)
    bus.emit('pair:failed', payload)

    expect(handler).toHaveBeenCalledTimes(1)
  })

  it('treats off() for an unknown handler as a no-op', () => {
    expect(() => {
      bus.off('pipeline:pacing', () => {})
    }).not.toThrow()
  })

  it('invokes every handler in registration order', () => {
    const calls: string[] = []
    bus.on('query:backoff', () => calls.push('first'))
    bus.on('query:backoff', () => calls.push('second'))

    bus.emit('query:backoff', {
      subscriptionId: 'sub-1',
      resourceGroup: 'rg-x',
      attempt: 1,
      delayMs: 2000,
      reason: 'Throttled',
      hinted: false,
    })

    expect(calls).toEqual(['first', 'second'])
  })

  it('dispatches synchronously', () => {
    let seen = 0
    bus.on('pair:started', ({ index }) => {
      seen = index
    })

    bus.emit('pair:started', { subscriptionId: 'sub-1', resourceGroup: 'rg-x', index: 3, total: 4 })

    expect(seen).toBe(3)
  })
})

describe('createEventBus', () => {
  it('returns independent buses', () => {
    const a = createEventBus()
    const b = createEventBus()
    const handler = vi.fn<(payload: CollectionEvents['pipeline:pacing']) => void>()
    a.on('pipeline:pacing', handler)

    b.emit('pipeline:pacing', { delayMs: 1 })

    expect(handler).not.toHaveBeenCalled()
  })
})
