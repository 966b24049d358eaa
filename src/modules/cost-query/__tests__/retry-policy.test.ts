import { describe, it, expect } from 'vitest'
import type { RetryPolicy } from '../../../core/types.js'
import { computeBackoffMs, decideNextStep, retryAfter } from '../retry-policy.js'

const POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 2000, maxDelayMs: 60_000, jitterRatio: 0.2 }
const noJitter = () => 0

describe('computeBackoffMs', () => {
  it('doubles per attempt up to the cap', () => {
    expect(computeBackoffMs(0, 2000, 60_000)).toBe(2000)
    expect(computeBackoffMs(3, 2000, 60_000)).toBe(16_000)
    expect(computeBackoffMs(5, 2000, 60_000)).toBe(60_000)
  })
})

describe('retryAfter', () => {
  it('uses computed backoff for transient errors', () => {
    const outcome = { kind: 'TransientServerError', status: 500, message: 'HTTP 500' } as const
    expect(retryAfter(outcome, 1, 2000, POLICY, noJitter)).toBe(4000)
  })

  it('adds jitter of up to jitterRatio of the delay', () => {
    const outcome = { kind: 'TransientServerError', status: 500, message: 'HTTP 500' } as const
    expect(retryAfter(outcome, 1, 2000, POLICY, () => 1)).toBe(4800)
  })

  it('prefers the provider hint over computed backoff', () => {
    const outcome = { kind: 'Throttled', status: 429, retryAfterMs: 7000 } as const
    expect(retryAfter(outcome, 0, 2000, POLICY, () => 0.5)).toBe(7700)
  })

  it('does not cap a provider hint', () => {
    const outcome = { kind: 'Throttled', status: 429, retryAfterMs: 90_000 } as const
    expect(retryAfter(outcome, 0, 2000, POLICY, noJitter)).toBe(90_000)
  })
})

describe('decideNextStep', () => {
  it('completes on success', () => {
    const decision = decideNextStep({ kind: 'Success', lineItems: [], nextPageToken: 'next' }, 1, POLICY, noJitter)
    expect(decision).toEqual({ action: 'complete', lineItems: [], nextPageToken: 'next' })
  })

  it('fails immediately on a fatal outcome', () => {
    const decision = decideNextStep({ kind: 'FatalError', status: 403, message: 'HTTP 403' }, 1, POLICY, noJitter)
    expect(decision).toEqual({ action: 'fail', kind: 'FatalError', message: 'HTTP 403' })
  })

  it('retries a throttled attempt below the cap', () => {
    const decision = decideNextStep({ kind: 'Throttled', status: 429, retryAfterMs: null }, 2, POLICY, noJitter)
    expect(decision).toEqual({ action: 'retry', delayMs: 4000, reason: 'Throttled', hinted: false })
  })

  it('flags hinted delays', () => {
    const decision = decideNextStep({ kind: 'Throttled', status: 429, retryAfterMs: 1000 }, 1, POLICY, noJitter)
    expect(decision).toEqual({ action: 'retry', delayMs: 1000, reason: 'Throttled', hinted: true })
  })

  it('gives up once the attempt cap is reached', () => {
    const decision = decideNextStep({ kind: 'Throttled', status: 503, retryAfterMs: null }, 3, POLICY, noJitter)
    expect(decision).toEqual({
      action: 'fail',
      kind: 'RetriesExhausted',
      message: 'Gave up after 3 attempts: throttled (HTTP 503)',
    })
  })

  it('reports the last transient message when giving up', () => {
    const single: RetryPolicy = { ...POLICY, maxRetries: 1 }
    const decision = decideNextStep(
      { kind: 'TransientServerError', status: null, message: 'Network error: fetch failed' },
      1,
      single,
      noJitter,
    )
    expect(decision).toEqual({
      action: 'fail',
      kind: 'RetriesExhausted',
      message: 'Gave up after 1 attempt: Network error: fetch failed',
    })
  })
})
