/**
 * Retry decisions for cost query attempts.
 *
 * Each attempt's outcome is turned into an explicit AttemptDecision by a pure
 * function, so the policy can be exercised without any transport at all.
 */

import type {
  CostLineItem,
  QueryOutcome,
  RandomSource,
  RecoverableOutcome,
  RetryPolicy,
} from '../../core/types.js'
import type { CollectionErrorKind } from '../../core/errors.js'

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 8,
  baseDelayMs: 2_000,
  maxDelayMs: 60_000,
  jitterRatio: 0.2,
}

export type AttemptDecision =
  | { action: 'complete'; lineItems: CostLineItem[]; nextPageToken: string | null }
  | {
      action: 'retry'
      delayMs: number
      reason: RecoverableOutcome['kind']
      hinted: boolean
    }
  | { action: 'fail'; kind: CollectionErrorKind; message: string }

/**
 * Exponential backoff without jitter: min(maxDelayMs, baseSleepMs × 2^attemptNumber).
 */
export function computeBackoffMs(attemptNumber: number, baseSleepMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseSleepMs * 2 ** attemptNumber)
}

/**
 * Delay before retrying a recoverable outcome.
 *
 * A provider hint on a Throttled outcome replaces the computed backoff. Jitter of
 * up to `policy.jitterRatio` of the chosen delay is added in both cases.
 *
 * @param attemptNumber - 0 for the first retry, 1 for the second, ...
 */
export function retryAfter(
  outcome: RecoverableOutcome,
  attemptNumber: number,
  baseSleepMs: number,
  policy: RetryPolicy,
  random: RandomSource,
): number {
  const hint = outcome.kind === 'Throttled' ? outcome.retryAfterMs : null
  const delay = hint ?? computeBackoffMs(attemptNumber, baseSleepMs, policy.maxDelayMs)
  return Math.round(delay + random() * policy.jitterRatio * delay)
}

function describeOutcome(outcome: RecoverableOutcome): string {
  if (outcome.kind === 'Throttled') return `throttled (HTTP ${String(outcome.status)})`
  return outcome.message
}

/**
 * Decide what follows the outcome of attempt number `attempt` (1-based).
 */
export function decideNextStep(
  outcome: QueryOutcome,
  attempt: number,
  policy: RetryPolicy,
  random: RandomSource,
): AttemptDecision {
  switch (outcome.kind) {
    case 'Success':
      return { action: 'complete', lineItems: outcome.lineItems, nextPageToken: outcome.nextPageToken }

    case 'FatalError':
      return { action: 'fail', kind: 'FatalError', message: outcome.message }

    case 'Throttled':
    case 'TransientServerError': {
      if (attempt >= policy.maxRetries) {
        return {
          action: 'fail',
          kind: 'RetriesExhausted',
          message: `Gave up after ${String(attempt)} attempt${attempt === 1 ? '' : 's'}: ${describeOutcome(outcome)}`,
        }
      }
      return {
        action: 'retry',
        delayMs: retryAfter(outcome, attempt - 1, policy.baseDelayMs, policy, random),
        reason: outcome.kind,
        hinted: outcome.kind === 'Throttled' && outcome.retryAfterMs !== null,
      }
    }
  }
}
