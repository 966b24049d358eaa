/**
 * RateLimitedTransport — wraps a single-attempt transport with the retry/backoff loop.
 *
 * Responsibilities:
 *  - Attach the caller's client label to every attempt
 *  - Drive attempts until success, a fatal outcome or the attempt cap
 *  - Wait between attempts (the wait suspends only this call site)
 *  - Emit query:backoff for every wait
 */

import type {
  BillingPeriod,
  CostQueryPage,
  CostScope,
  QueryOutcome,
  RandomSource,
  RecoverableOutcome,
  RetryPolicy,
  Sleeper,
} from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { CollectionError } from '../../core/errors.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CostQueryTransport } from './http-transport.js'
import { decideNextStep, retryAfter } from './retry-policy.js'

const logger = createLogger('rate-limited-transport')

/** Fetches one complete page, retrying as needed */
export interface PageFetcher {
  /**
   * @throws {CollectionError} with kind FatalError or RetriesExhausted
   */
  fetchPage(scope: CostScope, period: BillingPeriod, pageToken: string | null): Promise<CostQueryPage>
}

export interface RateLimitedTransportOptions {
  transport: CostQueryTransport
  policy: RetryPolicy
  /** Sent as the ClientType header; used by the provider for rate-limit bucketing */
  clientLabel: string
  sleep?: Sleeper
  random?: RandomSource
  eventBus?: TypedEventBus
}

export class RateLimitedTransport implements PageFetcher {
  private readonly _transport: CostQueryTransport
  private readonly _policy: RetryPolicy
  private readonly _clientLabel: string
  private readonly _sleep: Sleeper
  private readonly _random: RandomSource
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: RateLimitedTransportOptions) {
    if (!Number.isInteger(options.policy.maxRetries) || options.policy.maxRetries < 1) {
      throw new RangeError('maxRetries must be a positive integer')
    }
    this._transport = options.transport
    this._policy = options.policy
    this._clientLabel = options.clientLabel
    this._sleep = options.sleep ?? defaultSleep
    this._random = options.random ?? Math.random
    this._eventBus = options.eventBus
  }

  get policy(): RetryPolicy {
    return this._policy
  }

  /**
   * One attempt, no retries.
   */
  send(
    scope: CostScope,
    period: BillingPeriod,
    pageToken: string | null,
    clientLabel: string = this._clientLabel,
  ): Promise<QueryOutcome> {
    return this._transport.send(scope, period, pageToken, clientLabel)
  }

  /**
   * Delay before the retry following `outcome`.
   *
   * @param attemptNumber - 0 for the first retry
   */
  retryAfter(
    outcome: RecoverableOutcome,
    attemptNumber: number,
    baseSleepMs: number = this._policy.baseDelayMs,
  ): number {
    return retryAfter(outcome, attemptNumber, baseSleepMs, this._policy, this._random)
  }

  async fetchPage(scope: CostScope, period: BillingPeriod, pageToken: string | null): Promise<CostQueryPage> {
    for (let attempt = 1; ; attempt++) {
      const outcome = await this.send(scope, period, pageToken)
      const decision = decideNextStep(outcome, attempt, this._policy, this._random)

      switch (decision.action) {
        case 'complete':
          return { lineItems: decision.lineItems, nextPageToken: decision.nextPageToken }

        case 'fail':
          logger.warn({ ...scope, attempt, kind: decision.kind }, decision.message)
          throw new CollectionError(decision.kind, decision.message, { ...scope, attempts: attempt })

        case 'retry':
          logger.info(
            { ...scope, attempt, delayMs: decision.delayMs, reason: decision.reason, hinted: decision.hinted },
            'Retrying cost query after backoff',
          )
          this._eventBus?.emit('query:backoff', {
            subscriptionId: scope.subscriptionId,
            resourceGroup: scope.resourceGroup,
            attempt,
            delayMs: decision.delayMs,
            reason: decision.reason,
            hinted: decision.hinted,
          })
          await this._sleep(decision.delayMs)
          break
      }
    }
  }
}
