/**
 * Wiring of the collection stack from resolved run settings:
 *   HttpCostQueryTransport → RateLimitedTransport → CostQueryPaginator → CollectionPipeline
 */

import type { RandomSource, RetryPolicy, Sleeper } from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { secondsToMs } from '../../utils/helpers.js'
import type { TokenProvider } from '../auth/token-provider.js'
import type { RunSettings } from '../config/config-schema.js'
import { HttpCostQueryTransport } from '../cost-query/http-transport.js'
import { CostQueryPaginator } from '../cost-query/paginator.js'
import { RateLimitedTransport } from '../cost-query/rate-limited-transport.js'
import { CollectionPipeline } from './collection-pipeline.js'

export interface CollectorDependencies {
  tokenProvider: TokenProvider
  eventBus?: TypedEventBus
  fetchFn?: typeof fetch
  sleep?: Sleeper
  random?: RandomSource
  /** Resource Manager base URL (default: public cloud) */
  endpoint?: string
}

export function toRetryPolicy(settings: RunSettings): RetryPolicy {
  return {
    maxRetries: settings.max_retries,
    baseDelayMs: secondsToMs(settings.base_sleep_seconds),
    maxDelayMs: secondsToMs(settings.max_backoff_seconds),
    jitterRatio: settings.jitter_ratio,
  }
}

export function createCollectionPipeline(settings: RunSettings, deps: CollectorDependencies): CollectionPipeline {
  const transport = new HttpCostQueryTransport({
    tokenProvider: deps.tokenProvider,
    timeoutMs: secondsToMs(settings.request_timeout_seconds),
    ...(deps.endpoint !== undefined && { endpoint: deps.endpoint }),
    ...(deps.fetchFn !== undefined && { fetchFn: deps.fetchFn }),
  })

  const rateLimited = new RateLimitedTransport({
    transport,
    policy: toRetryPolicy(settings),
    clientLabel: settings.client_type,
    ...(deps.sleep !== undefined && { sleep: deps.sleep }),
    ...(deps.random !== undefined && { random: deps.random }),
    ...(deps.eventBus !== undefined && { eventBus: deps.eventBus }),
  })

  return new CollectionPipeline({
    source: new CostQueryPaginator(rateLimited),
    ...(deps.eventBus !== undefined && { eventBus: deps.eventBus }),
    ...(deps.sleep !== undefined && { sleep: deps.sleep }),
  })
}
