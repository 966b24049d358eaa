/**
 * Cost query module — barrel export.
 *
 *  - HttpCostQueryTransport: one HTTP attempt, classified into a QueryOutcome
 *  - RateLimitedTransport: retry/backoff loop over a transport
 *  - CostQueryPaginator: follows continuation links for one scope
 */

export type { CostQueryTransport, HttpCostQueryTransportOptions } from './http-transport.js'
export { HttpCostQueryTransport } from './http-transport.js'

export type { PageFetcher, RateLimitedTransportOptions } from './rate-limited-transport.js'
export { RateLimitedTransport } from './rate-limited-transport.js'

export { CostQueryPaginator } from './paginator.js'

export type { AttemptDecision } from './retry-policy.js'
export { DEFAULT_RETRY_POLICY, computeBackoffMs, decideNextStep, retryAfter } from './retry-policy.js'

export type { HttpResponseSnapshot } from './classify.js'
export { RETRY_AFTER_HEADERS, classifyResponse, describeErrorBody, parseRetryAfterMs } from './classify.js'

export { parseCostQueryPage } from './response-parser.js'
export type { CostQueryBody } from './query-request.js'
export {
  COST_QUERY_API_VERSION,
  DEFAULT_ARM_ENDPOINT,
  buildCostQueryBody,
  buildQueryUrl,
  isSameOrigin,
  scopePath,
} from './query-request.js'
