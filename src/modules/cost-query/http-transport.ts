/**
 * HttpCostQueryTransport — one attempt of a cost query page over HTTP.
 *
 * Never throws for provider or network failures: every attempt ends in a
 * QueryOutcome so the retry loop above it can decide what happens next.
 */

import type { BillingPeriod, CostScope, QueryOutcome } from '../../core/types.js'
import type { TokenProvider } from '../auth/token-provider.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import { classifyResponse } from './classify.js'
import {
  COST_QUERY_API_VERSION,
  DEFAULT_ARM_ENDPOINT,
  buildCostQueryBody,
  buildQueryUrl,
  isSameOrigin,
} from './query-request.js'

const logger = createLogger('cost-query')

/** Command name the Cost Management portal sends; kept for provider-side bucketing */
const COMMAND_NAME = 'CostAnalysis'

/**
 * A single-attempt cost query transport.
 */
export interface CostQueryTransport {
  /**
   * Fetch one page for `scope` and `period`.
   *
   * @param pageToken   - Continuation token of the previous page, or null for the first page
   * @param clientLabel - Value of the ClientType header sent with the request
   */
  send(
    scope: CostScope,
    period: BillingPeriod,
    pageToken: string | null,
    clientLabel: string,
  ): Promise<QueryOutcome>
}

export interface HttpCostQueryTransportOptions {
  tokenProvider: TokenProvider
  /** Upper bound for one HTTP exchange, body included */
  timeoutMs: number
  endpoint?: string
  apiVersion?: string
  fetchFn?: typeof fetch
  now?: () => Date
}

function errorMessage(err: unknown): string {
  return maskSecrets(err instanceof Error ? err.message : String(err))
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

export class HttpCostQueryTransport implements CostQueryTransport {
  private readonly _tokenProvider: TokenProvider
  private readonly _timeoutMs: number
  private readonly _endpoint: string
  private readonly _apiVersion: string
  private readonly _fetch: typeof fetch
  private readonly _now: () => Date

  constructor(options: HttpCostQueryTransportOptions) {
    this._tokenProvider = options.tokenProvider
    this._timeoutMs = options.timeoutMs
    this._endpoint = (options.endpoint ?? DEFAULT_ARM_ENDPOINT).replace(/\/+$/, '')
    this._apiVersion = options.apiVersion ?? COST_QUERY_API_VERSION
    this._fetch = options.fetchFn ?? fetch.bind(globalThis)
    this._now = options.now ?? (() => new Date())
  }

  async send(
    scope: CostScope,
    period: BillingPeriod,
    pageToken: string | null,
    clientLabel: string,
  ): Promise<QueryOutcome> {
    if (pageToken !== null && !isSameOrigin(pageToken, this._endpoint)) {
      // The bearer token must only ever be sent to the configured endpoint
      return {
        kind: 'FatalError',
        status: null,
        message: `Continuation link points outside ${this._endpoint}`,
      }
    }

    let token: string
    try {
      token = await this._tokenProvider.getToken()
    } catch (err) {
      return { kind: 'FatalError', status: null, message: errorMessage(err) }
    }

    const url = pageToken ?? buildQueryUrl(scope, this._endpoint, this._apiVersion)
    logger.debug({ ...scope, continuation: pageToken !== null }, 'Sending cost query')

    let response: Response
    let bodyText: string
    try {
      response = await this._fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          ClientType: clientLabel,
          'x-ms-command-name': COMMAND_NAME,
        },
        body: JSON.stringify(buildCostQueryBody(period)),
        signal: AbortSignal.timeout(this._timeoutMs),
      })
      bodyText = await response.text()
    } catch (err) {
      if (isTimeout(err)) {
        return {
          kind: 'TransientServerError',
          status: null,
          message: `Request timed out after ${String(this._timeoutMs)}ms`,
        }
      }
      return { kind: 'TransientServerError', status: null, message: `Network error: ${errorMessage(err)}` }
    }

    return classifyResponse({ status: response.status, headers: response.headers, bodyText }, this._now())
  }
}
