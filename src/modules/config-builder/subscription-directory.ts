/**
 * Subscriptions visible to the signed-in identity, listed through Azure Resource Manager.
 */

import { z } from 'zod'
import { SubscriptionDirectoryError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { TokenProvider } from '../auth/token-provider.js'
import { describeErrorBody } from '../cost-query/classify.js'
import { DEFAULT_ARM_ENDPOINT, isSameOrigin } from '../cost-query/query-request.js'

const logger = createLogger('subscription-directory')

export const SUBSCRIPTIONS_API_VERSION = '2022-12-01'

export interface SubscriptionInfo {
  subscriptionId: string
  displayName: string
}

export interface SubscriptionDirectory {
  list(): Promise<SubscriptionInfo[]>
}

const SubscriptionListPageSchema = z.object({
  value: z
    .array(
      z.object({
        subscriptionId: z.string().nullish(),
        displayName: z.string().nullish(),
      }),
    )
    .default([]),
  nextLink: z.string().nullish(),
})

export interface ArmSubscriptionDirectoryOptions {
  tokenProvider: TokenProvider
  endpoint?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

const DEFAULT_TIMEOUT_MS = 60_000

export class ArmSubscriptionDirectory implements SubscriptionDirectory {
  private readonly _tokenProvider: TokenProvider
  private readonly _endpoint: string
  private readonly _timeoutMs: number
  private readonly _fetch: typeof fetch

  constructor(options: ArmSubscriptionDirectoryOptions) {
    this._tokenProvider = options.tokenProvider
    this._endpoint = (options.endpoint ?? DEFAULT_ARM_ENDPOINT).replace(/\/+$/, '')
    this._timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this._fetch = options.fetchFn ?? fetch.bind(globalThis)
  }

  async list(): Promise<SubscriptionInfo[]> {
    const token = await this._tokenProvider.getToken()
    const seen = new Set<string>()
    const subscriptions: SubscriptionInfo[] = []
    let url: string | null = `${this._endpoint}/subscriptions?api-version=${SUBSCRIPTIONS_API_VERSION}`

    while (url !== null) {
      if (seen.has(url)) {
        throw new SubscriptionDirectoryError('Subscription list continuation link repeats an earlier page')
      }
      seen.add(url)

      const page = await this._fetchPage(url, token)
      for (const entry of page.value) {
        const subscriptionId = (entry.subscriptionId ?? '').trim()
        if (subscriptionId === '') continue
        subscriptions.push({ subscriptionId, displayName: (entry.displayName ?? '').trim() })
      }

      const next = page.nextLink ?? ''
      if (next !== '' && !isSameOrigin(next, this._endpoint)) {
        throw new SubscriptionDirectoryError(`Subscription list link points outside ${this._endpoint}`)
      }
      url = next === '' ? null : next
    }

    logger.debug({ count: subscriptions.length }, 'Listed visible subscriptions')
    return subscriptions
  }

  private async _fetchPage(url: string, token: string): Promise<z.infer<typeof SubscriptionListPageSchema>> {
    let response: Response
    let bodyText: string
    try {
      response = await this._fetch(url, {
        method: 'GET',
        headers: { Authorization: `Bearer ${token}` },
        signal: AbortSignal.timeout(this._timeoutMs),
      })
      bodyText = await response.text()
    } catch (err) {
      const message = maskSecrets(err instanceof Error ? err.message : String(err))
      throw new SubscriptionDirectoryError(`Could not list subscriptions: ${message}`)
    }

    if (!response.ok) {
      throw new SubscriptionDirectoryError(
        `Could not list subscriptions: ${describeErrorBody(response.status, bodyText)}`,
        { status: response.status },
      )
    }

    let body: unknown
    try {
      body = JSON.parse(bodyText)
    } catch {
      throw new SubscriptionDirectoryError('Subscription list response is not valid JSON')
    }

    const parsed = SubscriptionListPageSchema.safeParse(body)
    if (!parsed.success) {
      throw new SubscriptionDirectoryError('Subscription list response has an unexpected shape', {
        issues: parsed.error.issues,
      })
    }
    return parsed.data
  }
}
