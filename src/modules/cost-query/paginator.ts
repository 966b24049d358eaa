/**
 * CostQueryPaginator — collects every page of one scope's cost query.
 *
 * The result is fully materialized: if any page fails terminally the whole
 * fetch fails and pages already received are dropped. Provider page order is kept.
 */

import type { BillingPeriod, CostLineItem, CostScope } from '../../core/types.js'
import { CollectionError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { PageFetcher } from './rate-limited-transport.js'

const logger = createLogger('paginator')

export class CostQueryPaginator {
  constructor(private readonly _fetcher: PageFetcher) {}

  /**
   * @throws {CollectionError} when a page fails terminally or the continuation chain loops
   */
  async fetchAll(scope: CostScope, period: BillingPeriod): Promise<CostLineItem[]> {
    const lineItems: CostLineItem[] = []
    const visitedTokens = new Set<string>()
    let pageToken: string | null = null
    let pageCount = 0

    do {
      const page = await this._fetcher.fetchPage(scope, period, pageToken)
      pageCount++
      lineItems.push(...page.lineItems)

      pageToken = page.nextPageToken
      if (pageToken !== null) {
        if (visitedTokens.has(pageToken)) {
          throw new CollectionError('FatalError', 'Continuation link repeats an earlier page', {
            ...scope,
            pageCount,
          })
        }
        visitedTokens.add(pageToken)
      }
    } while (pageToken !== null)

    logger.debug({ ...scope, pageCount, lineItemCount: lineItems.length }, 'Fetched all cost query pages')
    return lineItems
  }
}
