import { describe, it, expect } from 'vitest'
import type { BillingPeriod, CostQueryPage, CostScope } from '../../../core/types.js'
import { CollectionError } from '../../../core/errors.js'
import { CostAmount } from '../../cost-aggregator/cost-amount.js'
import { CostQueryPaginator } from '../paginator.js'
import type { PageFetcher } from '../rate-limited-transport.js'

const SCOPE: CostScope = { subscriptionId: 'sub-1', resourceGroup: 'rg-1' }
const PERIOD: BillingPeriod = {
  start: new Date('2024-02-01T00:00:00Z'),
  end: new Date('2024-03-01T00:00:00Z'),
}

function pageOf(costs: string[], nextPageToken: string | null): CostQueryPage {
  return {
    lineItems: costs.map((cost) => ({ preTaxCost: CostAmount.parse(cost), currency: 'USD', resourceGroup: 'rg-1' })),
    nextPageToken,
  }
}

function scriptedFetcher(pages: Array<CostQueryPage | Error>) {
  const tokens: Array<string | null> = []
  const fetcher: PageFetcher = {
    fetchPage: async (_scope, _period, pageToken) => {
      tokens.push(pageToken)
      const next = pages.shift()
      if (next === undefined) throw new Error('fetcher called more often than scripted')
      if (next instanceof Error) throw next
      return next
    },
  }
  return { fetcher, tokens }
}

describe('CostQueryPaginator', () => {
  it('follows continuation tokens and keeps page order', async () => {
    const { fetcher, tokens } = scriptedFetcher([pageOf(['1', '2'], 'p2'), pageOf(['3'], 'p3'), pageOf([], null)])

    const items = await new CostQueryPaginator(fetcher).fetchAll(SCOPE, PERIOD)

    expect(tokens).toEqual([null, 'p2', 'p3'])
    expect(items.map((i) => i.preTaxCost.toString())).toEqual(['1', '2', '3'])
  })

  it('returns the single page when there is no continuation', async () => {
    const { fetcher, tokens } = scriptedFetcher([pageOf(['4.2'], null)])
    const items = await new CostQueryPaginator(fetcher).fetchAll(SCOPE, PERIOD)
    expect(tokens).toEqual([null])
    expect(items).toHaveLength(1)
  })

  it('fails when a continuation token repeats', async () => {
    const { fetcher } = scriptedFetcher([pageOf(['1'], 'p2'), pageOf(['2'], 'p2')])

    await expect(new CostQueryPaginator(fetcher).fetchAll(SCOPE, PERIOD)).rejects.toMatchObject({
      kind: 'FatalError',
      message: 'Continuation link repeats an earlier page',
    })
  })

  it('discards earlier pages when a later page fails', async () => {
    const failure = new CollectionError('RetriesExhausted', 'Gave up after 8 attempts: throttled (HTTP 429)')
    const { fetcher } = scriptedFetcher([pageOf(['1'], 'p2'), failure])

    await expect(new CostQueryPaginator(fetcher).fetchAll(SCOPE, PERIOD)).rejects.toBe(failure)
  })
})
