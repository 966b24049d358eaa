/**
 * CostAggregator — reduces the line items of one scope into a single pre-tax total.
 *
 * Summation is exact (CostAmount), so the result does not depend on item or
 * page order. An empty item list is a valid zero-spend result.
 */

import type { CostLineItem } from '../../core/types.js'
import { MixedCurrencyError } from '../../core/errors.js'
import { CostAmount } from './cost-amount.js'

export interface CostAggregator {
  /**
   * Sum `preTaxCost` across all items.
   * @throws {MixedCurrencyError} when the items report more than one currency
   */
  aggregate(lineItems: readonly CostLineItem[]): CostAmount
}

/**
 * Distinct non-null currencies across the items, in first-seen order.
 * Comparison is case-insensitive; the first spelling seen is kept.
 */
export function distinctCurrencies(lineItems: readonly CostLineItem[]): string[] {
  const seen = new Map<string, string>()
  for (const item of lineItems) {
    if (item.currency === null) continue
    const key = item.currency.toUpperCase()
    if (!seen.has(key)) seen.set(key, item.currency)
  }
  return [...seen.values()]
}

export class CostAggregatorImpl implements CostAggregator {
  aggregate(lineItems: readonly CostLineItem[]): CostAmount {
    const currencies = distinctCurrencies(lineItems)
    if (currencies.length > 1) {
      throw new MixedCurrencyError(currencies, { lineItemCount: lineItems.length })
    }
    return CostAmount.sum(lineItems.map((item) => item.preTaxCost))
  }
}

export function createCostAggregator(): CostAggregator {
  return new CostAggregatorImpl()
}
