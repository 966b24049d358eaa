/**
 * CostAggregator module — barrel export.
 */

export { CostAmount, COST_AMOUNT_SCALE, MAX_DECIMAL_EXPONENT } from './cost-amount.js'
export type { CostAggregator } from './aggregator.js'
export { CostAggregatorImpl, createCostAggregator, distinctCurrencies } from './aggregator.js'
