/**
 * Cost Management query request construction.
 */

import type { BillingPeriod, CostScope } from '../../core/types.js'
import { formatPeriodBoundary } from '../billing-period/billing-period.js'

export const DEFAULT_ARM_ENDPOINT = 'https://management.azure.com'
export const COST_QUERY_API_VERSION = '2023-03-01'

/** Name the pre-tax sum is returned under */
export const TOTAL_COST_AGGREGATION = 'totalCost'

export interface CostQueryBody {
  type: 'Usage'
  timeframe: 'Custom'
  timePeriod: { from: string; to: string }
  dataset: {
    granularity: 'None'
    aggregation: Record<string, { name: 'PreTaxCost'; function: 'Sum' }>
    grouping: Array<{ type: 'Dimension'; name: 'ResourceGroupName' }>
  }
}

/**
 * Resource-manager path of a (subscription, resource group) scope.
 */
export function scopePath(scope: CostScope): string {
  return `/subscriptions/${encodeURIComponent(scope.subscriptionId)}/resourceGroups/${encodeURIComponent(scope.resourceGroup)}`
}

/**
 * URL of the first page of a cost query. Continuation pages use the provider's nextLink.
 */
export function buildQueryUrl(
  scope: CostScope,
  endpoint = DEFAULT_ARM_ENDPOINT,
  apiVersion = COST_QUERY_API_VERSION,
): string {
  return `${endpoint}${scopePath(scope)}/providers/Microsoft.CostManagement/query?api-version=${apiVersion}`
}

/**
 * Body of a pre-tax usage query for `period`. The end of the period is exclusive.
 */
export function buildCostQueryBody(period: BillingPeriod): CostQueryBody {
  return {
    type: 'Usage',
    timeframe: 'Custom',
    timePeriod: {
      from: formatPeriodBoundary(period.start),
      to: formatPeriodBoundary(period.end),
    },
    dataset: {
      granularity: 'None',
      aggregation: {
        [TOTAL_COST_AGGREGATION]: { name: 'PreTaxCost', function: 'Sum' },
      },
      grouping: [{ type: 'Dimension', name: 'ResourceGroupName' }],
    },
  }
}

/**
 * Whether `link` is on the same origin as `endpoint`. Scheme and host case and
 * default ports are normalized; a link that is not an absolute URL never matches.
 */
export function isSameOrigin(link: string, endpoint: string): boolean {
  try {
    return new URL(link).origin === new URL(endpoint).origin
  } catch {
    return false
  }
}
