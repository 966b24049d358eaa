/**
 * Core type definitions for rg-cost-report
 * Shared across the cost-query, aggregation, collection and report modules
 */

import type { CostAmount } from '../modules/cost-aggregator/cost-amount.js'
import type { CollectionErrorKind } from './errors.js'

/** A subscription and the resource groups to report on, in configured order */
export interface SubscriptionTarget {
  readonly subscriptionId: string
  readonly resourceGroups: readonly string[]
  readonly displayName?: string
}

/** Half-open UTC interval [start, end) */
export interface BillingPeriod {
  readonly start: Date
  readonly end: Date
}

/** Addressing unit of one cost query */
export interface CostScope {
  readonly subscriptionId: string
  readonly resourceGroup: string
}

/** One raw row of a cost query result */
export interface CostLineItem {
  readonly preTaxCost: CostAmount
  /** Billing currency reported with the row, if the provider returned one */
  readonly currency: string | null
  /** Grouping key; not used for aggregation */
  readonly resourceGroup: string | null
}

/** The decoded content of one successful cost query page */
export interface CostQueryPage {
  readonly lineItems: CostLineItem[]
  readonly nextPageToken: string | null
}

/** Result of a single page fetch attempt */
export type QueryOutcome =
  | { readonly kind: 'Success'; readonly lineItems: CostLineItem[]; readonly nextPageToken: string | null }
  | { readonly kind: 'Throttled'; readonly status: number; readonly retryAfterMs: number | null }
  | { readonly kind: 'TransientServerError'; readonly status: number | null; readonly message: string }
  | { readonly kind: 'FatalError'; readonly status: number | null; readonly message: string }

export type QueryOutcomeKind = QueryOutcome['kind']

/** Outcomes that are retried with backoff */
export type RecoverableOutcome = Extract<QueryOutcome, { kind: 'Throttled' | 'TransientServerError' }>

/** One successfully collected resource group total */
export interface ResourceGroupCostRow {
  readonly subscriptionId: string
  /** Lowercased resource group name */
  readonly resourceGroup: string
  readonly start: Date
  readonly end: Date
  readonly totalCost: CostAmount
}

/** A pair that could not be collected */
export interface CollectionFailure {
  readonly subscriptionId: string
  readonly resourceGroup: string
  readonly kind: CollectionErrorKind
  readonly message: string
}

/** Rows and failures of one pipeline run, both in configured order */
export interface CollectionResult {
  readonly rows: ResourceGroupCostRow[]
  readonly failures: CollectionFailure[]
}

/** Retry/backoff parameters for a single logical page fetch */
export interface RetryPolicy {
  /** Total attempts per page, including the first */
  readonly maxRetries: number
  readonly baseDelayMs: number
  readonly maxDelayMs: number
  /** Upper bound of the random jitter, as a fraction of the chosen delay */
  readonly jitterRatio: number
}

/** Awaitable delay; injected so tests can record waits instead of sleeping */
export type Sleeper = (ms: number) => Promise<void>

/** Returns a number in [0, 1) */
export type RandomSource = () => number
