/**
 * CollectionEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "pair:failed", "query:backoff")
 */

import type { CollectionFailure, QueryOutcomeKind, ResourceGroupCostRow } from './types.js'

export interface CollectionEvents {
  /** A pair moved from Pending to Fetching */
  'pair:started': {
    subscriptionId: string
    resourceGroup: string
    /** 1-based position of the pair in the run */
    index: number
    total: number
  }

  /** A pair produced a row */
  'pair:succeeded': {
    row: ResourceGroupCostRow
    lineItemCount: number
  }

  /** A pair was recorded as a failure */
  'pair:failed': {
    failure: CollectionFailure
  }

  /** A recoverable outcome is about to be retried after a wait */
  'query:backoff': {
    subscriptionId: string
    resourceGroup: string
    /** The attempt that just failed (1-based) */
    attempt: number
    delayMs: number
    reason: Extract<QueryOutcomeKind, 'Throttled' | 'TransientServerError'>
    /** True when the delay came from a provider retry-after header */
    hinted: boolean
  }

  /** The pipeline is pausing between pairs */
  'pipeline:pacing': {
    delayMs: number
  }

  /** All pairs have been processed */
  'pipeline:complete': {
    rowCount: number
    failureCount: number
    durationMs: number
  }
}
