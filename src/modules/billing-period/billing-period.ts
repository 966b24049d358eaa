/**
 * Billing period helpers.
 *
 * A run always reports the calendar month before `now`, as the half-open UTC
 * interval [first of previous month 00:00, first of current month 00:00).
 */

import type { BillingPeriod } from '../../core/types.js'

/**
 * Compute the previous calendar month relative to `now` (UTC).
 */
export function previousMonthPeriod(now: Date): BillingPeriod {
  const year = now.getUTCFullYear()
  const month = now.getUTCMonth()
  // Date.UTC normalizes month -1 to December of the previous year
  return {
    start: new Date(Date.UTC(year, month - 1, 1)),
    end: new Date(Date.UTC(year, month, 1)),
  }
}

/**
 * Format a period boundary as `YYYY-MM-DDTHH:mm:ssZ` (no milliseconds).
 */
export function formatPeriodBoundary(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * `YYYY-MM` label of the month the period starts in (used for default file names).
 */
export function periodMonthLabel(period: BillingPeriod): string {
  return formatPeriodBoundary(period.start).slice(0, 7)
}
