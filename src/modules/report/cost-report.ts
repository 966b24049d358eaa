/**
 * Cost report rendering: CSV for collected rows, an aligned table for failures.
 */

import { mkdir, writeFile } from 'fs/promises'
import { dirname, join, resolve } from 'path'
import type { BillingPeriod, CollectionFailure, ResourceGroupCostRow } from '../../core/types.js'
import { formatTable } from '../../cli/utils/formatting.js'
import { formatPeriodBoundary, periodMonthLabel } from '../billing-period/billing-period.js'

export const COST_REPORT_COLUMNS = ['subscription_id', 'resource_group', 'start', 'end', 'total_cost'] as const

/** Fraction digits of total_cost in reports */
export const REPORT_FRACTION_DIGITS = 2

/** One report row with every value already rendered */
export type CostReportRecord = Record<(typeof COST_REPORT_COLUMNS)[number], string>

/**
 * Quote a CSV field value, escaping embedded quotes and wrapping in double-quotes
 * when the value contains commas, double-quotes, or newlines.
 */
export function csvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function toReportRecord(row: ResourceGroupCostRow): CostReportRecord {
  return {
    subscription_id: row.subscriptionId,
    resource_group: row.resourceGroup,
    start: formatPeriodBoundary(row.start),
    end: formatPeriodBoundary(row.end),
    total_cost: row.totalCost.toFixed(REPORT_FRACTION_DIGITS),
  }
}

/**
 * Render rows as CSV with a header line. Every line, including the last, ends in a newline.
 */
export function formatCostCsv(rows: readonly ResourceGroupCostRow[]): string {
  const lines = [
    COST_REPORT_COLUMNS.join(','),
    ...rows.map((row) => {
      const record = toReportRecord(row)
      return COST_REPORT_COLUMNS.map((column) => csvField(record[column])).join(',')
    }),
  ]
  return lines.join('\n') + '\n'
}

/**
 * Write the CSV report, creating parent directories as needed.
 * @returns The absolute path written
 */
export async function writeCostReport(filePath: string, rows: readonly ResourceGroupCostRow[]): Promise<string> {
  const absolute = resolve(filePath)
  await mkdir(dirname(absolute), { recursive: true })
  await writeFile(absolute, formatCostCsv(rows), 'utf-8')
  return absolute
}

/**
 * Default report location: `<baseDir>/outputs/costs_<YYYY-MM>.csv`
 */
export function defaultReportPath(period: BillingPeriod, baseDir: string): string {
  return join(baseDir, 'outputs', `costs_${periodMonthLabel(period)}.csv`)
}

/**
 * Aligned table of failed pairs for terminal output.
 */
export function formatFailuresTable(failures: readonly CollectionFailure[]): string {
  if (failures.length === 0) {
    return 'No failed resource groups'
  }

  const headers = ['Subscription', 'Resource Group', 'Reason', 'Detail']
  const keys = ['subscriptionId', 'resourceGroup', 'kind', 'message']
  const rows: Record<string, string>[] = failures.map((failure) => ({
    subscriptionId: failure.subscriptionId,
    resourceGroup: failure.resourceGroup,
    kind: failure.kind,
    message: failure.message,
  }))
  return formatTable(headers, rows, keys)
}
