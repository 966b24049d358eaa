/**
 * Decoding of Cost Management query result pages into CostLineItems.
 *
 * A page looks like:
 *   { properties: { nextLink, columns: [{ name, type }], rows: [[...cells]] } }
 * Cells are positional; column names locate the cost, currency and grouping values.
 */

import { z } from 'zod'
import type { CostLineItem, CostQueryPage } from '../../core/types.js'
import { ResponseFormatError } from '../../core/errors.js'
import { CostAmount } from '../cost-aggregator/cost-amount.js'

const COST_COLUMNS = ['totalcost', 'pretaxcost']
const CURRENCY_COLUMNS = ['currency', 'billingcurrency']
const RESOURCE_GROUP_COLUMNS = ['resourcegroupname', 'resourcegroup']

const CellSchema = z.union([z.string(), z.number(), z.null()])

const QueryResultSchema = z.object({
  properties: z.object({
    nextLink: z.string().nullish(),
    columns: z.array(z.object({ name: z.string(), type: z.string().optional() })).default([]),
    rows: z.array(z.array(CellSchema)).default([]),
  }),
})

type Cell = z.infer<typeof CellSchema>

function findColumn(columns: Array<{ name: string }>, candidates: string[]): number {
  return columns.findIndex((column) => candidates.includes(column.name.toLowerCase()))
}

function parseCost(cell: Cell | undefined, rowIndex: number): CostAmount {
  if (cell === undefined) {
    throw new ResponseFormatError(`Row ${String(rowIndex)} has no cost cell`, { rowIndex })
  }
  if (cell === null || cell === '') return CostAmount.ZERO
  try {
    return CostAmount.parse(cell)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ResponseFormatError(`Row ${String(rowIndex)} has an unreadable cost: ${message}`, { rowIndex })
  }
}

function parseText(cell: Cell | undefined): string | null {
  if (typeof cell !== 'string') return null
  const trimmed = cell.trim()
  return trimmed === '' ? null : trimmed
}

/**
 * Decode one page of a cost query result.
 *
 * @param body - The parsed JSON response body
 * @throws {ResponseFormatError} when the body does not have the query result shape,
 *   or rows are present without a cost column
 */
export function parseCostQueryPage(body: unknown): CostQueryPage {
  const parsed = QueryResultSchema.safeParse(body)
  if (!parsed.success) {
    throw new ResponseFormatError('Response is not a cost query result', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    })
  }

  const { columns, rows, nextLink } = parsed.data.properties
  const costIndex = findColumn(columns, COST_COLUMNS)
  if (rows.length > 0 && costIndex === -1) {
    throw new ResponseFormatError('Query result has no cost column', {
      columns: columns.map((column) => column.name),
    })
  }
  const currencyIndex = findColumn(columns, CURRENCY_COLUMNS)
  const resourceGroupIndex = findColumn(columns, RESOURCE_GROUP_COLUMNS)

  const lineItems: CostLineItem[] = rows.map((row, rowIndex) => ({
    preTaxCost: parseCost(row[costIndex], rowIndex),
    currency: currencyIndex === -1 ? null : parseText(row[currencyIndex]),
    resourceGroup: resourceGroupIndex === -1 ? null : parseText(row[resourceGroupIndex]),
  }))

  return {
    lineItems,
    nextPageToken: nextLink !== undefined && nextLink !== null && nextLink !== '' ? nextLink : null,
  }
}
