import { describe, it, expect } from 'vitest'
import { ResponseFormatError } from '../../../core/errors.js'
import { parseCostQueryPage } from '../response-parser.js'

const COLUMNS = [
  { name: 'totalCost', type: 'Number' },
  { name: 'ResourceGroupName', type: 'String' },
  { name: 'Currency', type: 'String' },
]

function page(rows: Array<Array<string | number | null>>, nextLink: string | null = null, columns = COLUMNS) {
  return { properties: { nextLink, columns, rows } }
}

describe('parseCostQueryPage', () => {
  it('maps rows to line items by column name', () => {
    const result = parseCostQueryPage(page([[12.5, 'rg-web', 'USD'], ['3.10', 'rg-web', 'USD']]))

    expect(result.nextPageToken).toBeNull()
    expect(result.lineItems.map((i) => i.preTaxCost.toFixed(2))).toEqual(['12.50', '3.10'])
    expect(result.lineItems[0]?.currency).toBe('USD')
    expect(result.lineItems[0]?.resourceGroup).toBe('rg-web')
  })

  it('matches column names case-insensitively, including PreTaxCost', () => {
    const columns = [
      { name: 'Currency', type: 'String' },
      { name: 'PRETAXCOST', type: 'Number' },
    ]
    const result = parseCostQueryPage(page([['EUR', 9]], null, columns))
    expect(result.lineItems[0]?.preTaxCost.toFixed(2)).toBe('9.00')
    expect(result.lineItems[0]?.currency).toBe('EUR')
    expect(result.lineItems[0]?.resourceGroup).toBeNull()
  })

  it('returns the continuation link, treating an empty one as absent', () => {
    expect(parseCostQueryPage(page([], 'https://management.azure.com/p2')).nextPageToken).toBe(
      'https://management.azure.com/p2',
    )
    expect(parseCostQueryPage(page([], '')).nextPageToken).toBeNull()
  })

  it('accepts a page with no rows and no columns', () => {
    expect(parseCostQueryPage({ properties: {} })).toEqual({ lineItems: [], nextPageToken: null })
  })

  it('counts a null or empty cost cell as zero', () => {
    const result = parseCostQueryPage(page([[null, 'rg', 'USD'], ['', 'rg', 'USD']]))
    expect(result.lineItems.every((i) => i.preTaxCost.isZero())).toBe(true)
  })

  it('rejects rows when no cost column is present', () => {
    const columns = [{ name: 'ResourceGroupName', type: 'String' }]
    expect(() => parseCostQueryPage(page([['rg']], null, columns))).toThrow('Query result has no cost column')
  })

  it('rejects an unreadable cost value', () => {
    expect(() => parseCostQueryPage(page([['lots', 'rg', 'USD']]))).toThrow(ResponseFormatError)
  })

  it('rejects a cost with an out-of-range exponent', () => {
    expect(() => parseCostQueryPage(page([['1e999999999', 'rg', 'USD']]))).toThrow(
      'Row 0 has an unreadable cost: Cost amount exponent out of range: "1e999999999"',
    )
  })

  it('rejects a body without properties', () => {
    expect(() => parseCostQueryPage({ value: [] })).toThrow('Response is not a cost query result')
  })
})
