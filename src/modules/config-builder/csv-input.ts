/**
 * Reading the subscriptions/resource-groups CSV that seeds a targets file.
 */

import { readFile } from 'fs/promises'
import { InputFileError } from '../../core/errors.js'

export const SUBSCRIPTION_COLUMN = 'subscription'
export const RESOURCE_GROUP_COLUMN = 'resource_group'

/** One usable CSV row: a subscription id or display name and a resource group */
export interface CsvTargetRow {
  subscription: string
  resourceGroup: string
}

export interface DetectedColumns {
  subscriptionIndex: number
  resourceGroupIndex: number
}

/**
 * Split CSV text into records.
 *
 * Accepts a leading byte-order mark, quoted fields with `""` escapes and
 * embedded separators or line breaks, and CRLF or LF line endings.
 * Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let inQuotes = false
  let i = 0

  while (i < input.length) {
    const ch = input.charAt(i)

    if (inQuotes) {
      if (ch === '"') {
        if (input.charAt(i + 1) === '"') {
          field += '"'
          i += 2
          continue
        }
        inQuotes = false
      } else {
        field += ch
      }
      i += 1
      continue
    }

    if (ch === '"') {
      inQuotes = true
    } else if (ch === ',') {
      record.push(field)
      field = ''
    } else if (ch === '\r' || ch === '\n') {
      record.push(field)
      records.push(record)
      record = []
      field = ''
      if (ch === '\r' && input.charAt(i + 1) === '\n') i += 1
    } else {
      field += ch
    }
    i += 1
  }

  if (inQuotes) {
    throw new InputFileError('Unterminated quoted field in CSV input')
  }
  if (field !== '' || record.length > 0) {
    record.push(field)
    records.push(record)
  }

  return records.filter((r) => !(r.length === 1 && r[0] === ''))
}

/**
 * Locate the subscription and resource group columns (case-insensitive, trimmed).
 */
export function detectColumns(header: readonly string[]): DetectedColumns {
  const normalized = header.map((name) => name.trim().toLowerCase())
  const subscriptionIndex = normalized.indexOf(SUBSCRIPTION_COLUMN)
  const resourceGroupIndex = normalized.indexOf(RESOURCE_GROUP_COLUMN)

  if (subscriptionIndex === -1 || resourceGroupIndex === -1) {
    const found = header.filter((name) => name !== '').join(', ')
    throw new InputFileError(
      `Could not detect CSV headers. Found columns: ${found === '' ? '(none)' : found}. ` +
        `Expected something like: ${SUBSCRIPTION_COLUMN},${RESOURCE_GROUP_COLUMN}`,
      { found: header },
    )
  }
  return { subscriptionIndex, resourceGroupIndex }
}

/**
 * Parse CSV text into target rows, skipping rows with a blank subscription or resource group.
 */
export function parseTargetRows(text: string): CsvTargetRow[] {
  const [header, ...body] = parseCsv(text)
  if (header === undefined) {
    throw new InputFileError('CSV input is empty')
  }

  const { subscriptionIndex, resourceGroupIndex } = detectColumns(header)
  const rows: CsvTargetRow[] = []
  for (const record of body) {
    const subscription = (record[subscriptionIndex] ?? '').trim()
    const resourceGroup = (record[resourceGroupIndex] ?? '').trim()
    if (subscription === '' || resourceGroup === '') continue
    rows.push({ subscription, resourceGroup })
  }
  return rows
}

/**
 * Read and parse a subscriptions CSV file.
 * @throws {InputFileError} when the file cannot be read or has no recognizable header
 */
export async function readTargetRows(filePath: string): Promise<CsvTargetRow[]> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new InputFileError(`Cannot read CSV file ${filePath}: ${message}`, { filePath })
  }
  return parseTargetRows(text)
}
