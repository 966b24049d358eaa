/**
 * HTTP outcome classification for cost query calls.
 *
 *   429, 503        → Throttled (retry hint read from headers when present)
 *   other 5xx       → TransientServerError
 *   2xx + body      → Success (FatalError if the body cannot be decoded)
 *   anything else   → FatalError
 */

import { z } from 'zod'
import type { QueryOutcome } from '../../core/types.js'
import { ResponseFormatError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { parseCostQueryPage } from './response-parser.js'

/** Headers that may carry a retry hint, in precedence order */
export const RETRY_AFTER_HEADERS = [
  'Retry-After',
  'x-ms-ratelimit-microsoft.costmanagement-qpu-retry-after',
  'x-ms-ratelimit-microsoft.costmanagement-entity-retry-after',
  'x-ms-ratelimit-microsoft.costmanagement-tenant-retry-after',
  'x-ms-ratelimit-microsoft.costmanagement-client-retry-after',
  'x-ms-ratelimit-microsoft.consumption-retry-after',
] as const

const THROTTLE_STATUSES = new Set([429, 503])

/** Longest excerpt of an unrecognized error body kept in messages */
const BODY_EXCERPT_LENGTH = 200

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
})

/** The parts of an HTTP response the classifier needs */
export interface HttpResponseSnapshot {
  status: number
  headers: Headers
  bodyText: string
}

/**
 * Read the provider retry hint in milliseconds.
 *
 * The first non-empty header in RETRY_AFTER_HEADERS decides: a number of seconds,
 * or an HTTP-date converted to a delay from `now` (never negative). An unreadable
 * value yields null so that computed backoff applies.
 */
export function parseRetryAfterMs(headers: Headers, now: Date): number | null {
  for (const name of RETRY_AFTER_HEADERS) {
    const raw = headers.get(name)?.trim()
    if (raw === undefined || raw === '') continue

    if (/^\d+(\.\d+)?$/.test(raw)) {
      return Math.round(Number(raw) * 1000)
    }
    const at = Date.parse(raw)
    if (!Number.isNaN(at)) {
      return Math.max(0, at - now.getTime())
    }
    return null
  }
  return null
}

/**
 * Human-readable reason for an error response, preferring the ARM error envelope.
 */
export function describeErrorBody(status: number, bodyText: string): string {
  let envelope: unknown
  try {
    envelope = JSON.parse(bodyText)
  } catch {
    envelope = undefined
  }

  const parsed = ErrorEnvelopeSchema.safeParse(envelope)
  if (parsed.success) {
    const { code, message } = parsed.data.error
    const detail = [code, message].filter((part): part is string => part !== undefined && part !== '').join(': ')
    if (detail !== '') return maskSecrets(`HTTP ${String(status)}: ${detail}`)
  }

  const excerpt = bodyText.trim().slice(0, BODY_EXCERPT_LENGTH)
  return maskSecrets(excerpt === '' ? `HTTP ${String(status)}` : `HTTP ${String(status)}: ${excerpt}`)
}

/**
 * Classify one HTTP response into a QueryOutcome.
 */
export function classifyResponse(response: HttpResponseSnapshot, now: Date): QueryOutcome {
  const { status, headers, bodyText } = response

  if (THROTTLE_STATUSES.has(status)) {
    return { kind: 'Throttled', status, retryAfterMs: parseRetryAfterMs(headers, now) }
  }

  if (status >= 500 && status <= 599) {
    return { kind: 'TransientServerError', status, message: describeErrorBody(status, bodyText) }
  }

  if (status < 200 || status > 299) {
    return { kind: 'FatalError', status, message: describeErrorBody(status, bodyText) }
  }

  if (bodyText.trim() === '') {
    return { kind: 'FatalError', status, message: `HTTP ${String(status)} with an empty response body` }
  }

  try {
    const page = parseCostQueryPage(JSON.parse(bodyText))
    return { kind: 'Success', lineItems: page.lineItems, nextPageToken: page.nextPageToken }
  } catch (err) {
    if (err instanceof SyntaxError) {
      return { kind: 'FatalError', status, message: `Malformed JSON response body: ${err.message}` }
    }
    if (err instanceof ResponseFormatError) {
      return { kind: 'FatalError', status, message: `Malformed cost query result: ${err.message}` }
    }
    throw err
  }
}
