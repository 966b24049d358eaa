/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Bearer tokens must never appear in logs, error messages or report output.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential values inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // "Bearer <token>" as it appears in echoed request headers
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  // Bare JWTs (Azure AD access tokens): three base64url segments starting with eyJ
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g,
]

/**
 * Pino redaction paths for token-carrying fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'accessToken',
  'authorization',
  'Authorization',
  '*.token',
  '*.accessToken',
  '*.authorization',
  'headers.authorization',
  'headers.Authorization',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any recognized credential in a string with `***`.
 *
 * Best-effort scrub for provider error bodies and exception messages.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
