/**
 * Built-in default run settings.
 *
 * These are the lowest-priority values; they are overridden by:
 *   targets file `settings:` → environment variables → CLI flags
 */

import type { RunSettings } from './config-schema.js'

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  pacing_seconds: 1,
  max_retries: 8,
  base_sleep_seconds: 2,
  max_backoff_seconds: 60,
  jitter_ratio: 0.2,
  client_type: 'rg-cost-collector',
  request_timeout_seconds: 60,
  fail_on_error: false,
}
