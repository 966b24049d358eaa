/**
 * Zod validation schemas for the rg-cost-report configuration.
 *
 * Defines schemas for:
 *  - subscription entries of the targets file
 *  - run settings (pacing, retry, timeout, client label)
 *  - the full targets file document
 */

import { z } from 'zod'

/** Subscription ids are GUIDs: 8-4-4-4-12 hex digits */
export const GUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/

// ---------------------------------------------------------------------------
// Subscription entries
// ---------------------------------------------------------------------------

export const SubscriptionEntrySchema = z
  .object({
    id: z.string().trim().regex(GUID_PATTERN, 'must be a subscription GUID'),
    /** Display name; informational only */
    name: z.string().optional(),
    resource_groups: z.array(z.string().trim().min(1)).default([]),
  })
  .strict()

export type SubscriptionEntry = z.infer<typeof SubscriptionEntrySchema>

// ---------------------------------------------------------------------------
// Run settings
// ---------------------------------------------------------------------------

export const RunSettingsSchema = z
  .object({
    /** Pause between consecutive (subscription, resource group) queries */
    pacing_seconds: z.number().min(0),
    /** Total attempts per query page, including the first */
    max_retries: z.number().int().min(1).max(50),
    /** Base of the exponential backoff */
    base_sleep_seconds: z.number().positive(),
    /** Cap of the computed backoff (provider retry hints are not capped) */
    max_backoff_seconds: z.number().positive(),
    /** Upper bound of random jitter as a fraction of the delay */
    jitter_ratio: z.number().min(0).max(1),
    /** ClientType header value sent with every request */
    client_type: z.string().min(1),
    /** Bound on a single HTTP exchange */
    request_timeout_seconds: z.number().positive(),
    /** Exit non-zero when any pair failed */
    fail_on_error: z.boolean(),
  })
  .strict()

export type RunSettings = z.infer<typeof RunSettingsSchema>

export const PartialRunSettingsSchema = RunSettingsSchema.partial()

export type PartialRunSettings = z.infer<typeof PartialRunSettingsSchema>

// ---------------------------------------------------------------------------
// Targets file
// ---------------------------------------------------------------------------

export const TargetsFileSchema = z
  .object({
    subscriptions: z.array(SubscriptionEntrySchema),
    settings: PartialRunSettingsSchema.optional(),
  })
  .strict()

export type TargetsFile = z.infer<typeof TargetsFileSchema>
