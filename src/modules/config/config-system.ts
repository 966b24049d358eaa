/**
 * ConfigSystem interface — public contract for loading a run's configuration.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { SubscriptionTarget } from '../../core/types.js'
import type { PartialRunSettings, RunSettings } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the YAML targets file */
  configPath: string
  /**
   * Values that override everything else.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialRunSettings
  /** Environment to read RGCOST_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides validated targets and fully-merged run settings.
 *
 * Settings hierarchy (lowest → highest priority):
 *   built-in defaults < targets file settings < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Read and validate the targets file and resolve settings.
   * @throws {ConfigError} when the file is missing, unreadable or invalid
   */
  load(): Promise<void>

  /**
   * Subscriptions and their resource groups in configured order.
   * @throws {ConfigError} if `load()` has not been called
   */
  getTargets(): SubscriptionTarget[]

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getSettings(): RunSettings

  readonly isLoaded: boolean
}
