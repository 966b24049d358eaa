/**
 * ConfigSystem implementation — loads the targets file and resolves run settings.
 *
 * Settings hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → targets file       (`settings:` section)
 *     → environment vars   (RGCOST_* prefixed)
 *     → CLI flag overrides (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { resolve } from 'path'
import yaml from 'js-yaml'
import { z } from 'zod'
import type { ZodIssue } from 'zod'
import type { SubscriptionTarget } from '../../core/types.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  PartialRunSettingsSchema,
  RunSettingsSchema,
  TargetsFileSchema,
  type PartialRunSettings,
  type RunSettings,
  type SubscriptionEntry,
  type TargetsFile,
} from './config-schema.js'
import { DEFAULT_RUN_SETTINGS } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of RGCOST_ environment variable names to run settings keys.
 */
export const ENV_VAR_MAP: Record<string, keyof RunSettings> = {
  RGCOST_PACING_SECONDS: 'pacing_seconds',
  RGCOST_MAX_RETRIES: 'max_retries',
  RGCOST_BASE_SLEEP_SECONDS: 'base_sleep_seconds',
  RGCOST_MAX_BACKOFF_SECONDS: 'max_backoff_seconds',
  RGCOST_JITTER_RATIO: 'jitter_ratio',
  RGCOST_CLIENT_TYPE: 'client_type',
  RGCOST_REQUEST_TIMEOUT_SECONDS: 'request_timeout_seconds',
  RGCOST_FAIL_ON_ERROR: 'fail_on_error',
}

/**
 * Convert a raw environment string to the type the setting's schema expects.
 * Values that cannot be converted are passed through so validation reports them.
 */
function coerceEnvValue(raw: string, schema: z.ZodTypeAny): unknown {
  const value = raw.trim()
  if (schema instanceof z.ZodNumber) {
    return value === '' ? raw : Number(value)
  }
  if (schema instanceof z.ZodBoolean) {
    const lowered = value.toLowerCase()
    if (lowered === 'true' || lowered === '1') return true
    if (lowered === 'false' || lowered === '0') return false
    return raw
  }
  return raw
}

/**
 * Read RGCOST_* variables and return a partial settings overlay.
 * Each variable is converted and validated on its own; an invalid one is
 * ignored with a warning and the others still apply.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialRunSettings {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, settingKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const schema = RunSettingsSchema.shape[settingKey]
    const parsed = schema.safeParse(coerceEnvValue(rawValue, schema))
    if (!parsed.success) {
      logger.warn({ envKey, errors: parsed.error.issues }, `Invalid value for ${envKey} ignored`)
      continue
    }
    overrides[settingKey] = parsed.data
  }

  return PartialRunSettingsSchema.parse(overrides)
}

// ---------------------------------------------------------------------------
// Settings and target resolution
// ---------------------------------------------------------------------------

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

/**
 * Merge setting layers in priority order and validate the result.
 * @throws {ConfigError} when the merged settings are invalid
 */
export function resolveRunSettings(layers: PartialRunSettings[]): RunSettings {
  let merged: PartialRunSettings = { ...DEFAULT_RUN_SETTINGS }
  for (const layer of layers) {
    merged = { ...merged, ...layer }
  }

  const result = RunSettingsSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(`Invalid run settings:\n${formatIssues(result.error.issues)}`, {
      issues: result.error.issues,
    })
  }
  return result.data
}

/**
 * Convert validated subscription entries to targets.
 * Resource groups are an ordered set: later case-insensitive duplicates are dropped.
 */
export function toSubscriptionTargets(entries: SubscriptionEntry[]): SubscriptionTarget[] {
  return entries.map((entry) => {
    const seen = new Set<string>()
    const resourceGroups: string[] = []
    for (const resourceGroup of entry.resource_groups) {
      const key = resourceGroup.toLowerCase()
      if (seen.has(key)) {
        logger.warn({ subscriptionId: entry.id, resourceGroup }, 'Duplicate resource group ignored')
        continue
      }
      seen.add(key)
      resourceGroups.push(resourceGroup)
    }

    if (resourceGroups.length === 0) {
      logger.warn({ subscriptionId: entry.id }, 'Subscription has no resource groups; nothing to query')
    }

    return {
      subscriptionId: entry.id,
      resourceGroups,
      ...(entry.name !== undefined && entry.name !== '' && { displayName: entry.name }),
    }
  })
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _targets: SubscriptionTarget[] | null = null
  private _settings: RunSettings | null = null
  private readonly _configPath: string
  private readonly _cliOverrides: PartialRunSettings
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions) {
    this._configPath = resolve(options.configPath)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._targets !== null && this._settings !== null
  }

  async load(): Promise<void> {
    const file = await this._loadTargetsFile()

    if (file.subscriptions.length === 0) {
      throw new ConfigError(`No subscriptions in config: ${this._configPath}`, { filePath: this._configPath })
    }

    const settings = resolveRunSettings([
      file.settings ?? {},
      readEnvOverrides(this._env),
      this._cliOverrides,
    ])

    this._targets = toSubscriptionTargets(file.subscriptions)
    this._settings = settings
    logger.debug(
      { filePath: this._configPath, subscriptionCount: this._targets.length },
      'Configuration loaded successfully',
    )
  }

  getTargets(): SubscriptionTarget[] {
    if (this._targets === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getTargets().')
    }
    return this._targets
  }

  getSettings(): RunSettings {
    if (this._settings === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getSettings().')
    }
    return this._settings
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadTargetsFile(): Promise<TargetsFile> {
    const filePath = this._configPath

    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Cannot read config file ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Config file ${filePath} is not valid YAML: ${message}`, { filePath })
    }

    if (parsed === null || parsed === undefined) {
      throw new ConfigError(`No subscriptions in config: ${filePath}`, { filePath })
    }

    const result = TargetsFileSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions): ConfigSystem {
  return new ConfigSystemImpl(options)
}
