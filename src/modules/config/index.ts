/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, readEnvOverrides, resolveRunSettings, toSubscriptionTargets, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  GUID_PATTERN,
  SubscriptionEntrySchema,
  RunSettingsSchema,
  PartialRunSettingsSchema,
  TargetsFileSchema,
} from './config-schema.js'
export type { SubscriptionEntry, RunSettings, PartialRunSettings, TargetsFile } from './config-schema.js'
export { DEFAULT_RUN_SETTINGS } from './defaults.js'
