/**
 * Config builder module — barrel export.
 */

export type { CsvTargetRow, DetectedColumns } from './csv-input.js'
export {
  RESOURCE_GROUP_COLUMN,
  SUBSCRIPTION_COLUMN,
  detectColumns,
  parseCsv,
  parseTargetRows,
  readTargetRows,
} from './csv-input.js'
export type {
  ArmSubscriptionDirectoryOptions,
  SubscriptionDirectory,
  SubscriptionInfo,
} from './subscription-directory.js'
export { ArmSubscriptionDirectory, SUBSCRIPTIONS_API_VERSION } from './subscription-directory.js'
export type {
  BuildTargetsResult,
  OutputPathOptions,
  ResolvedOutputPath,
  SubscriptionIndex,
  TargetsDocument,
  TargetsDocumentEntry,
} from './targets-builder.js'
export {
  DEFAULT_TARGETS_FILE_NAME,
  buildSubscriptionIndex,
  buildTargetsDocument,
  renderTargetsYaml,
  resolveOutputPath,
  resolveSubscriptionId,
  writeTargetsFile,
} from './targets-builder.js'
