/**
 * Collection module — barrel export.
 */

export type { CollectionPipelineOptions, CollectionRunOptions, LineItemSource } from './collection-pipeline.js'
export { CollectionPipeline, expandPairs } from './collection-pipeline.js'
export type { CollectorDependencies } from './factory.js'
export { createCollectionPipeline, toRetryPolicy } from './factory.js'
