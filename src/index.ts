/**
 * rg-cost-report - Main module exports
 * Public API surface for collecting monthly resource group costs
 */

// Core types
export * from './core/types.js'
export type { CollectionEvents } from './core/event-bus.types.js'
export type { TypedEventBus } from './core/event-bus.js'
export { createEventBus } from './core/event-bus.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger } from './utils/logger.js'
export * from './utils/helpers.js'

// Modules
export * from './modules/auth/index.js'
export * from './modules/billing-period/index.js'
export * from './modules/collection/index.js'
export * from './modules/config/index.js'
export * from './modules/config-builder/index.js'
export * from './modules/cost-aggregator/index.js'
export * from './modules/cost-query/index.js'
export * from './modules/report/index.js'
