/**
 * qualitygate - Main module exports
 * Public API surface for embedding the gate engine
 */

// Core types
export * from './core/types.js'

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { QualityGateEvents } from './core/event-bus.types.js'
export { createEventBus, TypedEventBusImpl } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceLifecycle } from './core/di.js'

// Quality gates
export * from './modules/quality-gates/index.js'

// Configuration
export * from './modules/config/index.js'

// Persistence
export { createDatabaseService, DatabaseServiceImpl, IN_MEMORY } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations } from './persistence/migrations/index.js'
