/**
 * deliberate - Main module exports
 * Public API surface for embedding deliberations in other programs
 */

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { DeliberationEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Service lifecycle
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export * from './modules/config/index.js'

// Backend client
export * from './modules/backend/index.js'

// Deliberation engine
export * from './modules/deliberation/index.js'

// Job layer
export * from './modules/job-runner/index.js'
export { createDatabaseService, IN_MEMORY_DATABASE } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
