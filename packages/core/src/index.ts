/**
 * @catalog-sync/core
 *
 * Shared data model, interfaces and utilities for catalog synchronization
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export { Logger, silentLogger, redactSecrets, createRunId } from './logging/logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logging/logger.js';
