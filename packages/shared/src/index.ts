/**
 * Virtual node provider - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @vnode/shared
 */

// Types (includes helpers like podKey and isPodReady)
export * from './types/index';

// Errors
export * from './errors/index';

// Validation
export * from './validation/index';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  formatPretty,
  isTestEnvironment,
  isLogLevel,
  logger,
  LOG_LEVELS,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger';

// Utilities
export {
  parseQuantity,
  isQuantity,
  isPlainObject,
  isStringArray,
  isStringMap,
} from './utils/index';
