/**
 * @riskengine/core - Core Library
 *
 * Pre-trade and in-trade risk decisions. Value types and error classes come
 * from @riskengine/types, limits from @riskengine/config.
 *
 * @module @riskengine/core
 */

// =============================================================================
// Logging
// =============================================================================

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
  RecordingLogger,
  NullLogger,
} from './logging';
export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
  LogEntry,
} from './logging';

// =============================================================================
// Risk
// =============================================================================

export * from './risk';
