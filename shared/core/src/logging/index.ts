/**
 * Logging Module
 *
 * For production code:
 * - createPinoLogger() / getLogger() - cached Pino loggers
 *
 * For tests:
 * - RecordingLogger - Captures logs for assertions
 * - NullLogger - Silently discards logs
 */

export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
} from './types';

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
} from './pino-logger';

export {
  RecordingLogger,
  NullLogger,
} from './testing-logger';
export type { LogEntry } from './testing-logger';
