/**
 * Logger Type Definitions
 *
 * Defines the ILogger interface that decouples the risk components from the
 * logging library. Components take an ILogger by constructor injection; tests
 * pass a RecordingLogger or NullLogger instead of mocking the module.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * // Production (the default when no logger is passed)
 * new StopLossManager({ logger: createPinoLogger('stop-loss-manager') });
 *
 * // Test
 * new StopLossManager({ logger: new RecordingLogger() });
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   * Useful for avoiding expensive computations for disabled levels.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Component name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL or 'info'
   */
  level?: LogLevel;

  /**
   * Enable pretty printing (development mode).
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}
