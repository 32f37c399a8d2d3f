/**
 * Logger Type Definitions
 *
 * Defines the ILogger interface that decouples the codebase from the
 * logging library. Components take an ILogger through their constructor;
 * production passes a Pino-backed logger, tests a RecordingLogger.
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
 * class Aggregator {
 *   constructor(private logger: ILogger) {}
 * }
 *
 * // Production
 * new Aggregator(createLogger('aggregator'));
 *
 * // Test
 * const logger = new RecordingLogger();
 * new Aggregator(logger);
 * expect(logger.getWarnings()).toHaveLength(0);
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
   * Create a child logger whose bindings are merged into every entry.
   *
   * @example
   * ```typescript
   * const groupLogger = logger.child({ trafficGroup: 'web' });
   * groupLogger.info('Transition'); // { trafficGroup: 'web', msg: 'Transition' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /** Service/module name for log identification */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL ?? 'info'
   */
  level?: LogLevel;

  /**
   * Enable pretty printing.
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /** Additional context to include in every log entry */
  bindings?: LogMeta;
}
