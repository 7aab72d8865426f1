/**
 * Logger Type Definitions
 *
 * ILogger decouples the cache and lock components from the logging library.
 * Components receive a logger through their constructor; production code
 * passes the pino-backed logger, tests pass a RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class SlotInventory {
 *   constructor(private logger: ILogger) {}
 * }
 *
 * // Production
 * new SlotInventory(createLogger('slot-inventory'));
 *
 * // Test
 * const logger = new RecordingLogger();
 * new SlotInventory(logger);
 * expect(logger.getLogs('warn')).toHaveLength(0);
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
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Useful for skipping metadata construction on hot paths.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Component name, also used as the cache key for the logger instance */
  name: string;

  /** @default process.env.LOG_LEVEL ?? 'info' */
  level?: LogLevel;

  /** @default process.env.NODE_ENV === 'development' */
  pretty?: boolean;

  bindings?: LogMeta;
}
