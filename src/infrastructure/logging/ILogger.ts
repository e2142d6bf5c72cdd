/**
 * @fileoverview Logger port used by the instrumentation layer
 *
 * The instrumentation never lets a telemetry problem reach business code;
 * it reports such problems through this interface instead. Any logger with
 * the four level methods (console, pino, winston, a test double) fits.
 *
 * @module @spanlink/core/infrastructure/logging
 */

/**
 * Logger interface for the instrumentation layer
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels in ascending severity. `silent` disables every level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Logger that drops everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Wrap a logger so that messages below `level` are dropped.
 *
 * @example
 * ```typescript
 * const logger = createLeveledLogger(consoleLogger, 'warn');
 * logger.debug('dropped');
 * logger.warn('printed');
 * ```
 */
export function createLeveledLogger(logger: ILogger, level: LogLevel): ILogger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) logger.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) logger.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) logger.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) logger.error(message, ...args);
    },
  };
}
