/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const logger = pino({ level: 'debug' });
 * const engine = new DeliveryEngine(transport, { logger });
 * ```
 *
 * @example Winston
 * ```typescript
 * import winston from 'winston';
 * const logger = winston.createLogger({ level: 'debug' });
 * const engine = new DeliveryEngine(transport, { logger });
 * ```
 *
 * @example Console
 * ```typescript
 * const engine = new DeliveryEngine(transport, { logger: console });
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (message: string, ...args: unknown[]) => console.debug(message, ...args),
  info: (message: string, ...args: unknown[]) => console.info(message, ...args),
  warn: (message: string, ...args: unknown[]) => console.warn(message, ...args),
  error: (message: string, ...args: unknown[]) => console.error(message, ...args),
};

/**
 * Silent logger - no output
 * Useful for testing or when you want to completely disable logging
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  const minLevelNum = levels[minLevel];

  return {
    debug: (message: string, ...args: unknown[]) => {
      if (levels.debug >= minLevelNum) baseLogger.debug(message, ...args);
    },
    info: (message: string, ...args: unknown[]) => {
      if (levels.info >= minLevelNum) baseLogger.info(message, ...args);
    },
    warn: (message: string, ...args: unknown[]) => {
      if (levels.warn >= minLevelNum) baseLogger.warn(message, ...args);
    },
    error: (message: string, ...args: unknown[]) => {
      if (levels.error >= minLevelNum) baseLogger.error(message, ...args);
    },
  };
}
