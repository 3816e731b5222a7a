/**
 * Logger
 *
 * Minimal leveled logger shared by the orchestrator, the HTTP server and the
 * collaborators. Components depend on the `Logger` interface only.
 *
 * @module utils/logger
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logger interface.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Options for the console logger
 */
export interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;
  /** Prefix written before every message, e.g. the component name */
  scope?: string;
  /** Disable chalk colors */
  color?: boolean;
}

/**
 * Create a logger that writes to the console.
 *
 * Debug and info go to stdout, warnings and errors to stderr.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', scope: 'server' });
 * logger.info('Listening on port %d', 8000);
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  const prefix = options.scope ? `[${options.scope}] ` : '';

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) {
        console.log(paint.dim(`${prefix}[DEBUG] ${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (enabled('info')) {
        console.log(`${prefix}${message}`, ...args);
      }
    },
    warn(message, ...args) {
      if (enabled('warn')) {
        console.warn(paint.yellow(`${prefix}Warning: ${message}`), ...args);
      }
    },
    error(message, ...args) {
      if (enabled('error')) {
        console.error(paint.red(`${prefix}Error: ${message}`), ...args);
      }
    },
  };
}

/**
 * Logger that discards everything. Used as the default in library code.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
