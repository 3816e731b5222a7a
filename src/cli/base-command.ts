/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A Logger for the orchestrator that follows the output flags
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { loadConfig, type AppConfig } from '../config/index.js';
import { createConsoleLogger, type Logger, type LogLevel } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override the data directory of the file store */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Input file not found */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * .action(async (file: string, options: TopicsOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   base.debug(`Reading ${file}`);
 *   base.success('Done');
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Shared Services
  // ==========================================================================

  /**
   * Logger for library code, honouring --verbose and --quiet.
   * Without either flag `fallbackLevel` applies.
   */
  logger(fallbackLevel: LogLevel = 'info'): Logger {
    const level: LogLevel = this.options.verbose ? 'debug' : this.options.quiet ? 'warn' : fallbackLevel;
    return createConsoleLogger({ level, color: this.useColor });
  }

  /**
   * Load configuration from the environment, applying --data-dir.
   *
   * @throws Error listing every invalid variable
   */
  loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    if (this.options.dataDir) {
      return loadConfig({ ...env, SYLLABUS_MATCHER_DATA_DIR: this.options.dataDir });
    }
    return loadConfig(env);
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Check if quiet mode is enabled.
   */
  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored on the program by the preAction hook.
 * Subcommands see it through their inherited options.
 *
 * @param cmd - Commander command instance
 * @returns BaseCommand, or a default one when none was stored (for testing)
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const base = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
