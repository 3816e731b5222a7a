/**
 * Serve Command
 *
 * Starts the HTTP server and keeps it running until SIGINT or SIGTERM.
 *
 * @module cli/commands/serve
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES } from '../base-command.js';
import { VERSION } from '../version.js';
import { startServer } from '../../server/index.js';

export interface ServeOptions {
  port?: string;
}

/**
 * Parse a --port value.
 *
 * @throws Error if the value is not a TCP port number
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Register the serve command.
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8000)')
    .action(async (options: ServeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = base.loadConfig();
      const running = await startServer({
        config,
        logger: base.logger(config.logLevel),
        version: VERSION,
        port: options.port !== undefined ? parsePort(options.port) : undefined,
      });

      const shutdown = (signal: string) => {
        base.info(`Received ${signal}, shutting down`);
        void running.close().then(
          () => base.exitWith(EXIT_CODES.SUCCESS),
          (error: unknown) => base.error('Shutdown failed', error instanceof Error ? error : undefined)
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
