/**
 * HTTP Server
 *
 * @module server
 */

import type { Server } from 'node:http';
import type { AppConfig } from '../config/index.js';
import { createMatchService } from '../orchestrator/factory.js';
import type { Logger } from '../utils/logger.js';
import { createApp } from './app.js';

export { createApp, requesterOf, ANALYZE_PATH, type AppDependencies } from './app.js';
export { toHttpResponse, readAnalyzeBody, type HttpResponse, type ErrorBody, type SuccessBody } from './responses.js';

export interface RunningServer {
  server: Server;
  port: number;
  /** Stop accepting connections, then release the store */
  close(): Promise<void>;
}

export interface StartServerOptions {
  config: AppConfig;
  logger: Logger;
  version: string;
  /** Overrides `config.port` */
  port?: number;
}

/**
 * Build the collaborators and start listening.
 */
export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { config, logger, version } = options;
  const service = await createMatchService(config, logger);
  const app = createApp({ orchestrator: service.orchestrator, version, logger });
  const port = options.port ?? config.port;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => resolve(listening));
    listening.once('error', reject);
  }).catch(async (error: unknown) => {
    await service.close();
    throw error;
  });

  const address = server.address();
  const boundPort = address !== null && typeof address !== 'string' ? address.port : port;
  logger.info(`Syllabus matcher listening on http://localhost:${boundPort}`);
  logger.info(`Storage: ${config.storage.backend}, persistence: ${config.storage.policy}`);

  return {
    server,
    port: boundPort,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await service.close();
    },
  };
}
