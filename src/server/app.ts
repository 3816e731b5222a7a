/**
 * HTTP Application
 *
 * Express app exposing the analysis endpoint and a health check. All
 * analysis logic lives in the orchestrator; handlers only translate.
 *
 * @module server/app
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import type { Requester } from '../auth/gate.js';
import type { MatchOrchestrator } from '../orchestrator/orchestrator.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { INTERNAL_ERROR_BODY, NOT_FOUND_BODY, readAnalyzeBody, toHttpResponse } from './responses.js';

export interface AppDependencies {
  orchestrator: Pick<MatchOrchestrator, 'analyze'>;
  version: string;
  logger?: Logger;
  /** Largest accepted request body (default: '1mb') */
  bodyLimit?: string;
}

export const ANALYZE_PATH = '/playlist-analyze/';

/**
 * Identify the caller from the connection and the Authorization header.
 */
export function requesterOf(req: Request): Requester {
  return {
    address: req.ip ?? req.socket.remoteAddress ?? 'unknown',
    authorization: req.get('authorization'),
  };
}

/**
 * JSON body parser that leaves the body undefined instead of failing when
 * the payload is not valid JSON; the orchestrator then reports the missing
 * fields.
 */
function lenientJson(limit: string, logger: Logger): RequestHandler {
  const parse = express.json({ limit });
  return (req, res, next) => {
    parse(req, res, (error?: unknown) => {
      if (error) {
        logger.debug(`Ignoring unreadable request body: ${error instanceof Error ? error.message : String(error)}`);
        req.body = undefined;
      }
      next();
    });
  };
}

export function createApp(deps: AppDependencies): Express {
  const logger = deps.logger ?? silentLogger;
  const app = express();

  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: deps.version });
  });

  app.post(ANALYZE_PATH, lenientJson(deps.bodyLimit ?? '1mb', logger), async (req, res, next) => {
    // Cancel the analysis if the client goes away before the response is sent
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const outcome = await deps.orchestrator.analyze(
        { ...readAnalyzeBody(req.body), requester: requesterOf(req) },
        { signal: controller.signal }
      );
      const response = toHttpResponse(outcome);

      if (!outcome.ok) {
        const { error } = outcome;
        const line = `${req.method} ${req.path} ${response.status} ${error.kind} at ${error.stage}: ${error.detail}`;
        if (response.status >= 500) {
          logger.error(line);
        } else {
          logger.warn(line);
        }
      } else {
        logger.info(`${req.method} ${req.path} 200 (${outcome.result.recommendations.length} recommendations)`);
      }

      if (controller.signal.aborted) {
        return;
      }
      res.status(response.status).json(response.body);
    } catch (error) {
      next(error);
    }
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json(NOT_FOUND_BODY);
  });

  // Error handling
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error(`Unhandled error on ${req.method} ${req.path}:`, err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json(INTERNAL_ERROR_BODY);
  });

  return app;
}
