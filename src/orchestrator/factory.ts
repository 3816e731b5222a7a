/**
 * Orchestrator Factory
 *
 * Builds the production collaborators from configuration and wires them
 * into a MatchOrchestrator.
 *
 * @module orchestrator/factory
 */

import { requireApiKey, type AppConfig } from '../config/index.js';
import { TokenAuthGate, type AuthGate } from '../auth/gate.js';
import { createRateLimitPolicy, type RateLimitPolicy } from '../limits/rate-limiter.js';
import { GeminiModel } from '../matching/model-client.js';
import { YouTubePlaylistClient } from '../playlist/client.js';
import { createRecommendationStore, type RecommendationStore } from '../storage/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { MatchOrchestrator } from './orchestrator.js';
import type { AnalysisCallbacks } from './types.js';

export interface OrchestratorOverrides {
  /** Default: a TokenAuthGate over `AUTH_TOKENS` */
  authGate?: AuthGate;
  /** Default: the configured fixed-window quota */
  rateLimit?: RateLimitPolicy;
  callbacks?: AnalysisCallbacks;
}

export interface MatchService {
  orchestrator: MatchOrchestrator;
  store: RecommendationStore;
  /** Release the store connection */
  close(): Promise<void>;
}

/**
 * Create the orchestrator for this process.
 *
 * @throws Error if a required API key is missing or the store cannot be opened
 */
export async function createMatchService(
  config: AppConfig,
  logger: Logger = silentLogger,
  overrides: OrchestratorOverrides = {}
): Promise<MatchService> {
  const geminiKey = requireApiKey(config, 'gemini');
  const youtubeKey = requireApiKey(config, 'youtube');

  const store = await createRecommendationStore(config.storage);
  logger.debug(`Recommendation store: ${config.storage.backend}`);

  const orchestrator = new MatchOrchestrator({
    playlistSource: new YouTubePlaylistClient(youtubeKey, {
      timeoutMs: config.playlist.timeoutMs,
      maxPages: config.playlist.maxPages,
      logger,
    }),
    model: new GeminiModel(geminiKey, config.model),
    store,
    authGate: overrides.authGate ?? new TokenAuthGate(config.auth.tokens),
    rateLimit: overrides.rateLimit ?? createRateLimitPolicy(config.rateLimit),
    logger,
    persistencePolicy: config.storage.policy,
    playlistRetry: { maxRetries: config.playlist.maxRetries },
    storageRetry: { maxRetries: config.storage.maxRetries },
    callbacks: overrides.callbacks,
  });

  return {
    orchestrator,
    store,
    close: () => store.close(),
  };
}
