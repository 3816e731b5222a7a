/**
 * Match Orchestrator
 *
 * Runs one analysis through the linear, fail-fast stage sequence:
 *
 * rate_limit_checked → authenticated → input_validated → playlist_fetched →
 * topics_extracted → prompt_built → model_responded → response_parsed →
 * persisted → completed
 *
 * Each collaborator failure is classified into an AnalysisError carrying the
 * stage that produced it. Only the playlist fetch and the store write are
 * retried; the model call and parsing never are.
 *
 * @module orchestrator/orchestrator
 */

import { randomUUID } from 'node:crypto';
import type { AuthGate } from '../auth/gate.js';
import type { RateLimitPolicy } from '../limits/rate-limiter.js';
import type { GenerativeModel } from '../matching/model-client.js';
import { parseMatchResponse } from '../matching/parser.js';
import { buildMatchPrompt } from '../matching/prompts.js';
import type { PlaylistSource } from '../playlist/client.js';
import type { RecommendationDocument, VideoTitle } from '../schemas/recommendation.js';
import type { RecommendationStore } from '../storage/types.js';
import { extractTopics } from '../topics/extractor.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { AbortedError } from '../utils/timeout.js';
import { AnalysisError, describeCause, isAnalysisError, type AnalysisErrorKind } from './errors.js';
import type {
  AnalysisCallbacks,
  AnalysisOutcome,
  AnalysisRequest,
  AnalysisResult,
  AnalysisStage,
  AnalyzeOptions,
  PersistencePolicy,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Retry settings for one collaborator call.
 */
export type StageRetryOptions = Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>;

export interface OrchestratorDependencies {
  playlistSource: PlaylistSource;
  model: GenerativeModel;
  store: RecommendationStore;
  rateLimit: RateLimitPolicy;
  authGate: AuthGate;
  logger?: Logger;
  /** Default: 'best-effort' */
  persistencePolicy?: PersistencePolicy;
  playlistRetry?: StageRetryOptions;
  storageRetry?: StageRetryOptions;
  callbacks?: AnalysisCallbacks;
  /** Clock for `created_at` */
  now?: () => Date;
  /** Source of each analysis's `request_id` (default: random UUID) */
  newRequestId?: () => string;
}

/**
 * Per-analysis bookkeeping: current stage, timing and cancellation.
 */
class StageTracker {
  private stage: AnalysisStage = 'rate_limit_checked';
  private lastTransition = Date.now();

  constructor(
    private readonly logger: Logger,
    private readonly callbacks: AnalysisCallbacks,
    private readonly signal: AbortSignal | undefined
  ) {}

  /**
   * Move to `stage`, failing with AnalysisCancelled if the caller has gone.
   */
  enter(stage: AnalysisStage): void {
    this.stage = stage;
    this.ensureActive();

    const now = Date.now();
    const elapsed = now - this.lastTransition;
    this.lastTransition = now;
    this.logger.debug(`Stage ${stage} (+${elapsed}ms)`);
    this.callbacks.onStage?.(stage, elapsed);
  }

  ensureActive(): void {
    if (this.signal?.aborted) {
      throw this.fail('AnalysisCancelled', 'Request was cancelled by the caller');
    }
  }

  fail(kind: AnalysisErrorKind, detail: string, cause?: unknown, rawOutput?: string): AnalysisError {
    return new AnalysisError(kind, this.stage, detail, { cause, rawOutput });
  }

  /**
   * Classify a collaborator failure: cancellations win over `kind`.
   */
  wrap(kind: AnalysisErrorKind, error: unknown): AnalysisError {
    if (error instanceof AbortedError || this.signal?.aborted) {
      return this.fail('AnalysisCancelled', describeCause(error), error);
    }
    return this.fail(kind, describeCause(error), error);
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Staged analysis pipeline over injected collaborators.
 *
 * @example
 * ```typescript
 * const orchestrator = new MatchOrchestrator({
 *   playlistSource, model, store, authGate,
 *   rateLimit: createRateLimitPolicy(),
 * });
 * const outcome = await orchestrator.analyze({
 *   playlistUrl: 'https://www.youtube.com/playlist?list=PL123',
 *   syllabusText: '1. Binary Trees',
 *   requester: { address: '127.0.0.1', authorization: 'Bearer test-token' },
 * });
 * ```
 */
export class MatchOrchestrator {
  private readonly logger: Logger;
  private readonly persistencePolicy: PersistencePolicy;
  private readonly now: () => Date;
  private readonly newRequestId: () => string;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.logger = deps.logger ?? silentLogger;
    this.persistencePolicy = deps.persistencePolicy ?? 'best-effort';
    this.now = deps.now ?? (() => new Date());
    this.newRequestId = deps.newRequestId ?? randomUUID;
  }

  /**
   * Run one analysis. Resolves with an outcome for every collaborator
   * failure; never rejects with an unclassified collaborator error.
   */
  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    const tracker = new StageTracker(this.logger, this.deps.callbacks ?? {}, options.signal);

    try {
      const result = await this.run(request, tracker, options.signal);
      return { ok: true, result };
    } catch (error) {
      if (!isAnalysisError(error)) {
        throw error;
      }
      this.logger.debug(`Analysis failed at ${error.stage}: ${error.kind}: ${error.detail}`);
      this.deps.callbacks?.onFailure?.(error);
      return { ok: false, error };
    }
  }

  private async run(
    request: AnalysisRequest,
    tracker: StageTracker,
    signal: AbortSignal | undefined
  ): Promise<AnalysisResult> {
    // Rate limit first: a rejected request makes no external call
    tracker.enter('rate_limit_checked');
    const { rateLimit } = this.deps;
    if (!rateLimit.limiter.checkAndConsume(rateLimit.identify(request.requester))) {
      throw tracker.fail('RateLimitExceeded', 'Rate limit exceeded. Please try again later.');
    }

    tracker.enter('authenticated');
    const identity = this.deps.authGate.identityOf(request.requester);
    if (identity === null) {
      throw tracker.fail('AuthenticationRequired', 'Authentication credentials were not provided.');
    }

    tracker.enter('input_validated');
    const { playlistUrl, syllabusText } = validateInput(request, tracker);

    tracker.enter('playlist_fetched');
    const videoTitles = await this.fetchTitles(playlistUrl, tracker, signal);

    tracker.enter('topics_extracted');
    const topics = extractTopics(syllabusText);
    this.logger.debug(`Extracted ${topics.length} topics; playlist has ${videoTitles.length} titles`);

    tracker.enter('prompt_built');
    const prompt = buildMatchPrompt(topics, videoTitles);

    tracker.enter('model_responded');
    let rawOutput: string;
    try {
      rawOutput = await this.deps.model.generate(prompt, signal);
    } catch (error) {
      throw tracker.wrap('ModelInvocationError', error);
    }
    this.logger.debug('Raw model output:', rawOutput);

    tracker.enter('response_parsed');
    const parsed = parseMatchResponse(rawOutput);
    if (!parsed.success) {
      throw tracker.fail('ModelOutputParseError', parsed.error, undefined, parsed.rawText);
    }

    tracker.enter('persisted');
    const persisted = await this.persist(
      {
        request_id: this.newRequestId(),
        user: identity,
        playlist_url: playlistUrl,
        syllabus: syllabusText,
        video_titles: videoTitles.map((entry) => entry.title),
        recommendations: parsed.recommendations,
        created_at: this.now().toISOString(),
      },
      tracker,
      signal
    );

    tracker.enter('completed');
    return {
      videoTitles,
      recommendations: parsed.recommendations,
      persisted,
    };
  }

  private async fetchTitles(
    playlistUrl: string,
    tracker: StageTracker,
    signal: AbortSignal | undefined
  ): Promise<VideoTitle[]> {
    try {
      return await withRetry(() => this.deps.playlistSource.fetchTitles(playlistUrl, signal), {
        ...this.deps.playlistRetry,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Playlist fetch failed (${describeCause(error)}); retry ${attempt} in ${Math.round(delayMs)}ms`
          );
        },
      });
    } catch (error) {
      throw tracker.wrap('PlaylistFetchError', error);
    }
  }

  /**
   * Write the document. Every attempt carries the same `request_id`, so a
   * retry after a write that timed out but later landed stores it once.
   * Returns false when the write failed and the policy
   * lets the analysis succeed anyway.
   */
  private async persist(
    document: RecommendationDocument,
    tracker: StageTracker,
    signal: AbortSignal | undefined
  ): Promise<boolean> {
    try {
      await withRetry(() => this.deps.store.insert(document, signal), {
        ...this.deps.storageRetry,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Saving recommendations failed (${describeCause(error)}); retry ${attempt} in ${Math.round(delayMs)}ms`
          );
        },
      });
      return true;
    } catch (error) {
      const failure = tracker.wrap('StorageError', error);
      if (failure.kind === 'StorageError' && this.persistencePolicy === 'best-effort') {
        this.logger.error(`Saving recommendations failed: ${failure.detail}`);
        return false;
      }
      throw failure;
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Both inputs must be non-empty after trimming. The detail names every
 * missing field by its request name.
 */
function validateInput(
  request: AnalysisRequest,
  tracker: StageTracker
): { playlistUrl: string; syllabusText: string } {
  const playlistUrl = request.playlistUrl?.trim() ?? '';
  const syllabus = request.syllabusText ?? '';

  const missing: string[] = [];
  if (!playlistUrl) {
    missing.push('playlist_url');
  }
  if (!syllabus.trim()) {
    missing.push('syllabus');
  }
  if (missing.length > 0) {
    throw tracker.fail('InputValidationError', `Missing required field(s): ${missing.join(', ')}`);
  }

  return { playlistUrl, syllabusText: syllabus };
}
