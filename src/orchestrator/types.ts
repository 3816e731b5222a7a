/**
 * Orchestrator Type Definitions
 *
 * Requests, results and stage names of the analysis pipeline.
 *
 * @module orchestrator/types
 */

import type { Requester } from '../auth/gate.js';
import type { Recommendation, VideoTitle } from '../schemas/recommendation.js';
import type { AnalysisError } from './errors.js';

// ============================================================================
// Stages
// ============================================================================

/**
 * Pipeline stages, in execution order.
 */
export const ANALYSIS_STAGES = [
  'rate_limit_checked',
  'authenticated',
  'input_validated',
  'playlist_fetched',
  'topics_extracted',
  'prompt_built',
  'model_responded',
  'response_parsed',
  'persisted',
  'completed',
] as const;

export type AnalysisStage = (typeof ANALYSIS_STAGES)[number];

// ============================================================================
// Requests and Results
// ============================================================================

/**
 * One analysis request. Both inputs are optional here because the
 * orchestrator validates them itself.
 */
export interface AnalysisRequest {
  readonly playlistUrl?: string;
  readonly syllabusText?: string;
  readonly requester: Requester;
}

export interface AnalysisResult {
  readonly videoTitles: readonly VideoTitle[];
  readonly recommendations: readonly Recommendation[];
  /** False when the store write failed under the best-effort policy */
  readonly persisted: boolean;
}

export type AnalysisOutcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: AnalysisError };

/**
 * `best-effort` returns the result even when the store write fails;
 * `required` turns that failure into a StorageError.
 */
export type PersistencePolicy = 'best-effort' | 'required';

export interface AnalyzeOptions {
  /** Aborts the analysis at the next stage boundary or pending call */
  signal?: AbortSignal;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface AnalysisCallbacks {
  /** Called when a stage is reached, with the time spent since the previous one */
  onStage?: (stage: AnalysisStage, elapsedMs: number) => void;
  /** Called when the analysis ends with an error */
  onFailure?: (error: AnalysisError) => void;
}
