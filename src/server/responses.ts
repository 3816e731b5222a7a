/**
 * HTTP Response Mapping
 *
 * Translates analysis outcomes into status codes and JSON bodies. Kept free
 * of express so the mapping can be checked on its own.
 *
 * @module server/responses
 */

import { z } from 'zod';
import type { AnalysisErrorKind } from '../orchestrator/errors.js';
import type { AnalysisOutcome } from '../orchestrator/types.js';
import type { Recommendation } from '../schemas/recommendation.js';

// ============================================================================
// Types
// ============================================================================

export interface ErrorBody {
  error: string;
  details?: string;
  raw_output?: string;
}

export interface SuccessBody {
  recommendations: readonly Recommendation[];
}

export interface HttpResponse {
  status: number;
  body: SuccessBody | ErrorBody;
}

/**
 * Status and public message per error kind. `withDetails` adds the
 * analysis detail to the body.
 */
const ERROR_RESPONSES: Record<AnalysisErrorKind, { status: number; message: string; withDetails: boolean }> = {
  InputValidationError: { status: 400, message: 'playlist_url and syllabus are required.', withDetails: false },
  AuthenticationRequired: { status: 401, message: 'Authentication credentials were not provided.', withDetails: false },
  RateLimitExceeded: { status: 429, message: 'Rate limit exceeded. Please try again later.', withDetails: false },
  PlaylistFetchError: { status: 500, message: 'Error extracting playlist.', withDetails: true },
  ModelInvocationError: { status: 500, message: 'Model invocation failed.', withDetails: true },
  ModelOutputParseError: { status: 500, message: 'Model returned invalid output.', withDetails: true },
  StorageError: { status: 500, message: 'Saving recommendations failed.', withDetails: true },
  // Client closed the request; nobody reads this
  AnalysisCancelled: { status: 499, message: 'Request cancelled.', withDetails: true },
};

// ============================================================================
// Request Body
// ============================================================================

/**
 * Fields of `POST /playlist-analyze/`. Values of the wrong type count as
 * missing, so validation reports them by name.
 */
const AnalyzeBodySchema = z.object({
  playlist_url: z.string().optional().catch(undefined),
  syllabus: z.string().optional().catch(undefined),
});

/**
 * Read the analysis inputs from a parsed JSON body. Anything that is not a
 * JSON object yields no inputs.
 */
export function readAnalyzeBody(body: unknown): { playlistUrl?: string; syllabusText?: string } {
  const parsed = AnalyzeBodySchema.safeParse(body);
  if (!parsed.success) {
    return {};
  }
  return { playlistUrl: parsed.data.playlist_url, syllabusText: parsed.data.syllabus };
}

// ============================================================================
// Response Mapping
// ============================================================================

export function toHttpResponse(outcome: AnalysisOutcome): HttpResponse {
  if (outcome.ok) {
    return { status: 200, body: { recommendations: outcome.result.recommendations } };
  }

  const { error } = outcome;
  const mapping = ERROR_RESPONSES[error.kind];
  const body: ErrorBody = { error: mapping.message };
  if (mapping.withDetails) {
    body.details = error.detail;
  }
  if (error.kind === 'ModelOutputParseError' && error.rawOutput !== undefined) {
    body.raw_output = error.rawOutput;
  }
  return { status: mapping.status, body };
}

export const NOT_FOUND_BODY: ErrorBody = { error: 'Endpoint not found' };
export const INTERNAL_ERROR_BODY: ErrorBody = { error: 'Internal server error' };
