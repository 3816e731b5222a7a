/**
 * Analysis Errors
 *
 * Every failure of an analysis is reported as an AnalysisError naming the
 * stage that produced it.
 *
 * @module orchestrator/errors
 */

import type { AnalysisStage } from './types.js';

export type AnalysisErrorKind =
  | 'InputValidationError'
  | 'AuthenticationRequired'
  | 'RateLimitExceeded'
  | 'PlaylistFetchError'
  | 'ModelInvocationError'
  | 'ModelOutputParseError'
  | 'StorageError'
  | 'AnalysisCancelled';

export interface AnalysisErrorOptions {
  /** Underlying collaborator error */
  cause?: unknown;
  /** Model text that could not be decoded */
  rawOutput?: string;
}

/**
 * Stage-attributed analysis failure.
 */
export class AnalysisError extends Error {
  readonly cause?: unknown;
  readonly rawOutput?: string;

  constructor(
    public readonly kind: AnalysisErrorKind,
    public readonly stage: AnalysisStage,
    public readonly detail: string,
    options: AnalysisErrorOptions = {}
  ) {
    super(`${kind} at ${stage}: ${detail}`);
    this.name = 'AnalysisError';
    this.cause = options.cause;
    this.rawOutput = options.rawOutput;
  }
}

/**
 * Type guard for AnalysisError
 */
export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

/**
 * Readable message of an unknown thrown value.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
