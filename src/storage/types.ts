/**
 * Recommendation Store Types
 *
 * @module storage/types
 */

import type { RecommendationDocument } from '../schemas/recommendation.js';

/**
 * Append-only sink for completed analyses.
 * Writes are independent; no read-modify-write is ever performed.
 */
export interface RecommendationStore {
  /** Append one document */
  insert(document: RecommendationDocument, signal?: AbortSignal): Promise<void>;

  /** Release connections or handles, if any */
  close(): Promise<void>;
}

/**
 * Store error with additional context
 */
export class StoreWriteError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StoreWriteError';
  }
}
