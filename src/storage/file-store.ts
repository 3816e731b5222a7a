/**
 * File Recommendation Store
 *
 * Appends each document as one JSON line to
 * `<dataDir>/recommendations.jsonl`. Used when no MongoDB connection string
 * is configured. Inserts are idempotent per `request_id` within the process.
 *
 * @module storage/file-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { RecommendationDocument } from '../schemas/recommendation.js';
import { withTimeout, TimeoutError, AbortedError } from '../utils/timeout.js';
import { StoreWriteError, type RecommendationStore } from './types.js';

export const RECOMMENDATIONS_FILE = 'recommendations.jsonl';

/**
 * Validates that a path stays inside the data directory.
 */
function validateFileName(fileName: string): void {
  if (fileName.includes('..') || fileName.includes('/') || fileName.includes('\\')) {
    throw new Error('fileName contains invalid characters (path traversal not allowed)');
  }
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

/** Write outcomes remembered for repeated inserts of one analysis */
const MAX_TRACKED_WRITES = 1024;

export class FileRecommendationStore implements RecommendationStore {
  readonly filePath: string;
  private readonly writes = new Map<string, Promise<void>>();

  constructor(
    private readonly dataDir: string,
    private readonly timeoutMs = 10000,
    fileName = RECOMMENDATIONS_FILE
  ) {
    validateFileName(fileName);
    this.filePath = path.join(dataDir, fileName);
  }

  /**
   * Append the document unless its `request_id` was already written or is
   * still being written, in which case wait on that write instead.
   */
  async insert(document: RecommendationDocument, signal?: AbortSignal): Promise<void> {
    const write = this.writes.get(document.request_id) ?? this.startWrite(document);

    try {
      await withTimeout(() => write, this.timeoutMs, 'Recommendation write', signal);
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      const code = errorCode(error);
      const isRetryable = error instanceof TimeoutError || code === 'EBUSY' || code === 'EAGAIN';
      throw new StoreWriteError(
        `Failed to append to ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        isRetryable,
        error
      );
    }
  }

  async close(): Promise<void> {
    // Nothing held open between writes
  }

  private startWrite(document: RecommendationDocument): Promise<void> {
    const id = document.request_id;
    const line = `${JSON.stringify(document)}\n`;

    const write = (async () => {
      await fs.mkdir(this.dataDir, { recursive: true });
      // A single appendFile call writes the whole line
      await fs.appendFile(this.filePath, line, 'utf-8');
    })();

    this.writes.set(id, write);
    if (this.writes.size > MAX_TRACKED_WRITES) {
      const oldest = this.writes.keys().next();
      if (!oldest.done) {
        this.writes.delete(oldest.value);
      }
    }

    // A failed write is forgotten so the next attempt starts a new one; the
    // failure itself reaches the caller through `insert`
    void write.catch(() => {
      if (this.writes.get(id) === write) {
        this.writes.delete(id);
      }
    });

    return write;
  }
}
