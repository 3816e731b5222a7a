/**
 * MongoDB Recommendation Store
 *
 * Persists documents to the `recommendations` collection through mongoose.
 * One connection is opened per process and shared by all requests. The
 * unique `request_id` index makes a repeated insert of one analysis a no-op.
 *
 * @module storage/mongo-store
 */

import mongoose, { Schema, type Connection, type Model } from 'mongoose';
import type { Recommendation, RecommendationDocument } from '../schemas/recommendation.js';
import { withTimeout, TimeoutError, AbortedError } from '../utils/timeout.js';
import { StoreWriteError, type RecommendationStore } from './types.js';

const recommendationItemSchema = new Schema<Recommendation>(
  {
    topic: { type: String, required: true },
    videos: { type: [String], default: [] },
  },
  { _id: false }
);

export const recommendationDocumentSchema = new Schema<RecommendationDocument>(
  {
    request_id: { type: String, required: true, unique: true },
    user: { type: String, required: true, index: true },
    playlist_url: { type: String, required: true },
    syllabus: { type: String, required: true },
    video_titles: { type: [String], default: [] },
    recommendations: { type: [recommendationItemSchema], default: [] },
    created_at: { type: String, required: true },
  },
  { collection: 'recommendations', versionKey: false }
);

export const RECOMMENDATION_MODEL_NAME = 'Recommendation';

/**
 * Options for connecting to MongoDB
 */
export interface MongoStoreOptions {
  /** Database name */
  dbName: string;
  /** Per-write timeout, also used for server selection (default: 10000) */
  timeoutMs?: number;
}

/**
 * Errors that a later attempt may not repeat: lost connections, elections,
 * server selection timeouts.
 */
function isTransientMongoError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof mongoose.Error.ValidationError) {
    return false;
  }
  if (error instanceof Error) {
    return /MongoNetworkError|MongoServerSelectionError|ECONNRESET|ETIMEDOUT|not primary/i.test(
      `${error.name} ${error.message}`
    );
  }
  return false;
}

/**
 * Duplicate key on `request_id`: an earlier attempt of the same insert
 * already landed.
 */
export function isDuplicateRequest(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error) || error.code !== 11000) {
    return false;
  }
  const keyPattern: unknown = 'keyPattern' in error ? error.keyPattern : undefined;
  return typeof keyPattern === 'object' && keyPattern !== null && 'request_id' in keyPattern;
}

export class MongoRecommendationStore implements RecommendationStore {
  private readonly model: Model<RecommendationDocument>;

  constructor(
    private readonly connection: Connection,
    private readonly timeoutMs = 10000
  ) {
    this.model = connection.model<RecommendationDocument>(
      RECOMMENDATION_MODEL_NAME,
      recommendationDocumentSchema
    );
  }

  /**
   * Open a connection and wait until it is usable.
   *
   * @throws Error if the server cannot be reached within the timeout
   */
  static async connect(uri: string, options: MongoStoreOptions): Promise<MongoRecommendationStore> {
    const timeoutMs = options.timeoutMs ?? 10000;
    const connection = await mongoose
      .createConnection(uri, {
        dbName: options.dbName,
        serverSelectionTimeoutMS: timeoutMs,
      })
      .asPromise();
    return new MongoRecommendationStore(connection, timeoutMs);
  }

  async insert(document: RecommendationDocument, signal?: AbortSignal): Promise<void> {
    try {
      await withTimeout(
        async () => {
          try {
            await this.model.create(document);
          } catch (error) {
            if (!isDuplicateRequest(error)) {
              throw error;
            }
          }
        },
        this.timeoutMs,
        'Recommendation write',
        signal
      );
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      throw new StoreWriteError(
        `MongoDB save failed: ${error instanceof Error ? error.message : String(error)}`,
        isTransientMongoError(error),
        error
      );
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
