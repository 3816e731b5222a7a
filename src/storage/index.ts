/**
 * Storage Module
 *
 * Picks the recommendation store configured for this process.
 *
 * @module storage
 */

import type { AppConfig } from '../config/index.js';
import { FileRecommendationStore } from './file-store.js';
import { MongoRecommendationStore } from './mongo-store.js';
import type { RecommendationStore } from './types.js';

export type { RecommendationStore } from './types.js';
export { StoreWriteError } from './types.js';
export { FileRecommendationStore, RECOMMENDATIONS_FILE } from './file-store.js';
export { MongoRecommendationStore } from './mongo-store.js';

/**
 * Create the store selected by `STORE_BACKEND`.
 *
 * @throws Error if the mongo backend is selected without a connection string
 */
export async function createRecommendationStore(
  storage: AppConfig['storage']
): Promise<RecommendationStore> {
  if (storage.backend === 'mongo') {
    if (!storage.mongoUri) {
      throw new Error('STORE_BACKEND is "mongo" but MONGODB_URI is not set.');
    }
    return MongoRecommendationStore.connect(storage.mongoUri, {
      dbName: storage.mongoDb,
      timeoutMs: storage.timeoutMs,
    });
  }

  return new FileRecommendationStore(storage.dataDir, storage.timeoutMs);
}
