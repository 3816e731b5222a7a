/**
 * File recommendation store tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileRecommendationStore, RECOMMENDATIONS_FILE } from './file-store.js';
import { StoreWriteError } from './types.js';
import { createRecommendationStore } from './index.js';
import { loadConfig } from '../config/index.js';
import type { RecommendationDocument } from '../schemas/recommendation.js';

async function readLines(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content.split('\n').filter((line) => line.length > 0);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function makeDocument(overrides: Partial<RecommendationDocument> = {}): RecommendationDocument {
  return {
    request_id: 'test-request-1',
    user: 'alice',
    playlist_url: 'https://www.youtube.com/playlist?list=PLtestPlaylist01',
    syllabus: '1. Binary Trees',
    video_titles: ['Intro to BST', 'AVL Rotations'],
    recommendations: [{ topic: 'Binary Trees', videos: ['Intro to BST', 'AVL Rotations'] }],
    created_at: '2026-01-15T10:30:00.000Z',
    ...overrides,
  };
}

describe('FileRecommendationStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'recommendation-store-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should append one JSON line per document', async () => {
    const store = new FileRecommendationStore(tempDir);
    await store.insert(makeDocument());
    await store.insert(makeDocument({ request_id: 'test-request-2', user: 'bob' }));

    const content = await fs.readFile(path.join(tempDir, RECOMMENDATIONS_FILE), 'utf-8');
    const lines = content.split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual(makeDocument());
    expect(JSON.parse(lines[1] ?? '').user).toBe('bob');
  });

  it('should create the data directory on first write', async () => {
    const nested = path.join(tempDir, 'nested', 'data');
    const store = new FileRecommendationStore(nested);
    await store.insert(makeDocument());

    const lines = await readLines(store.filePath);
    expect(lines.map((line) => JSON.parse(line))).toEqual([makeDocument()]);
  });

  it('should write a repeated request only once', async () => {
    const store = new FileRecommendationStore(tempDir);
    await Promise.all([store.insert(makeDocument()), store.insert(makeDocument())]);
    await store.insert(makeDocument());

    await expect(readLines(store.filePath)).resolves.toHaveLength(1);
  });

  it('should store one copy when retries follow a timed-out write', async () => {
    const store = new FileRecommendationStore(tempDir, 0);

    for (let attempt = 0; attempt < 3; attempt++) {
      await store.insert(makeDocument()).catch((e: unknown) => {
        expect(e).toMatchObject({ isRetryable: true });
      });
    }

    // Let the write that outlived its timeout finish
    let lines: string[] = [];
    for (let i = 0; i < 100 && lines.length === 0; i++) {
      await sleep(10);
      lines = await readLines(store.filePath).catch(() => []);
    }
    await sleep(20);

    await expect(readLines(store.filePath)).resolves.toHaveLength(1);
  });

  it('should wrap write failures', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const store = new FileRecommendationStore(path.join(blocker, 'data'));

    const error = await store.insert(makeDocument()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreWriteError);
    expect(error).toMatchObject({ isRetryable: false });
  });

  it('should write again after a failed attempt', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const store = new FileRecommendationStore(path.join(blocker, 'data'));

    await expect(store.insert(makeDocument())).rejects.toBeInstanceOf(StoreWriteError);
    await fs.rm(blocker);
    await store.insert(makeDocument());

    await expect(readLines(store.filePath)).resolves.toHaveLength(1);
  });

  it('should reject file names that leave the data directory', () => {
    expect(() => new FileRecommendationStore(tempDir, 1000, '../escape.jsonl')).toThrow(
      'path traversal not allowed'
    );
  });
});

describe('createRecommendationStore', () => {
  it('should build a file store by default', async () => {
    const config = loadConfig({ SYLLABUS_MATCHER_DATA_DIR: '/tmp/matcher-data' });
    const store = await createRecommendationStore(config.storage);
    expect(store).toBeInstanceOf(FileRecommendationStore);
    expect(store instanceof FileRecommendationStore && store.filePath).toBe(
      path.join('/tmp/matcher-data', RECOMMENDATIONS_FILE)
    );
  });

  it('should refuse the mongo backend without a connection string', async () => {
    const config = loadConfig({ STORE_BACKEND: 'mongo' });
    await expect(createRecommendationStore(config.storage)).rejects.toThrow(
      'STORE_BACKEND is "mongo" but MONGODB_URI is not set.'
    );
  });
});
