/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, requireApiKey, parseAuthTokens } from './index.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config.nodeEnv).toBe('development');
      expect(config.port).toBe(8000);
      expect(config.logLevel).toBe('info');
      expect(config.model.modelId).toBe('gemini-1.5-flash');
      expect(config.model.timeoutMs).toBe(60000);
      expect(config.rateLimit).toEqual({ max: 5, windowMs: 3600000 });
      expect(config.storage.backend).toBe('file');
      expect(config.storage.policy).toBe('best-effort');
      expect(config.storage.dataDir).toBe(join(homedir(), '.syllabus-matcher'));
      expect(config.auth.tokens).toEqual([]);
    });

    it('should pick the mongo backend when a connection string is set', () => {
      const config = loadConfig({ MONGODB_URI: 'mongodb://localhost:27017' });
      expect(config.storage.backend).toBe('mongo');
      expect(config.storage.mongoUri).toBe('mongodb://localhost:27017');
      expect(config.storage.mongoDb).toBe('syllabus_matcher');
    });

    it('should let STORE_BACKEND override the inferred backend', () => {
      const config = loadConfig({ MONGODB_URI: 'mongodb://localhost:27017', STORE_BACKEND: 'file' });
      expect(config.storage.backend).toBe('file');
    });

    it('should coerce numeric variables', () => {
      const config = loadConfig({
        PORT: '9001',
        RATE_LIMIT_MAX: '10',
        PLAYLIST_MAX_RETRIES: '0',
        MODEL_TIMEOUT_MS: '5000',
      });
      expect(config.port).toBe(9001);
      expect(config.rateLimit.max).toBe(10);
      expect(config.playlist.maxRetries).toBe(0);
      expect(config.model.timeoutMs).toBe(5000);
    });

    it('should use a custom data directory when specified', () => {
      const config = loadConfig({ SYLLABUS_MATCHER_DATA_DIR: '/custom/path' });
      expect(config.storage.dataDir).toBe('/custom/path');
    });

    it('should expand a leading tilde in the data directory', () => {
      const config = loadConfig({ SYLLABUS_MATCHER_DATA_DIR: '~/matcher' });
      expect(config.storage.dataDir).toBe(join(homedir(), '/matcher'));
    });

    it('should throw listing invalid variables', () => {
      expect(() => loadConfig({ PORT: 'abc', PERSISTENCE_POLICY: 'sometimes' })).toThrow(
        /Invalid environment variables:[\s\S]*PERSISTENCE_POLICY[\s\S]*PORT/
      );
    });

    it('should return a frozen object', () => {
      const config = loadConfig({});
      expect(Object.isFrozen(config)).toBe(true);
    });
  });

  describe('parseAuthTokens', () => {
    it('should parse user:token pairs', () => {
      expect(parseAuthTokens('alice:token-a, bob:token-b')).toEqual([
        { user: 'alice', token: 'token-a' },
        { user: 'bob', token: 'token-b' },
      ]);
    });

    it('should keep colons inside the token', () => {
      expect(parseAuthTokens('carol:a:b')).toEqual([{ user: 'carol', token: 'a:b' }]);
    });

    it('should ignore malformed entries', () => {
      expect(parseAuthTokens('nocolon,:token,user:,,dave:t')).toEqual([
        { user: 'dave', token: 't' },
      ]);
    });
  });

  describe('requireApiKey', () => {
    it('should treat empty keys as missing', () => {
      const config = loadConfig({ GEMINI_API_KEY: '', YOUTUBE_API_KEY: 'test-key' });
      expect(() => requireApiKey(config, 'gemini')).toThrow('Missing required API key: GEMINI_API_KEY.');
    });


    it('should throw for missing keys', () => {
      const config = loadConfig({});
      expect(() => requireApiKey(config, 'gemini')).toThrow(
        'Missing required API key: GEMINI_API_KEY. Please set it in your .env file.'
      );
    });

    it('should return the key when present', () => {
      const config = loadConfig({ YOUTUBE_API_KEY: 'test-key' });
      expect(requireApiKey(config, 'youtube')).toBe('test-key');
    });
  });
});
