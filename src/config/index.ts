/**
 * Configuration Module
 *
 * Validates environment variables for the syllabus matcher with Zod and
 * turns them into one immutable configuration value. The value is built
 * once at process start and handed to each collaborator's constructor.
 *
 * @module config
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { DEFAULT_MODEL_SETTINGS } from './models.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  // API keys (optional so that the CLI's offline commands can start without them)
  GEMINI_API_KEY: z.string().optional(),
  YOUTUBE_API_KEY: z.string().optional(),

  GEMINI_MODEL: z.string().min(1).optional(),

  // Persistence
  STORE_BACKEND: z.enum(['mongo', 'file']).optional(),
  MONGODB_URI: z.string().optional(),
  MONGODB_DB: z.string().min(1).default('syllabus_matcher'),
  SYLLABUS_MATCHER_DATA_DIR: z.string().optional(),
  PERSISTENCE_POLICY: z.enum(['best-effort', 'required']).default('best-effort'),

  // Access control
  AUTH_TOKENS: z.string().default(''),
  RATE_LIMIT_MAX: positiveInt(5),
  RATE_LIMIT_WINDOW_MS: positiveInt(60 * 60 * 1000),

  // Collaborator timeouts and retries
  PLAYLIST_TIMEOUT_MS: positiveInt(15000),
  PLAYLIST_MAX_RETRIES: nonNegativeInt(2),
  PLAYLIST_MAX_PAGES: positiveInt(20),
  MODEL_TIMEOUT_MS: positiveInt(60000),
  STORAGE_TIMEOUT_MS: positiveInt(10000),
  STORAGE_MAX_RETRIES: nonNegativeInt(2),

  // Runtime options
  PORT: positiveInt(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * A user allowed through the token gate.
 */
export interface TokenEntry {
  user: string;
  token: string;
}

/**
 * Parse `AUTH_TOKENS` ("alice:token-a,bob:token-b") into entries.
 * Entries without a user or a token are ignored.
 */
export function parseAuthTokens(raw: string): TokenEntry[] {
  return raw
    .split(',')
    .map((pair) => pair.trim())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const separator = pair.indexOf(':');
      if (separator === -1) {
        return null;
      }
      const user = pair.slice(0, separator).trim();
      const token = pair.slice(separator + 1).trim();
      return user && token ? { user, token } : null;
    })
    .filter((entry): entry is TokenEntry => entry !== null);
}

function resolveDataDir(dir: string | undefined): string {
  if (!dir) {
    return join(homedir(), '.syllabus-matcher');
  }
  if (dir.startsWith('~')) {
    return join(homedir(), dir.slice(1));
  }
  return isAbsolute(dir) ? dir : resolve(dir);
}

function buildConfig(env: Env) {
  const storeBackend = env.STORE_BACKEND ?? (env.MONGODB_URI ? 'mongo' : 'file');

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    logLevel: env.LOG_LEVEL,
    port: env.PORT,

    apiKeys: {
      gemini: env.GEMINI_API_KEY || undefined,
      youtube: env.YOUTUBE_API_KEY || undefined,
    },

    model: {
      ...DEFAULT_MODEL_SETTINGS,
      modelId: env.GEMINI_MODEL ?? DEFAULT_MODEL_SETTINGS.modelId,
      timeoutMs: env.MODEL_TIMEOUT_MS,
    },

    playlist: {
      timeoutMs: env.PLAYLIST_TIMEOUT_MS,
      maxRetries: env.PLAYLIST_MAX_RETRIES,
      maxPages: env.PLAYLIST_MAX_PAGES,
    },

    storage: {
      backend: storeBackend,
      mongoUri: env.MONGODB_URI || undefined,
      mongoDb: env.MONGODB_DB,
      dataDir: resolveDataDir(env.SYLLABUS_MATCHER_DATA_DIR),
      timeoutMs: env.STORAGE_TIMEOUT_MS,
      maxRetries: env.STORAGE_MAX_RETRIES,
      policy: env.PERSISTENCE_POLICY,
    },

    auth: {
      tokens: parseAuthTokens(env.AUTH_TOKENS),
    },

    rateLimit: {
      max: env.RATE_LIMIT_MAX,
      windowMs: env.RATE_LIMIT_WINDOW_MS,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;
export type ApiKeyName = keyof AppConfig['apiKeys'];

/**
 * Validate an environment and build the application configuration.
 *
 * @param env - Environment variables (defaults to `process.env`)
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${issues}`);
  }

  return Object.freeze(buildConfig(parsed.data));
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: AppConfig, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${api.toUpperCase()}_API_KEY. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

export { DEFAULT_MODEL_SETTINGS, type ModelSettings } from './models.js';
