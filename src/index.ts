/**
 * Syllabus Matcher
 *
 * Matches the videos of a playlist to the topics of a course syllabus with a
 * generative model.
 *
 * @example
 * ```typescript
 * import { loadConfig, createMatchService } from 'syllabus-matcher';
 *
 * const service = await createMatchService(loadConfig());
 * const outcome = await service.orchestrator.analyze({
 *   playlistUrl: 'https://www.youtube.com/playlist?list=PL123',
 *   syllabusText: '1. Binary Trees\n2. Graph Algorithms',
 *   requester: { address: '127.0.0.1', authorization: 'Bearer test-token' },
 * });
 * ```
 *
 * @module syllabus-matcher
 */

export * from './topics/index.js';
export * from './matching/index.js';
export * from './playlist/index.js';
export * from './storage/index.js';
export * from './schemas/index.js';
export * from './auth/index.js';
export * from './limits/index.js';
export * from './orchestrator/index.js';
export * from './server/index.js';
export { loadConfig, parseAuthTokens, type AppConfig } from './config/index.js';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
export { withRetry, isRetryableError, type RetryOptions } from './utils/retry.js';
export { withTimeout, TimeoutError, AbortedError } from './utils/timeout.js';
export { VERSION } from './cli/version.js';
