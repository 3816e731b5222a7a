/**
 * Gemini Model Client
 *
 * GenerativeModel implementation backed by the Google Generative AI SDK.
 * The API key and generation settings are passed in once at construction
 * and never change afterwards.
 *
 * @module matching/model-client
 */

import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { ModelSettings } from '../config/models.js';
import { withTimeout, TimeoutError, AbortedError } from '../utils/timeout.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Produces raw text for a prompt. Single blocking call, no streaming.
 */
export interface GenerativeModel {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

/**
 * The part of the SDK the client talks to. Swappable in tests.
 */
export interface ContentBackend {
  generateContent(prompt: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Model API error with additional context
 */
export class ModelApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'ModelApiError';
  }
}

// ============================================================================
// SDK Backend
// ============================================================================

/**
 * Create the default backend on top of `@google/generative-ai`.
 */
export function createGeminiBackend(apiKey: string, settings: ModelSettings): ContentBackend {
  const genAI = new GoogleGenerativeAI(apiKey);
  const model = genAI.getGenerativeModel({
    model: settings.modelId,
    generationConfig: {
      temperature: settings.temperature,
      maxOutputTokens: settings.maxOutputTokens,
    },
  });

  return {
    async generateContent(prompt, signal) {
      const result = await model.generateContent(
        { contents: [{ role: 'user', parts: [{ text: prompt }] }] },
        { signal }
      );
      return result.response.text();
    },
  };
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Gemini-backed GenerativeModel.
 *
 * @example
 * ```typescript
 * const model = new GeminiModel(config.apiKeys.gemini, config.model);
 * const text = await model.generate(prompt);
 * ```
 */
export class GeminiModel implements GenerativeModel {
  private readonly settings: Readonly<ModelSettings>;
  private readonly backend: ContentBackend;

  constructor(apiKey: string, settings: ModelSettings, backend?: ContentBackend) {
    if (!apiKey) {
      throw new Error('A Gemini API key is required to create the model client.');
    }
    this.settings = Object.freeze({ ...settings });
    this.backend = backend ?? createGeminiBackend(apiKey, this.settings);
  }

  get modelId(): string {
    return this.settings.modelId;
  }

  /**
   * Generate text for a prompt. Blank replies are returned as they are and
   * left for the response parser to reject.
   *
   * @throws ModelApiError on API errors or timeout
   */
  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      return await withTimeout(
        () => this.backend.generateContent(prompt, signal),
        this.settings.timeoutMs,
        'Model call',
        signal
      );
    } catch (error) {
      throw toModelApiError(error);
    }
  }
}

/**
 * Map SDK, timeout and network failures onto ModelApiError.
 */
export function toModelApiError(error: unknown): ModelApiError | AbortedError {
  if (error instanceof ModelApiError || error instanceof AbortedError) {
    return error;
  }

  if (error instanceof TimeoutError) {
    return new ModelApiError(error.message, 408, true);
  }

  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status ?? 500;
    const isRetryable = status === 429 || status >= 500;
    return new ModelApiError(error.message, status, isRetryable);
  }

  return new ModelApiError(
    error instanceof Error ? error.message : 'Unknown error',
    500,
    true
  );
}
