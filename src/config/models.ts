/**
 * Model Configuration
 *
 * Default generation settings for the matching model. The model ID can be
 * overridden through `GEMINI_MODEL`.
 *
 * @module config/models
 */

/**
 * Generation settings for the matcher model
 */
export interface ModelSettings {
  /** Model identifier */
  modelId: string;
  /** Temperature setting (0.0 - 1.0) */
  temperature: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Defaults used when the environment does not override them.
 * Matching is a lookup task, so the temperature stays low.
 */
export const DEFAULT_MODEL_SETTINGS: ModelSettings = {
  modelId: 'gemini-1.5-flash',
  temperature: 0.2,
  maxOutputTokens: 8192,
  timeoutMs: 60000,
};
