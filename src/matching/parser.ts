/**
 * Match Response Parser
 *
 * Recovers the recommendation list from the model's raw text. The answer may
 * be wrapped in a markdown fence, may be JSON, or may be a quoted literal
 * collection (single-quoted strings and the like). Parsing never throws:
 * anything unrecoverable comes back as a failure carrying the raw text.
 *
 * @module matching/parser
 */

import type { ZodError } from 'zod';
import { RecommendationListSchema, type Recommendation } from '../schemas/recommendation.js';
import { decodeLiteral } from './literal.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of parsing a model response
 */
export type ParseOutcome =
  | { success: true; recommendations: Recommendation[]; format: 'json' | 'literal' }
  | { success: false; error: string; rawText: string };

// ============================================================================
// Fence Extraction
// ============================================================================

/**
 * First fenced block spanning lines. The opening fence may carry one format
 * word, which is ignored; the closing fence starts its own line, so backticks
 * inside quoted strings never end the block. Group 1 is the fence body.
 */
const BLOCK_FENCE_PATTERN = /```[ \t]*(?:[A-Za-z][\w+.-]*)?[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?[ \t]*```/;

/**
 * Fence opened and closed on the same line, e.g. ```json [ ... ]```.
 */
const INLINE_FENCE_PATTERN = /```[ \t]*(?:(?:json5?|javascript|js|python|py)[ \t]+)?([^\n]*?)[ \t]*```/i;

/**
 * Pick the text to decode: the body of the first fenced block if there is
 * one, otherwise the whole response. Either way it is trimmed.
 */
export function extractCandidateText(rawText: string): string {
  const match = BLOCK_FENCE_PATTERN.exec(rawText) ?? INLINE_FENCE_PATTERN.exec(rawText);
  return (match ? (match[1] ?? '') : rawText).trim();
}

// ============================================================================
// Decoding Steps
// ============================================================================

type StepResult = { ok: true; recommendations: Recommendation[] } | { ok: false; error: string };

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'validation failed';
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function validate(value: unknown): StepResult {
  const validated = RecommendationListSchema.safeParse(value);
  if (!validated.success) {
    return { ok: false, error: describeZodError(validated.error) };
  }
  return { ok: true, recommendations: validated.data };
}

/**
 * Strict step: JSON, then schema validation. Missing or mistyped fields fail.
 */
function decodeJson(candidate: string): StepResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  return validate(parsed);
}

/**
 * Permissive step: closed-grammar literal decoding, then the same validation.
 */
function decodeLiteralCollection(candidate: string): StepResult {
  let parsed: unknown;
  try {
    parsed = decodeLiteral(candidate);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  return validate(parsed);
}

// ============================================================================
// Main Parser Function
// ============================================================================

/**
 * Parse the model's raw output into recommendations.
 *
 * Order is kept as the model gave it; nothing is sorted or deduplicated.
 *
 * @param rawText - Raw response text from the model
 * @returns The recommendations, or a failure with a readable error and the
 *   untouched raw text
 *
 * @example
 * ```typescript
 * const outcome = parseMatchResponse('```json\n[{"topic": "Trees", "videos": []}]\n```');
 * if (outcome.success) {
 *   console.log(outcome.recommendations[0].topic); // 'Trees'
 * }
 * ```
 */
export function parseMatchResponse(rawText: string): ParseOutcome {
  const candidate = extractCandidateText(rawText);

  if (!candidate) {
    return { success: false, error: 'Response is empty', rawText };
  }

  const json = decodeJson(candidate);
  if (json.ok) {
    return { success: true, recommendations: json.recommendations, format: 'json' };
  }

  const literal = decodeLiteralCollection(candidate);
  if (literal.ok) {
    return { success: true, recommendations: literal.recommendations, format: 'literal' };
  }

  return {
    success: false,
    error: `JSON decode failed (${json.error}); literal decode failed (${literal.error})`,
    rawText,
  };
}
