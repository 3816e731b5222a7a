/**
 * Matching Module
 *
 * Prompt building, the model client and response parsing.
 *
 * @module matching
 */

export { buildMatchPrompt, formatTopicList, formatVideoList, toVideoTitles, MATCH_PROMPT_PREAMBLE } from './prompts.js';
export { parseMatchResponse, extractCandidateText, type ParseOutcome } from './parser.js';
export {
  parseLiteral,
  decodeLiteral,
  toPlainValue,
  LiteralSyntaxError,
  type LiteralNode,
  type LiteralValue,
} from './literal.js';
export {
  GeminiModel,
  ModelApiError,
  createGeminiBackend,
  toModelApiError,
  type GenerativeModel,
  type ContentBackend,
} from './model-client.js';
