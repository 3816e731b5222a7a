/**
 * Matching Prompts
 *
 * Prompt template for asking the model to map playlist videos onto syllabus
 * topics. The output is a pure function of its inputs: same topics and titles,
 * byte-identical prompt.
 *
 * @module matching/prompts
 */

import type { VideoTitle } from '../schemas/recommendation.js';

/**
 * Instructions and output contract placed before the topic and video lists.
 */
export const MATCH_PROMPT_PREAMBLE = `You are an AI assistant. Match YouTube video titles with syllabus topics only.
Return only a VALID JSON array of objects. Each object has exactly two fields:
- "topic": a string naming one syllabus topic
- "videos": an array of strings, each one a video title copied exactly from the list below
Example:
[{"topic": "Binary Trees", "videos": ["Video 1", "Video 2"]}]`;

/**
 * Render topics as one bullet per line, in extraction order.
 */
export function formatTopicList(topics: readonly string[]): string {
  return topics.map((topic) => `- ${topic}`).join('\n');
}

/**
 * Render titles as numbered lines using their playlist positions.
 */
export function formatVideoList(titles: readonly VideoTitle[]): string {
  return titles.map(({ position, title }) => `${position}. ${title}`).join('\n');
}

/**
 * Build the matching prompt.
 *
 * Neither list is reordered, deduplicated or truncated.
 *
 * @param topics - Topics from the syllabus, in order
 * @param titles - Playlist titles, in playlist order
 */
export function buildMatchPrompt(topics: readonly string[], titles: readonly VideoTitle[]): string {
  return (
    `${MATCH_PROMPT_PREAMBLE}\n\n` +
    `Syllabus Topics:\n${formatTopicList(topics)}\n\n` +
    `Video Titles:\n${formatVideoList(titles)}`
  );
}

/**
 * Number plain titles 1..n in the order given.
 */
export function toVideoTitles(titles: readonly string[]): VideoTitle[] {
  return titles.map((title, index) => ({ position: index + 1, title }));
}
