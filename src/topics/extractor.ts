/**
 * Syllabus Topic Extractor
 *
 * Turns free-form syllabus text into an ordered list of topic strings.
 * Enumeration markers ("1.", "-", "*", "Module 3:", "Unit 2") and trailing
 * credit-hour suffixes ("4L") are removed; lines left with fewer than two
 * words are dropped, except the title of a "Module N"/"Unit N" heading,
 * which is a topic even when it is a single word. Never throws: garbage in,
 * short list out.
 *
 * @module topics/extractor
 */

/** One leading enumeration marker plus the whitespace after it */
const LEADING_MARKER = /^(?:\d+\.|-|\*|(module|unit)\s+\d+:?)\s*/i;

/** Credit-hour suffix at the very end of a line, e.g. "Graph Theory 6L" */
const CREDIT_HOUR_SUFFIX = /\d+[Ll]$/;

const LINE_BREAK = /\r?\n|\r/;

/**
 * Clean a single syllabus line.
 *
 * @returns The topic text, or null if the line does not hold a topic
 */
export function cleanSyllabusLine(line: string): string | null {
  let text = line.trim();
  if (!text) {
    return null;
  }

  const marker = LEADING_MARKER.exec(text);
  const isHeading = marker?.[1] !== undefined;
  if (marker) {
    text = text.slice(marker[0].length);
  }

  text = text.replace(CREDIT_HOUR_SUFFIX, '').trim();

  const minTokens = isHeading ? 1 : 2;
  if (countTokens(text) < minTokens) {
    return null;
  }

  return text;
}

/**
 * Extract topics from raw syllabus text, preserving line order.
 *
 * @example
 * ```typescript
 * extractTopics('1. Binary Trees\n- Graph Algorithms\nModule 3: Recursion\n5L\nOK');
 * // ['Binary Trees', 'Graph Algorithms', 'Recursion']
 * ```
 */
export function extractTopics(rawSyllabus: string): string[] {
  const topics: string[] = [];

  for (const line of rawSyllabus.split(LINE_BREAK)) {
    const topic = cleanSyllabusLine(line);
    if (topic !== null) {
      topics.push(topic);
    }
  }

  return topics;
}

function countTokens(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}
