/**
 * Topics Module
 *
 * @module topics
 */

export { extractTopics, cleanSyllabusLine } from './extractor.js';
