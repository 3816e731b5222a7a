/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  formatAnalysisResult,
  formatAnalysisError,
  formatDuration,
  exitCodeFor,
} from './analysis.js';
