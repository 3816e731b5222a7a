/**
 * Analysis Formatters
 *
 * Terminal output for finished analyses:
 * - Result summary with one block per recommended topic
 * - Failure summary naming the stage
 *
 * @module cli/formatters/analysis
 */

import chalk from 'chalk';
import type { AnalysisError, AnalysisErrorKind } from '../../orchestrator/errors.js';
import type { AnalysisResult } from '../../orchestrator/types.js';
import { EXIT_CODES, type ExitCode } from '../base-command.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format duration in human-readable form.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

const EXIT_CODE_BY_KIND: Record<AnalysisErrorKind, ExitCode> = {
  InputValidationError: EXIT_CODES.USAGE_ERROR,
  AuthenticationRequired: EXIT_CODES.ERROR,
  RateLimitExceeded: EXIT_CODES.ERROR,
  PlaylistFetchError: EXIT_CODES.API_ERROR,
  ModelInvocationError: EXIT_CODES.API_ERROR,
  ModelOutputParseError: EXIT_CODES.API_ERROR,
  StorageError: EXIT_CODES.ERROR,
  AnalysisCancelled: EXIT_CODES.CANCELLED,
};

/**
 * Exit code for a failed analysis.
 */
export function exitCodeFor(error: AnalysisError): ExitCode {
  return EXIT_CODE_BY_KIND[error.kind];
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a successful analysis.
 *
 * @example
 * ```
 * === Analysis Complete ===
 * Videos:          2
 * Recommendations: 1
 * Saved:           yes
 * Duration:        3.4s
 *
 * Binary Trees (2)
 *   - Intro to BST
 *   - AVL Rotations
 * ```
 */
export function formatAnalysisResult(result: AnalysisResult, durationMs: number): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Analysis Complete ==='));
  lines.push(`Videos:          ${result.videoTitles.length}`);
  lines.push(`Recommendations: ${result.recommendations.length}`);
  lines.push(`Saved:           ${result.persisted ? chalk.green('yes') : chalk.yellow('no')}`);
  lines.push(`Duration:        ${formatDuration(durationMs)}`);

  for (const recommendation of result.recommendations) {
    lines.push('');
    lines.push(`${chalk.cyan(recommendation.topic)} (${recommendation.videos.length})`);
    if (recommendation.videos.length === 0) {
      lines.push(chalk.dim('  (no matching videos)'));
    }
    for (const video of recommendation.videos) {
      lines.push(`  - ${video}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format a failed analysis. The raw model output is included when present.
 */
export function formatAnalysisError(error: AnalysisError): string {
  const lines: string[] = [];

  lines.push(chalk.bold.red('=== Analysis Failed ==='));
  lines.push(`Stage:  ${error.stage}`);
  lines.push(`Error:  ${error.kind}`);
  lines.push(`Detail: ${error.detail}`);

  if (error.rawOutput !== undefined) {
    lines.push('');
    lines.push(chalk.dim('Raw model output:'));
    lines.push(error.rawOutput);
  }

  return lines.join('\n');
}
