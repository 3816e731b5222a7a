/**
 * CLI Version Information
 *
 * Version constant used throughout the CLI and reported by `GET /health`.
 * Synchronized with package.json version.
 *
 * @module cli/version
 */

/**
 * Current version.
 * Should match package.json version.
 */
export const VERSION = '1.0.0';

/**
 * Get version information for display.
 */
export function getVersionInfo(): string {
  return `Syllabus Matcher v${VERSION}`;
}
