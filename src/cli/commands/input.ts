/**
 * Input File Helpers
 *
 * @module cli/commands/input
 */

import * as fs from 'node:fs/promises';

/**
 * Error for an input file that cannot be read.
 */
export class InputFileError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'InputFileError';
  }
}

/**
 * Read a UTF-8 text file given on the command line.
 *
 * @throws InputFileError if the file is missing or unreadable
 */
export async function readInputFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new InputFileError(`File not found: ${filePath}`, filePath);
    }
    throw new InputFileError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
}

/**
 * Split a titles file into one title per non-empty line, in order.
 */
export function parseTitleLines(content: string): string[] {
  return content
    .split(/\r?\n|\r/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
