#!/usr/bin/env node
/**
 * `syllabus-match` command line.
 *
 * Usage:
 *   syllabus-match --help
 *   syllabus-match serve --port 8000
 *   syllabus-match analyze --playlist "https://www.youtube.com/playlist?list=PL..." --syllabus syllabus.txt
 *   syllabus-match topics syllabus.txt
 *
 * @module cli
 */

import 'dotenv/config';
import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

/**
 * Build the program with its global flags and subcommands. Nothing is parsed.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('syllabus-match')
    .description('Syllabus Matcher - Match playlist videos to syllabus topics using AI')
    .version(VERSION, '-V, --version', 'Display version number');

  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override the data directory (~/.syllabus-matcher)');

  // Subcommands read the shared output settings through getBaseCommand()
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
    }
  });

  registerCommands(program);

  return program;
}

/**
 * Parse `argv` and run the chosen command. Uncaught errors exit with 1.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
