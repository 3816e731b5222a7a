/**
 * Subcommands of `syllabus-match`, one file each.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerServeCommand } from './serve.js';
import { registerAnalyzeCommand } from './analyze.js';
import { registerTopicsCommand } from './topics.js';
import { registerPromptCommand } from './prompt.js';

/**
 * Attach serve, analyze, topics and prompt to the program, in that order.
 */
export function registerCommands(program: Command): void {
  registerServeCommand(program);
  registerAnalyzeCommand(program);
  registerTopicsCommand(program);
  registerPromptCommand(program);
}

