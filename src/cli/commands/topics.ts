/**
 * Topics Command
 *
 * Prints the topics extracted from a syllabus file. No external calls.
 *
 * @module cli/commands/topics
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { extractTopics } from '../../topics/extractor.js';
import { readInputFile } from './input.js';

export interface TopicsOptions {
  /** Print a JSON array instead of a list */
  json?: boolean;
}

/**
 * Register the topics command.
 */
export function registerTopicsCommand(program: Command): void {
  program
    .command('topics <file>')
    .description('Print the topics extracted from a syllabus file')
    .option('--json', 'Print topics as a JSON array')
    .action(async (file: string, options: TopicsOptions, cmd: Command) => {
      await handleTopics(file, options, getBaseCommand(cmd));
    });
}

/**
 * Handle the topics command.
 */
export async function handleTopics(file: string, options: TopicsOptions, base: BaseCommand): Promise<void> {
  base.debug(`Reading syllabus from ${file}`);
  const topics = extractTopics(await readInputFile(file));

  if (options.json) {
    base.json(topics);
    return;
  }

  if (topics.length === 0) {
    base.info('No topics found.');
    return;
  }

  topics.forEach((topic, index) => {
    console.log(`${index + 1}. ${topic}`);
  });
}
