/**
 * Prompt Command
 *
 * Prints the model prompt built from a syllabus file and a titles file
 * (one title per line). Useful for checking what the model will see.
 *
 * @module cli/commands/prompt
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { buildMatchPrompt, toVideoTitles } from '../../matching/prompts.js';
import { extractTopics } from '../../topics/extractor.js';
import { parseTitleLines, readInputFile } from './input.js';

export interface PromptOptions {
  syllabus: string;
  titles: string;
}

/**
 * Register the prompt command.
 */
export function registerPromptCommand(program: Command): void {
  program
    .command('prompt')
    .description('Print the model prompt for a syllabus and a list of video titles')
    .requiredOption('-s, --syllabus <file>', 'Syllabus text file')
    .requiredOption('-t, --titles <file>', 'Video titles file, one title per line')
    .action(async (options: PromptOptions, cmd: Command) => {
      await handlePrompt(options, getBaseCommand(cmd));
    });
}

/**
 * Handle the prompt command.
 */
export async function handlePrompt(options: PromptOptions, base: BaseCommand): Promise<void> {
  const [syllabus, titlesFile] = await Promise.all([
    readInputFile(options.syllabus),
    readInputFile(options.titles),
  ]);

  const topics = extractTopics(syllabus);
  const titles = toVideoTitles(parseTitleLines(titlesFile));
  base.debug(`${topics.length} topics, ${titles.length} titles`);

  console.log(buildMatchPrompt(topics, titles));
}
