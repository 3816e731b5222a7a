/**
 * Analyze Command
 *
 * Runs one analysis locally: fetches the playlist, asks the model and saves
 * the recommendations, exactly as the HTTP endpoint does, as user
 * `local-cli`. Ctrl+C cancels the analysis.
 *
 * @module cli/commands/analyze
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { exitCodeFor, formatAnalysisError, formatAnalysisResult } from '../formatters/analysis.js';
import { StaticAuthGate } from '../../auth/gate.js';
import { createMatchService } from '../../orchestrator/factory.js';
import type { MatchOrchestrator } from '../../orchestrator/orchestrator.js';
import { readInputFile } from './input.js';

export const CLI_USER = 'local-cli';

export interface AnalyzeOptions {
  playlist: string;
  syllabus: string;
  /** Print the result as JSON */
  json?: boolean;
}

/**
 * Register the analyze command.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Match the videos of a playlist to the topics of a syllabus')
    .requiredOption('-p, --playlist <url>', 'Playlist URL or ID')
    .requiredOption('-s, --syllabus <file>', 'Syllabus text file')
    .option('--json', 'Print the result as JSON')
    .action(async (options: AnalyzeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = base.loadConfig();
      const service = await createMatchService(config, base.logger('warn'), {
        authGate: new StaticAuthGate(CLI_USER),
      });

      const controller = new AbortController();
      const onInterrupt = () => {
        base.warn('Cancelling analysis...');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      let code: ExitCode;
      try {
        code = await handleAnalyze(options, base, service.orchestrator, controller.signal);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        await service.close();
      }

      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

/**
 * Handle the analyze command.
 *
 * @returns Exit code for the process
 */
export async function handleAnalyze(
  options: AnalyzeOptions,
  base: BaseCommand,
  orchestrator: Pick<MatchOrchestrator, 'analyze'>,
  signal?: AbortSignal
): Promise<ExitCode> {
  const syllabusText = await readInputFile(options.syllabus);
  const startedAt = Date.now();

  base.debug(`Analyzing ${options.playlist} against ${options.syllabus}`);
  const outcome = await orchestrator.analyze(
    { playlistUrl: options.playlist, syllabusText, requester: { address: 'localhost' } },
    { signal }
  );

  if (!outcome.ok) {
    if (options.json) {
      base.json({
        error: outcome.error.kind,
        stage: outcome.error.stage,
        details: outcome.error.detail,
        raw_output: outcome.error.rawOutput,
      });
    } else {
      console.error(formatAnalysisError(outcome.error));
    }
    return exitCodeFor(outcome.error);
  }

  const { result } = outcome;
  if (options.json) {
    base.json({
      recommendations: result.recommendations,
      video_titles: result.videoTitles.map((entry) => entry.title),
      persisted: result.persisted,
    });
  } else {
    console.log(formatAnalysisResult(result, Date.now() - startedAt));
  }

  if (!result.persisted) {
    base.warn('The recommendations could not be saved.');
  }
  return EXIT_CODES.SUCCESS;
}
