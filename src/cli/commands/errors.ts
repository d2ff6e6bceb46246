/**
 * CLI command that streams resolver diagnostics across packages.
 */
import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import {
  addSurveyOptions,
  createReporter,
  resolveRunConfig,
  runSurvey,
  type SurveyCommandOptions,
} from './shared.js';

interface ErrorsOptions extends SurveyCommandOptions {
  all?: boolean;
}

/**
 * Create the errors command.
 */
export function createErrorsCommand(): Command {
  return addSurveyOptions(new Command('errors'))
    .description('Report compiler errors and warnings across packages')
    .option('--all', 'Show every severity, including hints and todos')
    .action(async (paths: string[], options: ErrorsOptions) => {
      try {
        await runErrors(paths, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runErrors(paths: string[], options: ErrorsOptions): Promise<void> {
  const config = await resolveRunConfig(paths, options, { showAllDiagnostics: options.all });
  await runSurvey(config, createReporter(options), [], true);
}
