/**
 * CLI command that surveys packages for constructor shorthands and type
 * literals.
 */
import { Command, InvalidArgumentError } from 'commander';
import { createDetectors, isDetectorId } from '../../core/detectors/registry.js';
import { DETECTOR_IDS, type DetectorId } from '../../core/detectors/types.js';
import { logger } from '../../utils/logger.js';
import {
  addSurveyOptions,
  createReporter,
  parseCount,
  resolveRunConfig,
  runSurvey,
  type SurveyCommandOptions,
} from './shared.js';

interface PatternsOptions extends SurveyCommandOptions {
  examples?: number;
  detectors?: DetectorId[];
  showErrors?: boolean;
}

function parseDetectors(value: string): DetectorId[] {
  const ids: DetectorId[] = [];
  for (const id of value.split(',').map((item) => item.trim())) {
    if (!isDetectorId(id)) {
      throw new InvalidArgumentError(`Unknown detector '${id}'. Valid detectors: ${DETECTOR_IDS.join(', ')}.`);
    }
    ids.push(id);
  }
  return ids;
}

/**
 * Create the patterns command.
 */
export function createPatternsCommand(): Command {
  return addSurveyOptions(new Command('patterns'))
    .description('Count constructor shorthands and type literals across packages')
    .option('-e, --examples <n>', 'Examples listed per category (0: all)', parseCount)
    .option('-d, --detectors <ids>', `Detectors to run (comma-separated: ${DETECTOR_IDS.join(', ')})`, parseDetectors)
    .option('--show-errors', 'Also report resolver diagnostics')
    .action(async (paths: string[], options: PatternsOptions) => {
      try {
        await runPatterns(paths, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runPatterns(paths: string[], options: PatternsOptions): Promise<void> {
  const config = await resolveRunConfig(paths, options, {
    examples: options.examples,
    detectors: options.detectors,
  });
  const detectors = createDetectors(config.detectors);
  await runSurvey(config, createReporter(options), detectors, options.showErrors ?? false);
}
