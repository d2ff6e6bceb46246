/**
 * Options and setup shared by the survey commands.
 */
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, mergeConfig, type ConfigOverrides, type RunConfig } from '../../core/config/loader.js';
import { DiagnosticAdvisor } from '../../core/diagnostics/advisor.js';
import { isInstallMode, INSTALL_MODES, NpmInstaller, type InstallMode } from '../../core/packages/installer.js';
import { TsMorphResolver } from '../../core/resolver/ts-morph-resolver.js';
import type { PatternDetector } from '../../core/detectors/types.js';
import { SurveyDriver } from '../../core/survey/driver.js';
import type { SurveyParticipant, SurveyReporter, SurveyResult } from '../../core/survey/types.js';
import { logger } from '../../utils/logger.js';
import { HumanReporter } from '../formatters/human.js';
import { JsonReporter } from '../formatters/json.js';

export interface SurveyCommandOptions {
  limit?: number;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  color: boolean;
  install?: InstallMode;
  requireInstall?: boolean;
  nested: boolean;
  exclude?: string[];
}

/**
 * Parse a non-negative integer option.
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Parse a comma-separated list option.
 */
export function parseList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  ];
}

function parseInstallMode(value: string): InstallMode {
  if (!isInstallMode(value)) {
    throw new InvalidArgumentError(`Expected one of: ${INSTALL_MODES.join(', ')}.`);
  }
  return value;
}

/**
 * Add the options every survey command takes.
 */
export function addSurveyOptions(command: Command): Command {
  return command
    .argument('[paths...]', 'Package roots, or one directory of packages (default: .)')
    .option('-l, --limit <n>', 'Analyze at most n packages (0: no limit)', parseCount)
    .option('-c, --config <path>', 'Config file (default: surveyor.config.yaml)')
    .option('--json', 'Output JSON lines')
    .option('-v, --verbose', 'Show debug logging')
    .option('--no-color', 'Disable colored output')
    .option(
      '--install <mode>',
      `Install dependencies before resolving (${INSTALL_MODES.join(', ')})`,
      parseInstallMode
    )
    .option('--require-install', 'Abort the run when an installation fails')
    .option('--no-nested', 'Do not analyze packages nested inside package roots')
    .option('--exclude <globs>', 'Extra globs to exclude (comma-separated)', parseList);
}

/**
 * Load the config file and apply the command-line overrides.
 */
export async function resolveRunConfig(
  paths: string[],
  options: SurveyCommandOptions,
  extra: ConfigOverrides = {}
): Promise<RunConfig> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.json) {
    logger.setLevel('warn');
  }
  if (!options.color) {
    chalk.level = 0;
  }
  const config = await loadConfig(process.cwd(), options.config);
  return mergeConfig(
    config,
    {
      ...extra,
      limit: options.limit,
      exclude: options.exclude,
      nested: options.nested ? undefined : false,
      installMode: options.install,
      installRequired: options.requireInstall,
    },
    paths
  );
}

export function createReporter(options: SurveyCommandOptions): SurveyReporter {
  return options.json ? new JsonReporter() : new HumanReporter({ colors: options.color });
}

/**
 * Wire up and run one survey.
 */
export async function runSurvey(
  config: RunConfig,
  reporter: SurveyReporter,
  detectors: PatternDetector[],
  showDiagnostics: boolean
): Promise<SurveyResult> {
  const participants: SurveyParticipant[] = [];
  if (showDiagnostics) {
    participants.push(
      new DiagnosticAdvisor({
        reporter,
        hidden: config.diagnostics.hidden,
        cap: config.diagnostics.cap,
      })
    );
  }

  const driver = new SurveyDriver({
    paths: config.paths,
    resolver: new TsMorphResolver({ include: config.include, exclude: config.exclude }),
    reporter,
    detectors,
    participants,
    limit: config.limit,
    exampleLimit: config.examples,
    nested: config.nested,
    installer: new NpmInstaller(),
    install: config.install,
  });
  return driver.run();
}
