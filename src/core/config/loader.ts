/**
 * Configuration loading and merging with command-line overrides.
 */
import * as path from 'node:path';
import { SurveyConfigSchema, type SurveyConfig } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { DetectorId } from '../detectors/types.js';
import type { InstallMode } from '../packages/installer.js';

export const DEFAULT_CONFIG_FILE = 'surveyor.config.yaml';

/**
 * Values given on the command line. Unset fields keep the file's value.
 */
export interface ConfigOverrides {
  limit?: number;
  examples?: number;
  exclude?: string[];
  detectors?: DetectorId[];
  nested?: boolean;
  showAllDiagnostics?: boolean;
  installMode?: InstallMode;
  installRequired?: boolean;
}

/**
 * Everything one survey run needs, fixed before the run starts.
 */
export interface RunConfig extends SurveyConfig {
  paths: string[];
}

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): SurveyConfig {
  return SurveyConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicit path
 * must exist.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<SurveyConfig> {
  const fullPath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.PATH_NOT_FOUND, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, SurveyConfigSchema);
}

/**
 * Apply command-line overrides to a loaded configuration.
 */
export function mergeConfig(
  config: SurveyConfig,
  overrides: ConfigOverrides,
  paths: string[]
): RunConfig {
  return {
    ...config,
    paths: paths.length > 0 ? paths : ['.'],
    limit: overrides.limit ?? config.limit,
    examples: overrides.examples ?? config.examples,
    exclude: [...config.exclude, ...(overrides.exclude ?? [])],
    detectors: overrides.detectors ?? config.detectors,
    nested: overrides.nested ?? config.nested,
    diagnostics: {
      ...config.diagnostics,
      hidden: overrides.showAllDiagnostics ? [] : config.diagnostics.hidden,
    },
    install: {
      mode: overrides.installMode ?? config.install.mode,
      required: overrides.installRequired ?? config.install.required,
    },
  };
}
