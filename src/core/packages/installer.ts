/**
 * Optional dependency installation before a package is resolved.
 */
import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { InstallError, errorMessage } from '../../utils/errors.js';
import { isDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { SurveyPackage } from '../discovery/packages.js';
import { declaresDependencies, readManifest } from '../resolver/manifest.js';

const execFileAsync = promisify(execFile);

export type InstallMode = 'skip' | 'auto' | 'force';

export const INSTALL_MODES: readonly InstallMode[] = ['skip', 'auto', 'force'];

export type InstallOutcome = 'skipped' | 'present' | 'installed';

export interface DependencyInstaller {
  /** Install the package's dependencies. Throws InstallError on failure. */
  install(pkg: SurveyPackage): Promise<void>;
}

export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<void>;

async function runCommand(command: string, args: string[], cwd: string): Promise<void> {
  await execFileAsync(command, args, { cwd, encoding: 'utf-8', maxBuffer: 16 * 1024 * 1024 });
}

/**
 * Installs with `npm install`, without running lifecycle scripts.
 */
export class NpmInstaller implements DependencyInstaller {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async install(pkg: SurveyPackage): Promise<void> {
    const args = ['install', '--ignore-scripts', '--no-audit', '--no-fund'];
    logger.debug(`${pkg.name}: npm ${args.join(' ')}`);
    try {
      await this.run('npm', args, pkg.root);
    } catch (error) {
      throw new InstallError(`npm install failed in ${pkg.name}: ${errorMessage(error)}`, {
        package: pkg.name,
        root: pkg.root,
      });
    }
  }
}

export function isInstallMode(value: string): value is InstallMode {
  return INSTALL_MODES.some((mode) => mode === value);
}

/**
 * Whether a package declares dependencies but has no `node_modules` yet.
 */
export async function needsInstall(pkg: SurveyPackage): Promise<boolean> {
  const manifest = await readManifest(pkg.root);
  if (!declaresDependencies(manifest)) return false;
  return !(await isDirectory(path.join(pkg.root, 'node_modules')));
}

/**
 * Apply the install mode to one package.
 */
export async function ensureDependencies(
  pkg: SurveyPackage,
  installer: DependencyInstaller,
  mode: InstallMode
): Promise<InstallOutcome> {
  switch (mode) {
    case 'skip':
      return 'skipped';
    case 'auto':
      if (!(await needsInstall(pkg))) return 'present';
      await installer.install(pkg);
      return 'installed';
    case 'force':
      await installer.install(pkg);
      return 'installed';
  }
}
