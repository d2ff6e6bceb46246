/**
 * Package discovery.
 *
 * A package root is a directory holding a `package.json` manifest. A single
 * path that is not a package root is expanded to its immediate subdirectories
 * (one level only). Packages nested inside a package root are queued right
 * after it.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, globFiles, isDirectory, listSubdirectories } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

export const MANIFEST_FILE = 'package.json';

export interface SurveyPackage {
  /** Absolute package root. */
  root: string;
  /** Display name: the directory name, qualified by its parent for nested packages. */
  name: string;
  /** True for a package nested inside another package root. */
  subDir: boolean;
  /** Roots of packages nested below this one; their files belong to them. */
  nestedRoots: string[];
}

export interface DiscoveryOptions {
  /** Queue packages nested inside package roots (default: true). */
  nested?: boolean;
}

export interface DiscoveryResult {
  packages: SurveyPackage[];
  /** Set when a single non-package path was expanded to its subdirectories. */
  expandedFrom?: string;
}

/**
 * Check whether a directory is a package root.
 */
export async function isPackageRoot(dir: string): Promise<boolean> {
  return fileExists(path.join(dir, MANIFEST_FILE));
}

/**
 * Turn the invocation paths into the ordered list of packages to analyze.
 */
export async function discoverPackages(
  paths: readonly string[],
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const resolved = paths.map((p) => path.resolve(p));
  let candidates = resolved;
  let expandedFrom: string | undefined;

  if (resolved.length === 1 && !(await isPackageRoot(resolved[0]))) {
    const dir = resolved[0];
    if (!(await isDirectory(dir))) {
      throw new ConfigError(ErrorCodes.PATH_NOT_FOUND, `Not a directory: ${dir}`, { path: dir });
    }
    candidates = await listSubdirectories(dir);
    expandedFrom = dir;
    logger.debug(`Recursing into '${dir}': found ${candidates.length} subdirectories`);
  }

  const packages: SurveyPackage[] = [];
  for (const root of candidates) {
    const top: SurveyPackage = { root, name: path.basename(root), subDir: false, nestedRoots: [] };
    packages.push(top);
    if (options.nested === false || !(await isPackageRoot(root))) continue;

    top.nestedRoots = await findNestedRoots(root);
    for (const nestedRoot of top.nestedRoots) {
      packages.push({
        root: nestedRoot,
        name: `${top.name}/${toPosix(path.relative(root, nestedRoot))}`,
        subDir: true,
        nestedRoots: top.nestedRoots.filter((other) => isInside(other, nestedRoot)),
      });
    }
  }

  return { packages, expandedFrom };
}

/**
 * Package roots below `root`, sorted, excluding `root` itself.
 */
export async function findNestedRoots(root: string): Promise<string[]> {
  const manifests = await globFiles(`**/${MANIFEST_FILE}`, {
    cwd: root,
    ignore: ['**/node_modules/**', '**/.*/**'],
    absolute: true,
  });
  return manifests
    .map((manifest) => path.dirname(path.resolve(manifest)))
    .filter((dir) => dir !== root)
    .sort();
}

/**
 * True when `candidate` lies strictly inside `dir`.
 */
export function isInside(candidate: string, dir: string): boolean {
  const relative = path.relative(dir, candidate);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
