/**
 * Package manifest loading.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { formatZodError } from '../../utils/yaml.js';
import { MANIFEST_FILE } from '../discovery/packages.js';

const DependencyMapSchema = z.record(z.string(), z.string());

/** The parts of a `package.json` the surveyor reads. */
export const PackageManifestSchema = z.looseObject({
  name: z.string().optional(),
  version: z.string().optional(),
  dependencies: DependencyMapSchema.optional(),
  devDependencies: DependencyMapSchema.optional(),
  peerDependencies: DependencyMapSchema.optional(),
  workspaces: z.union([z.array(z.string()), z.looseObject({ packages: z.array(z.string()).optional() })]).optional(),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

/**
 * Read and validate the manifest at a package root.
 */
export async function readManifest(root: string): Promise<PackageManifest> {
  const manifestPath = path.join(root, MANIFEST_FILE);
  if (!(await fileExists(manifestPath))) {
    throw new ConfigError(
      ErrorCodes.MANIFEST_MISSING,
      `No ${MANIFEST_FILE} found in ${root}`,
      { path: manifestPath }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(manifestPath));
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.MANIFEST_INVALID,
      `Malformed ${MANIFEST_FILE} in ${root}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { path: manifestPath }
    );
  }

  const result = PackageManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.MANIFEST_INVALID,
      `Invalid ${MANIFEST_FILE} in ${root}: ${formatZodError(result.error)}`,
      { path: manifestPath, errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Whether the manifest declares any dependency that would need installing.
 */
export function declaresDependencies(manifest: PackageManifest): boolean {
  return [manifest.dependencies, manifest.devDependencies].some(
    (deps) => deps !== undefined && Object.keys(deps).length > 0
  );
}
