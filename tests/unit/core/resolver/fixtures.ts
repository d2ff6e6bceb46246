/**
 * Paths into the fixture workspace.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { SurveyPackage } from '../../../../src/core/discovery/packages.js';

export const WORKSPACE = fileURLToPath(new URL('../../../fixtures/workspace', import.meta.url));

export const ALPHA = path.join(WORKSPACE, 'alpha');
export const INNER = path.join(ALPHA, 'packages', 'inner');
export const BETA = path.join(WORKSPACE, 'beta');
export const GAMMA = path.join(WORKSPACE, 'gamma');

export function fixturePackage(root: string, overrides: Partial<SurveyPackage> = {}): SurveyPackage {
  return { root, name: path.basename(root), subDir: false, nestedRoots: [], ...overrides };
}
