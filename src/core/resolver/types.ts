/**
 * Parser/resolver contract.
 */
import type { Diagnostic } from '../diagnostics/types.js';
import type { SurveyPackage } from '../discovery/packages.js';
import type { SourceUnitNode } from '../tree/types.js';

/**
 * One resolved compilation unit. Built on demand and dropped once walked;
 * its syntax tree is built only when asked for.
 */
export interface PackageUnit {
  package: SurveyPackage;
  /** Path relative to the package root, `/`-separated. */
  path: string;
  /** Package-qualified path used in evidence and diagnostics. */
  source: string;
  text: string;
  buildTree(): SourceUnitNode;
  diagnostics: Diagnostic[];
}

/**
 * A compilation unit not built yet. `load` parses and resolves it; faults
 * raised there belong to this file only.
 */
export interface UnitSource {
  path: string;
  load(): PackageUnit;
}

export interface ResolvedPackage {
  package: SurveyPackage;
  /** Package-level diagnostics (manifest, compiler configuration). */
  diagnostics: Diagnostic[];
  units: UnitSource[];
  /** Release the package's parser state. */
  dispose(): void;
}

export interface PackageResolver {
  /**
   * Resolve a package. Throws ConfigError for a missing or malformed
   * manifest and ResolveError when the package cannot be resolved.
   */
  resolvePackage(pkg: SurveyPackage): Promise<ResolvedPackage>;
}
