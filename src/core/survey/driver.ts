/**
 * SurveyDriver: discovers packages, resolves and walks them one at a time,
 * then reduces and reports the evidence.
 */
import { performance } from 'node:perf_hooks';
import {
  ConfigError,
  DetectorCoverageError,
  ErrorCodes,
  InstallError,
  ResolveError,
  StateError,
  SurveyorError,
  TraversalError,
  errorMessage,
} from '../../utils/errors.js';
import { condense } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';
import { CompositeVisitor } from '../detectors/composite.js';
import { categoriesOf } from '../detectors/registry.js';
import type { PatternDetector } from '../detectors/types.js';
import { discoverPackages, type SurveyPackage } from '../discovery/packages.js';
import { Aggregator, createEvidence } from '../evidence/aggregator.js';
import { COVERAGE_GAP, type CategoryTag, type EvidenceRecord } from '../evidence/types.js';
import {
  ensureDependencies,
  type DependencyInstaller,
  type InstallMode,
} from '../packages/installer.js';
import type { PackageResolver, PackageUnit, ResolvedPackage, UnitSource } from '../resolver/types.js';
import type { SyntaxNode } from '../tree/types.js';
import { walk, type WalkScope } from '../tree/walker.js';
import type {
  DriverCommands,
  RunState,
  SurveyParticipant,
  SurveyPhase,
  SurveyReporter,
  SurveyResult,
} from './types.js';

const TRANSITIONS: { readonly [P in SurveyPhase]: readonly SurveyPhase[] } = {
  idle: ['discovering'],
  discovering: ['analyzing'],
  analyzing: ['reducing'],
  reducing: ['reporting'],
  reporting: ['done'],
  done: [],
};

export interface SurveyDriverOptions {
  paths: readonly string[];
  resolver: PackageResolver;
  reporter: SurveyReporter;
  detectors?: readonly PatternDetector[];
  participants?: readonly SurveyParticipant[];
  /** Maximum packages analyzed; 0 is unlimited. */
  limit?: number;
  /** Maximum examples per category; 0 keeps every example. */
  exampleLimit?: number;
  /** Queue packages nested inside package roots (default: true). */
  nested?: boolean;
  installer?: DependencyInstaller;
  install?: { mode: InstallMode; required: boolean };
  /** Milliseconds clock used for the elapsed time. */
  clock?: () => number;
}

export class SurveyDriver {
  private readonly state: RunState = {
    phase: 'idle',
    packagesAnalyzed: 0,
    packagesSkipped: 0,
    filesVisited: 0,
    filesFailed: 0,
    stopRequested: false,
  };
  private readonly detectors: readonly PatternDetector[];
  private readonly participants: readonly SurveyParticipant[];
  private readonly composite: CompositeVisitor;
  private readonly aggregator: Aggregator;
  private readonly clock: () => number;

  constructor(private readonly options: SurveyDriverOptions) {
    this.detectors = options.detectors ?? [];
    this.participants = options.participants ?? [];
    this.composite = new CompositeVisitor(this.detectors);
    this.aggregator = new Aggregator({ exampleLimit: options.exampleLimit });
    this.clock = options.clock ?? (() => performance.now());
  }

  get phase(): SurveyPhase {
    return this.state.phase;
  }

  async run(): Promise<SurveyResult> {
    if (this.state.phase !== 'idle') {
      throw new StateError(`Survey already started (phase: ${this.state.phase})`, {
        phase: this.state.phase,
      });
    }
    const startedAt = this.clock();

    this.transition('discovering');
    const packages = await this.discover();

    this.transition('analyzing');
    await this.analyzeAll(packages);

    this.transition('reducing');
    const categories = categoriesOf(this.detectors);
    if (this.aggregator.count(COVERAGE_GAP) > 0) {
      categories.push(COVERAGE_GAP);
    }
    const results = this.aggregator.reduce(categories);

    this.transition('reporting');
    const { reporter } = this.options;
    for (const result of results) {
      reporter.reportCategory(result);
    }
    const elapsedMs = this.clock() - startedAt;
    reporter.reportElapsed(elapsedMs);
    for (const participant of this.participants) {
      participant.onRunFinished?.();
    }
    reporter.flush();

    this.transition('done');
    return { results, state: { ...this.state }, elapsedMs };
  }

  private transition(next: SurveyPhase): void {
    const current = this.state.phase;
    if (!TRANSITIONS[current].includes(next)) {
      throw new StateError(`Illegal transition ${current} -> ${next}`, { from: current, to: next });
    }
    this.state.phase = next;
  }

  private async discover(): Promise<SurveyPackage[]> {
    const { packages, expandedFrom } = await discoverPackages(this.options.paths, {
      nested: this.options.nested,
    });
    if (expandedFrom) {
      logger.info(`Recursing into '${expandedFrom}'... (found ${packages.length} packages)`);
    }
    if (packages.length === 0) {
      throw new ConfigError(ErrorCodes.NO_PACKAGES, 'No packages to analyze', {
        paths: [...this.options.paths],
      });
    }
    const limit = this.options.limit ?? 0;
    if (limit > 0) {
      logger.info(`Limiting analysis to ${limit} packages.`);
    }
    return packages;
  }

  private async analyzeAll(packages: readonly SurveyPackage[]): Promise<void> {
    const limit = this.options.limit ?? 0;
    const commands: DriverCommands = { continueAnalyzing: true };

    for (const [index, pkg] of packages.entries()) {
      if (limit > 0 && this.started() >= limit) break;
      if (!commands.continueAnalyzing) {
        this.state.stopRequested = true;
        logger.debug(`Stopping after ${this.started()} packages`);
        break;
      }

      this.options.reporter.reportProgress({ name: pkg.name, index: index + 1, total: packages.length });
      await this.analyzePackage(pkg, commands);
    }
  }

  private started(): number {
    return this.state.packagesAnalyzed + this.state.packagesSkipped;
  }

  private async analyzePackage(pkg: SurveyPackage, commands: DriverCommands): Promise<void> {
    for (const participant of this.participants) {
      participant.preAnalysis?.(pkg, { subDir: pkg.subDir });
    }

    const resolved = await this.resolve(pkg);
    if (resolved) {
      this.state.packagesAnalyzed++;
      try {
        for (const participant of this.participants) {
          participant.onPackageDiagnostics?.(resolved);
        }
        for (const source of resolved.units) {
          this.analyzeUnit(source, resolved);
        }
      } finally {
        resolved.dispose();
      }
    }

    for (const participant of this.participants) {
      participant.postAnalysis?.(pkg, commands);
    }
  }

  /**
   * Install (when configured) and resolve a package. Returns undefined when
   * the package is skipped.
   */
  private async resolve(pkg: SurveyPackage): Promise<ResolvedPackage | undefined> {
    const { installer, install } = this.options;
    try {
      if (installer && install) {
        const outcome = await ensureDependencies(pkg, installer, install.mode);
        logger.debug(`${pkg.name}: dependencies ${outcome}`);
      }
      return await this.options.resolver.resolvePackage(pkg);
    } catch (error) {
      if (error instanceof InstallError && install?.required) {
        throw error;
      }
      const fault =
        error instanceof ConfigError || error instanceof ResolveError
          ? error
          : new ResolveError(ErrorCodes.RESOLVE_FAILED, errorMessage(error), { package: pkg.name });
      logger.warn(`Skipping '${pkg.name}': ${fault.message}`);
      this.state.packagesSkipped++;
      for (const participant of this.participants) {
        participant.onPackageSkipped?.(pkg, fault);
      }
      return undefined;
    }
  }

  /**
   * Load one unit, walk it and hand it to the participants. A unit that
   * cannot be loaded is skipped; a failed walk drops only its evidence.
   */
  private analyzeUnit(source: UnitSource, resolved: ResolvedPackage): void {
    const unit = this.loadUnit(source, resolved);
    if (!unit) return;

    if (this.walkUnit(unit)) {
      this.state.filesVisited++;
    } else {
      this.state.filesFailed++;
    }
    for (const participant of this.participants) {
      participant.onUnitAnalyzed?.(unit);
    }
  }

  private loadUnit(source: UnitSource, resolved: ResolvedPackage): PackageUnit | undefined {
    try {
      return source.load();
    } catch (error) {
      this.state.filesFailed++;
      this.unitFailed(error, `${resolved.package.name}/${source.path}`);
      return undefined;
    }
  }

  /**
   * Walk a unit with the detectors. Evidence is committed only when the
   * whole tree was walked.
   */
  private walkUnit(unit: PackageUnit): boolean {
    if (this.detectors.length === 0) return true;

    const pending: EvidenceRecord[] = [];
    try {
      walk(unit.buildTree(), this.composite, this.scopeFor(unit, pending));
    } catch (error) {
      this.unitFailed(error, unit.source);
      return false;
    }
    for (const record of pending) {
      this.aggregator.record(record);
    }
    return true;
  }

  private scopeFor(unit: PackageUnit, pending: EvidenceRecord[]): WalkScope {
    return {
      source: unit.source,
      text: unit.text,
      record: (category: CategoryTag, node: SyntaxNode): void => {
        pending.push(
          createEvidence(
            category,
            { source: unit.source, offset: node.start },
            condense(unit.text.slice(node.start, node.end))
          )
        );
      },
    };
  }

  private unitFailed(error: unknown, source: string): void {
    if (error instanceof DetectorCoverageError) {
      const offset = error.details?.offset;
      logger.warn(`Detector coverage gap in ${source}: ${error.message}`);
      this.aggregator.record(
        createEvidence(
          COVERAGE_GAP,
          { source, offset: typeof offset === 'number' ? offset : 0 },
          condense(error.message)
        )
      );
      return;
    }

    const fault =
      error instanceof SurveyorError
        ? error
        : new TraversalError(`Failed to analyze ${source}: ${errorMessage(error)}`, { source });
    logger.warn(fault.message);
  }
}
