/**
 * Driver-facing contracts: reporters, participants and run state.
 */
import type { SurveyorError } from '../../utils/errors.js';
import type { Diagnostic, RunStatsSnapshot } from '../diagnostics/types.js';
import type { SurveyPackage } from '../discovery/packages.js';
import type { CategoryResult } from '../evidence/types.js';
import type { PackageUnit, ResolvedPackage } from '../resolver/types.js';

export type SurveyPhase = 'idle' | 'discovering' | 'analyzing' | 'reducing' | 'reporting' | 'done';

export interface ProgressEvent {
  /** Display name of the package. */
  name: string;
  /** 1-based position among the discovered packages. */
  index: number;
  total: number;
}

/**
 * Renders a survey. Implementations may buffer; `flush` pushes buffered
 * output to the stream.
 */
export interface SurveyReporter {
  reportProgress(event: ProgressEvent): void;
  reportCategory(result: CategoryResult): void;
  reportDiagnostics(diagnostics: readonly Diagnostic[]): void;
  reportStats(stats: RunStatsSnapshot): void;
  reportElapsed(ms: number): void;
  flush(): void;
}

/**
 * Mutable commands a participant may issue to the driver.
 */
export interface DriverCommands {
  /** Cleared to stop scheduling further packages. */
  continueAnalyzing: boolean;
}

export interface PackageAnalysisContext {
  /** True for a package nested inside another package root. */
  subDir: boolean;
}

/**
 * Hooks called by the driver around package analysis. All optional.
 */
export interface SurveyParticipant {
  preAnalysis?(pkg: SurveyPackage, context: PackageAnalysisContext): void;
  onPackageDiagnostics?(resolved: ResolvedPackage): void;
  onUnitAnalyzed?(unit: PackageUnit): void;
  onPackageSkipped?(pkg: SurveyPackage, error: SurveyorError): void;
  postAnalysis?(pkg: SurveyPackage, commands: DriverCommands): void;
  onRunFinished?(): void;
}

/**
 * Counters owned by one run.
 */
export interface RunState {
  phase: SurveyPhase;
  packagesAnalyzed: number;
  packagesSkipped: number;
  filesVisited: number;
  filesFailed: number;
  /** Set when a participant stopped the run before every package was analyzed. */
  stopRequested: boolean;
}

export interface SurveyResult {
  results: CategoryResult[];
  state: Readonly<RunState>;
  elapsedMs: number;
}
