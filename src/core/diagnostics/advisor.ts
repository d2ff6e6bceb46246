/**
 * Participant that streams resolver diagnostics while the survey runs and
 * keeps the run statistics.
 */
import type { SurveyPackage } from '../discovery/packages.js';
import type { PackageUnit, ResolvedPackage } from '../resolver/types.js';
import type { DriverCommands, SurveyParticipant, SurveyReporter } from '../survey/types.js';
import { RunStats } from './stats.js';
import {
  DEFAULT_HIDDEN_SEVERITIES,
  type Diagnostic,
  type DiagnosticSeverity,
} from './types.js';

export interface DiagnosticAdvisorOptions {
  reporter: SurveyReporter;
  /** Severities never forwarded. */
  hidden?: readonly DiagnosticSeverity[];
  /** Stop scheduling packages once this many were seen. */
  cap?: number;
}

export class DiagnosticAdvisor implements SurveyParticipant {
  readonly stats = new RunStats();
  private readonly reporter: SurveyReporter;
  private readonly hidden: ReadonlySet<DiagnosticSeverity>;
  private readonly cap: number | undefined;

  constructor(options: DiagnosticAdvisorOptions) {
    this.reporter = options.reporter;
    this.hidden = new Set(options.hidden ?? DEFAULT_HIDDEN_SEVERITIES);
    this.cap = options.cap;
  }

  isShown(diagnostic: Diagnostic): boolean {
    return !this.hidden.has(diagnostic.severity);
  }

  preAnalysis(_pkg: SurveyPackage): void {
    this.stats.packageSeen();
  }

  onPackageDiagnostics(resolved: ResolvedPackage): void {
    this.forward(resolved.diagnostics);
  }

  onUnitAnalyzed(unit: PackageUnit): void {
    this.forward(unit.diagnostics);
    this.stats.fileAnalyzed();
  }

  onPackageSkipped(_pkg: SurveyPackage): void {
    this.stats.packageSkipped();
  }

  postAnalysis(_pkg: SurveyPackage, commands: DriverCommands): void {
    if (this.cap !== undefined && this.cap > 0 && this.stats.snapshot().packagesSeen >= this.cap) {
      commands.continueAnalyzing = false;
    }
  }

  onRunFinished(): void {
    this.reporter.reportStats(this.stats.snapshot());
    this.reporter.flush();
  }

  private forward(diagnostics: readonly Diagnostic[]): void {
    const shown = diagnostics.filter((diagnostic) => this.isShown(diagnostic));
    if (shown.length === 0) return;

    for (const diagnostic of shown) {
      this.stats.count(diagnostic);
    }
    this.reporter.reportDiagnostics(shown);
    this.reporter.flush();
  }
}
