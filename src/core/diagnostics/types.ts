/**
 * Diagnostics produced by a resolver.
 */

export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint' | 'lint' | 'todo';

export const DIAGNOSTIC_SEVERITIES: readonly DiagnosticSeverity[] = [
  'error',
  'warning',
  'info',
  'hint',
  'lint',
  'todo',
];

/** Severities not shown unless asked for. */
export const DEFAULT_HIDDEN_SEVERITIES: readonly DiagnosticSeverity[] = ['info', 'hint', 'lint', 'todo'];

export interface DiagnosticLocation {
  /** Package-qualified path, or the package name for package-level diagnostics. */
  source: string;
  offset: number;
  /** 1-based; 0 when unknown. */
  line: number;
  /** 1-based; 0 when unknown. */
  column: number;
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  /** Resolver-specific code, e.g. `TS2304`. */
  code: string;
  message: string;
  location: DiagnosticLocation;
}

/** Read-only view of run statistics. */
export interface RunStatsSnapshot {
  packagesSeen: number;
  packagesSkipped: number;
  filesAnalyzed: number;
  errorCount: number;
  warningCount: number;
}
