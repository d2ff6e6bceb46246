/**
 * Collecting reporter and sample diagnostics.
 */
import type { Diagnostic, DiagnosticSeverity, RunStatsSnapshot } from '../../../../src/core/diagnostics/types.js';
import type { CategoryResult } from '../../../../src/core/evidence/types.js';
import type { ProgressEvent, SurveyReporter } from '../../../../src/core/survey/types.js';

export class CollectingReporter implements SurveyReporter {
  readonly events: string[] = [];
  readonly progress: ProgressEvent[] = [];
  readonly categories: CategoryResult[] = [];
  readonly diagnostics: Diagnostic[] = [];
  readonly stats: RunStatsSnapshot[] = [];
  elapsed: number | undefined;
  flushes = 0;

  reportProgress(event: ProgressEvent): void {
    this.events.push(`progress:${event.name}`);
    this.progress.push(event);
  }

  reportCategory(result: CategoryResult): void {
    this.events.push(`category:${result.category}`);
    this.categories.push(result);
  }

  reportDiagnostics(diagnostics: readonly Diagnostic[]): void {
    this.events.push(`diagnostics:${diagnostics.length}`);
    this.diagnostics.push(...diagnostics);
  }

  reportStats(stats: RunStatsSnapshot): void {
    this.events.push('stats');
    this.stats.push(stats);
  }

  reportElapsed(ms: number): void {
    this.events.push('elapsed');
    this.elapsed = ms;
  }

  flush(): void {
    this.events.push('flush');
    this.flushes++;
  }
}

export function diagnostic(severity: DiagnosticSeverity, code: string, source = 'alpha/src/a.ts'): Diagnostic {
  return {
    severity,
    code,
    message: `${severity} message`,
    location: { source, offset: 0, line: 1, column: 1 },
  };
}
