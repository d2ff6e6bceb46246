/**
 * JSON-lines survey output for machine consumption: one event object per line.
 */
import type { Diagnostic, RunStatsSnapshot } from '../../core/diagnostics/types.js';
import type { CategoryResult } from '../../core/evidence/types.js';
import type { ProgressEvent, SurveyReporter } from '../../core/survey/types.js';
import type { ReporterOptions } from './types.js';

export class JsonReporter implements SurveyReporter {
  private readonly print: (line: string) => void;
  private buffer: Record<string, unknown>[] = [];

  constructor(options: Partial<ReporterOptions> = {}) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  reportProgress(event: ProgressEvent): void {
    this.buffer.push({ type: 'progress', package: event.name, index: event.index, total: event.total });
    this.flush();
  }

  reportCategory(result: CategoryResult): void {
    this.buffer.push({
      type: 'category',
      category: result.category,
      count: result.count,
      examples: [...result.examples],
    });
  }

  reportDiagnostics(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.buffer.push({
        type: 'diagnostic',
        severity: diagnostic.severity,
        code: diagnostic.code,
        message: diagnostic.message,
        source: diagnostic.location.source,
        offset: diagnostic.location.offset,
        line: diagnostic.location.line,
        column: diagnostic.location.column,
      });
    }
  }

  reportStats(stats: RunStatsSnapshot): void {
    this.buffer.push({
      type: 'stats',
      packages_seen: stats.packagesSeen,
      packages_skipped: stats.packagesSkipped,
      files_analyzed: stats.filesAnalyzed,
      errors: stats.errorCount,
      warnings: stats.warningCount,
    });
  }

  reportElapsed(ms: number): void {
    this.buffer.push({ type: 'elapsed', ms: Math.round(ms) });
  }

  flush(): void {
    const events = this.buffer;
    this.buffer = [];
    for (const event of events) {
      this.print(JSON.stringify(event));
    }
  }
}
