/**
 * Human-readable survey output.
 */
import chalk from 'chalk';
import type { Diagnostic, DiagnosticSeverity, RunStatsSnapshot } from '../../core/diagnostics/types.js';
import type { CategoryResult } from '../../core/evidence/types.js';
import type { ProgressEvent, SurveyReporter } from '../../core/survey/types.js';
import { formatDuration, pluralize } from '../../utils/format.js';
import type { ReporterOptions } from './types.js';

type Color = 'red' | 'yellow' | 'cyan' | 'green' | 'dim' | 'bold';

export class HumanReporter implements SurveyReporter {
  private options: ReporterOptions;
  private buffer: string[] = [];

  constructor(options: Partial<ReporterOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      print: options.print ?? ((line) => console.log(line)),
    };
  }

  reportProgress(event: ProgressEvent): void {
    this.buffer.push(`Analyzing '${event.name}' • [${event.index}/${event.total}]...`);
    this.flush();
  }

  reportCategory(result: CategoryResult): void {
    this.buffer.push(this.colorize(`***** Found ${pluralize(result.count, result.category)}`, 'bold'));
    for (const example of result.examples) {
      this.buffer.push(`  ${example}`);
    }
    const hidden = result.count - result.examples.length;
    if (hidden > 0) {
      this.buffer.push(this.colorize(`  ... and ${hidden} more`, 'dim'));
    }
  }

  reportDiagnostics(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.buffer.push(this.formatDiagnostic(diagnostic));
    }
  }

  reportStats(stats: RunStatsSnapshot): void {
    const errors = this.colorize(pluralize(stats.errorCount, 'error'), stats.errorCount > 0 ? 'red' : 'green');
    const warnings = this.colorize(
      pluralize(stats.warningCount, 'warning'),
      stats.warningCount > 0 ? 'yellow' : 'green'
    );
    this.buffer.push(`${errors} and ${warnings} found.`);
    this.buffer.push(
      `${pluralize(stats.packagesSeen, 'package')} seen, ${stats.packagesSkipped} skipped, ` +
        `${pluralize(stats.filesAnalyzed, 'file')} analyzed.`
    );
  }

  reportElapsed(ms: number): void {
    this.buffer.push(this.colorize(`(Elapsed time: ${formatDuration(ms)})`, 'dim'));
  }

  flush(): void {
    const lines = this.buffer;
    this.buffer = [];
    for (const line of lines) {
      this.options.print(line);
    }
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const { source, line, column } = diagnostic.location;
    const severity = this.colorize(diagnostic.severity, severityColor(diagnostic.severity));
    return `  ${severity} • ${diagnostic.message} at ${source}:${line}:${column} • (${diagnostic.code})`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

function severityColor(severity: DiagnosticSeverity): Color {
  switch (severity) {
    case 'error':
      return 'red';
    case 'warning':
      return 'yellow';
    default:
      return 'cyan';
  }
}
