/**
 * Running statistics for a survey.
 */
import type { Diagnostic, RunStatsSnapshot } from './types.js';

export class RunStats {
  private packagesSeen = 0;
  private packagesSkipped = 0;
  private filesAnalyzed = 0;
  private errorCount = 0;
  private warningCount = 0;

  packageSeen(): number {
    return ++this.packagesSeen;
  }

  packageSkipped(): void {
    this.packagesSkipped++;
  }

  fileAnalyzed(): void {
    this.filesAnalyzed++;
  }

  /** Tally a diagnostic that was shown. */
  count(diagnostic: Diagnostic): void {
    if (diagnostic.severity === 'error') {
      this.errorCount++;
    } else if (diagnostic.severity === 'warning') {
      this.warningCount++;
    }
  }

  snapshot(): RunStatsSnapshot {
    return {
      packagesSeen: this.packagesSeen,
      packagesSkipped: this.packagesSkipped,
      filesAnalyzed: this.filesAnalyzed,
      errorCount: this.errorCount,
      warningCount: this.warningCount,
    };
  }
}
