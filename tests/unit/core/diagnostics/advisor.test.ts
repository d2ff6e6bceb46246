/**
 * Tests for the diagnostic advisor.
 */
import { describe, it, expect } from 'vitest';
import { DiagnosticAdvisor } from '../../../../src/core/diagnostics/advisor.js';
import type { SurveyPackage } from '../../../../src/core/discovery/packages.js';
import type { PackageUnit, ResolvedPackage } from '../../../../src/core/resolver/types.js';
import * as nodes from '../../../../src/core/tree/nodes.js';
import type { Diagnostic } from '../../../../src/core/diagnostics/types.js';
import { CollectingReporter, diagnostic } from './helpers.js';

const pkg: SurveyPackage = { root: '/work/alpha', name: 'alpha', subDir: false, nestedRoots: [] };

function unit(diagnostics: Diagnostic[]): PackageUnit {
  return {
    package: pkg,
    path: 'src/a.ts',
    source: 'alpha/src/a.ts',
    text: '',
    buildTree: () => nodes.sourceUnit({ start: 0, end: 0 }, []),
    diagnostics,
  };
}

function resolved(diagnostics: Diagnostic[]): ResolvedPackage {
  return { package: pkg, diagnostics, units: [], dispose: () => {} };
}

describe('DiagnosticAdvisor', () => {
  it('should forward only the error of an error, a lint and a hint', () => {
    const reporter = new CollectingReporter();
    const advisor = new DiagnosticAdvisor({ reporter });
    const error = diagnostic('error', 'TS2322');

    advisor.onUnitAnalyzed(unit([error, diagnostic('lint', 'no-console'), diagnostic('hint', 'TS6133')]));

    expect(reporter.diagnostics).toEqual([error]);
    expect(reporter.events).toEqual(['diagnostics:1', 'flush']);
    expect(advisor.stats.snapshot()).toEqual({
      packagesSeen: 0,
      packagesSkipped: 0,
      filesAnalyzed: 1,
      errorCount: 1,
      warningCount: 0,
    });
  });

  it('should hide info and todo by default', () => {
    const advisor = new DiagnosticAdvisor({ reporter: new CollectingReporter() });

    expect(advisor.isShown(diagnostic('info', 'TS1'))).toBe(false);
    expect(advisor.isShown(diagnostic('todo', 'TODO'))).toBe(false);
    expect(advisor.isShown(diagnostic('warning', 'TS2'))).toBe(true);
  });

  it('should show every severity when nothing is hidden', () => {
    const reporter = new CollectingReporter();
    const advisor = new DiagnosticAdvisor({ reporter, hidden: [] });

    advisor.onUnitAnalyzed(unit([diagnostic('hint', 'TS6133'), diagnostic('warning', 'TS7027')]));

    expect(reporter.diagnostics.map((d) => d.code)).toEqual(['TS6133', 'TS7027']);
    expect(advisor.stats.snapshot().warningCount).toBe(1);
    expect(advisor.stats.snapshot().errorCount).toBe(0);
  });

  it('should not report or flush when nothing is shown', () => {
    const reporter = new CollectingReporter();
    const advisor = new DiagnosticAdvisor({ reporter });

    advisor.onUnitAnalyzed(unit([diagnostic('todo', 'TODO')]));

    expect(reporter.events).toEqual([]);
    expect(advisor.stats.snapshot().filesAnalyzed).toBe(1);
  });

  it('should forward package-level diagnostics without counting a file', () => {
    const reporter = new CollectingReporter();
    const advisor = new DiagnosticAdvisor({ reporter });

    advisor.onPackageDiagnostics(resolved([diagnostic('error', 'TS5023', 'alpha')]));

    expect(reporter.diagnostics).toHaveLength(1);
    expect(advisor.stats.snapshot().filesAnalyzed).toBe(0);
    expect(advisor.stats.snapshot().errorCount).toBe(1);
  });

  it('should count seen and skipped packages', () => {
    const advisor = new DiagnosticAdvisor({ reporter: new CollectingReporter() });

    advisor.preAnalysis(pkg);
    advisor.preAnalysis(pkg);
    advisor.onPackageSkipped(pkg);

    expect(advisor.stats.snapshot()).toMatchObject({ packagesSeen: 2, packagesSkipped: 1 });
  });

  it('should stop the run once the cap is reached', () => {
    const advisor = new DiagnosticAdvisor({ reporter: new CollectingReporter(), cap: 2 });
    const commands = { continueAnalyzing: true };

    advisor.preAnalysis(pkg);
    advisor.postAnalysis(pkg, commands);
    expect(commands.continueAnalyzing).toBe(true);

    advisor.preAnalysis(pkg);
    advisor.postAnalysis(pkg, commands);
    expect(commands.continueAnalyzing).toBe(false);
  });

  it('should never stop the run without a cap', () => {
    const advisor = new DiagnosticAdvisor({ reporter: new CollectingReporter() });
    const commands = { continueAnalyzing: true };

    for (let i = 0; i < 5; i++) {
      advisor.preAnalysis(pkg);
      advisor.postAnalysis(pkg, commands);
    }

    expect(commands.continueAnalyzing).toBe(true);
  });

  it('should report the stats summary when the run finishes', () => {
    const reporter = new CollectingReporter();
    const advisor = new DiagnosticAdvisor({ reporter });
    advisor.preAnalysis(pkg);
    advisor.onPackageSkipped(pkg);

    advisor.onRunFinished();

    expect(reporter.events).toEqual(['stats', 'flush']);
    expect(reporter.stats).toEqual([
      { packagesSeen: 1, packagesSkipped: 1, filesAnalyzed: 0, errorCount: 0, warningCount: 0 },
    ]);
  });
});
