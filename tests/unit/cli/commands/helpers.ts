/**
 * Captures the options each SurveyDriver is built with.
 */
import { vi } from 'vitest';
import type { SurveyDriverOptions } from '../../../../src/core/survey/driver.js';
import type { SurveyResult } from '../../../../src/core/survey/types.js';

export const built: SurveyDriverOptions[] = [];

export const EMPTY_RESULT: SurveyResult = {
  results: [],
  state: {
    phase: 'done',
    packagesAnalyzed: 0,
    packagesSkipped: 0,
    filesVisited: 0,
    filesFailed: 0,
    stopRequested: false,
  },
  elapsedMs: 0,
};

export const run = vi.fn(async (): Promise<SurveyResult> => EMPTY_RESULT);

export function FakeSurveyDriver(options: SurveyDriverOptions) {
  built.push(options);
  return { run };
}

export function lastOptions(): SurveyDriverOptions {
  const options = built[built.length - 1];
  if (!options) throw new Error('No survey was started');
  return options;
}
