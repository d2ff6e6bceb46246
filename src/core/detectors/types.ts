/**
 * Pattern detector contract.
 */
import type { CategoryTag } from '../evidence/types.js';
import type { NodeVisitor } from '../tree/walker.js';

export type DetectorId = 'type-literal' | 'tearoff';

export const DETECTOR_IDS: readonly DetectorId[] = ['type-literal', 'tearoff'];

/**
 * A detector is a visitor plus the closed set of categories it can record.
 * Detectors are stateless between units: all evidence goes through the
 * visit context.
 */
export interface PatternDetector extends NodeVisitor {
  readonly id: DetectorId;
  readonly categories: readonly CategoryTag[];
}
