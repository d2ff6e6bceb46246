/**
 * Registry of pattern detectors by id.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { CategoryTag } from '../evidence/types.js';
import { TearoffDetector } from './tearoff.js';
import { TypeLiteralDetector } from './type-literal.js';
import { DETECTOR_IDS, type DetectorId, type PatternDetector } from './types.js';

/**
 * Factory function for creating detectors.
 */
export type DetectorFactory = () => PatternDetector;

const FACTORIES: Record<DetectorId, DetectorFactory> = {
  'type-literal': () => new TypeLiteralDetector(),
  tearoff: () => new TearoffDetector(),
};

export function isDetectorId(value: string): value is DetectorId {
  return DETECTOR_IDS.some((id) => id === value);
}

/**
 * Create detectors for the given ids, in the given order, without duplicates.
 */
export function createDetectors(ids: readonly string[]): PatternDetector[] {
  const seen = new Set<DetectorId>();
  const detectors: PatternDetector[] = [];
  for (const id of ids) {
    if (!isDetectorId(id)) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Unknown detector: ${id}. Valid detectors: ${DETECTOR_IDS.join(', ')}`,
        { id }
      );
    }
    if (seen.has(id)) continue;
    seen.add(id);
    detectors.push(FACTORIES[id]());
  }
  return detectors;
}

/**
 * Every category the detectors can record, in report order.
 */
export function categoriesOf(detectors: readonly PatternDetector[]): CategoryTag[] {
  const categories: CategoryTag[] = [];
  for (const detector of detectors) {
    for (const category of detector.categories) {
      if (!categories.includes(category)) categories.push(category);
    }
  }
  return categories;
}
