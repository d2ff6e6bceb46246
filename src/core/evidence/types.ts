/**
 * Evidence records and the closed set of category tags detectors report under.
 */

export type Confidence = 'high' | 'low';

export type Namedness = 'unnamed' | 'named';

export type TearoffCategory = `${Confidence} confidence ${Namedness} tearoff`;

export type CategoryTag = 'type literal' | TearoffCategory | 'detector coverage gap';

export const TYPE_LITERAL: CategoryTag = 'type literal';

export const COVERAGE_GAP: CategoryTag = 'detector coverage gap';

/** Tearoff categories in report order. */
export const TEAROFF_CATEGORIES: readonly TearoffCategory[] = [
  'high confidence unnamed tearoff',
  'high confidence named tearoff',
  'low confidence unnamed tearoff',
  'low confidence named tearoff',
];

export const ALL_CATEGORIES: readonly CategoryTag[] = [
  TYPE_LITERAL,
  ...TEAROFF_CATEGORIES,
  COVERAGE_GAP,
];

export function tearoffCategory(confidence: Confidence, namedness: Namedness): TearoffCategory {
  return `${confidence} confidence ${namedness} tearoff`;
}

export function isCategoryTag(value: string): value is CategoryTag {
  return ALL_CATEGORIES.some((category) => category === value);
}

/** Where a match was found. */
export interface SourceLocation {
  /** Package-qualified path of the compilation unit. */
  readonly source: string;
  readonly offset: number;
}

/** One detected occurrence. */
export interface EvidenceRecord {
  readonly category: CategoryTag;
  readonly location: SourceLocation;
  /** Condensed source text of the matched node. */
  readonly rendered: string;
}

/** All evidence of one category, reduced. */
export interface CategoryResult {
  readonly category: CategoryTag;
  readonly count: number;
  /** First-seen examples, at most the configured limit. */
  readonly examples: readonly string[];
}
