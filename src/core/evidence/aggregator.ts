/**
 * Accumulates evidence per category across a run and reduces it to
 * counts plus a bounded list of examples.
 */
import type { CategoryResult, CategoryTag, EvidenceRecord, SourceLocation } from './types.js';

export interface AggregatorOptions {
  /** Maximum examples per category; 0 keeps every example. */
  exampleLimit?: number;
}

export const DEFAULT_EXAMPLE_LIMIT = 25;

/**
 * Create an immutable evidence record.
 */
export function createEvidence(
  category: CategoryTag,
  location: SourceLocation,
  rendered: string
): EvidenceRecord {
  return Object.freeze({
    category,
    location: Object.freeze({ source: location.source, offset: location.offset }),
    rendered,
  });
}

/**
 * Render an evidence record as a report example line.
 */
export function describeEvidence(record: EvidenceRecord): string {
  return `${record.rendered} at ${record.location.offset} in ${record.location.source}`;
}

export class Aggregator {
  private readonly records = new Map<CategoryTag, EvidenceRecord[]>();
  readonly exampleLimit: number;

  constructor(options: AggregatorOptions = {}) {
    this.exampleLimit = options.exampleLimit ?? DEFAULT_EXAMPLE_LIMIT;
  }

  record(evidence: EvidenceRecord): void {
    const existing = this.records.get(evidence.category);
    if (existing) {
      existing.push(evidence);
    } else {
      this.records.set(evidence.category, [evidence]);
    }
  }

  count(category: CategoryTag): number {
    return this.records.get(category)?.length ?? 0;
  }

  /** Categories that have at least one record, in first-seen order. */
  categories(): CategoryTag[] {
    return [...this.records.keys()];
  }

  /** Records of a category in detection order. */
  recordsOf(category: CategoryTag): readonly EvidenceRecord[] {
    return [...(this.records.get(category) ?? [])];
  }

  /**
   * A new aggregator holding this aggregator's records followed by the
   * other's. Counts are the sums; examples keep this-then-other order.
   */
  merge(other: Aggregator): Aggregator {
    const merged = new Aggregator({ exampleLimit: this.exampleLimit });
    for (const source of [this, other]) {
      for (const list of source.records.values()) {
        for (const record of list) {
          merged.record(record);
        }
      }
    }
    return merged;
  }

  /**
   * Reduce to one result per category. With `categories` given, every listed
   * category is reported (zero counts included) in that order; otherwise
   * recorded categories are reported in first-seen order.
   */
  reduce(categories?: readonly CategoryTag[]): CategoryResult[] {
    const order = categories ?? this.categories();
    return order.map((category) => this.reduceCategory(category));
  }

  private reduceCategory(category: CategoryTag): CategoryResult {
    const list = this.records.get(category) ?? [];
    const bounded = this.exampleLimit > 0 ? list.slice(0, this.exampleLimit) : list;
    return Object.freeze({
      category,
      count: list.length,
      examples: Object.freeze(bounded.map(describeEvidence)),
    });
  }
}
