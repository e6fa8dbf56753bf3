// Fuzzy matching over the uncategorized part of the response table.
//
// match() scores every uncategorized occurrence and returns one record per
// (row, column). Threshold filtering and grouping happen at read time in
// aggregateMatches(), so moving the threshold never needs a re-query.

import type { AggregatedMatch, MatchOutcome, MatchRecord } from './types.js';
import { UNCATEGORIZED, isMissing } from './types.js';
import type { ResponseStore } from './response-store.js';
import type { CategoryLedger } from './category-ledger.js';
import { weightedRatio, type SimilarityScorer } from './text-analyzer.js';

export class MatchEngine {
  private readonly store: ResponseStore;
  private readonly ledger: CategoryLedger;
  private readonly scorer: SimilarityScorer;

  constructor(store: ResponseStore, ledger: CategoryLedger, scorer: SimilarityScorer = weightedRatio) {
    this.store = store;
    this.ledger = ledger;
    this.scorer = scorer;
  }

  match(query: string): MatchOutcome {
    if (this.store.isEmpty()) {
      return { ok: false, code: 'NoDataset', message: 'There is no dataset in the current project to match against' };
    }

    // Each distinct value is scored once, however often it occurs
    const scores = new Map<string, number>();
    const records: MatchRecord[] = [];

    for (const column of this.store.responseColumns()) {
      const uncategorized = this.ledger.columnValues(UNCATEGORIZED, column);
      this.store.columnValues(column).forEach((value, row) => {
        if (isMissing(value) || !uncategorized.has(value)) return;
        let score = scores.get(value);
        if (score === undefined) {
          score = this.scorer(query, value);
          scores.set(value, score);
        }
        records.push({ value, score, column, row });
      });
    }

    return { ok: true, records };
  }
}

/** Group records by value: max score, occurrence count.
 *  Sorted by score desc, then count desc, then value for a stable order. */
export function aggregateMatches(records: readonly MatchRecord[], threshold: number): AggregatedMatch[] {
  const grouped = new Map<string, { score: number; count: number }>();
  for (const record of records) {
    if (record.score < threshold) continue;
    const group = grouped.get(record.value);
    if (group) {
      group.score = Math.max(group.score, record.score);
      group.count++;
    } else {
      grouped.set(record.value, { score: record.score, count: 1 });
    }
  }

  return [...grouped]
    .map(([value, { score, count }]) => ({ value, score, count }))
    .sort((a, b) => b.score - a.score || b.count - a.count || a.value.localeCompare(b.value));
}
