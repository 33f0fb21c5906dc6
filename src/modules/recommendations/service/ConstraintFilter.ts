import { RECOMMENDATIONS_CONFIG } from '../config';
import { Candidate, FilterResult, FilterRule, HistoryEntry } from '../dto/recommendation.dto';

/** History sorted most recent first. Stable for entries sharing a round. */
export function byRecency(history: readonly HistoryEntry[]): HistoryEntry[] {
  return [...history].sort((a, b) => b.roundNumber - a.roundNumber);
}

export function recentCategories(history: readonly HistoryEntry[], window: number): string[] {
  return byRecency(history).slice(0, window).map(entry => entry.category);
}

/**
 * Hard rules applied before scoring. A book is dropped when it was already read,
 * when its genre matches one of the most recent picks, or when its genre is vetoed
 * for the round being decided.
 */
export class ConstraintFilter {
  constructor(private readonly recentWindow: number = RECOMMENDATIONS_CONFIG.FILTER.RECENT_CATEGORY_WINDOW) {}

  filter(
    pool: readonly Candidate[],
    history: readonly HistoryEntry[],
    excludedCategories: readonly string[],
  ): Candidate[] {
    return this.partition(pool, history, excludedCategories).kept;
  }

  partition(
    pool: readonly Candidate[],
    history: readonly HistoryEntry[],
    excludedCategories: readonly string[],
  ): FilterResult {
    const readIds = new Set(history.map(entry => entry.candidateId));
    const recent = new Set(recentCategories(history, this.recentWindow));
    const vetoed = new Set(excludedCategories);

    const result: FilterResult = { kept: [], removed: [] };

    for (const candidate of pool) {
      let rule: FilterRule | null = null;
      if (readIds.has(candidate.id)) {
        rule = 'already-read';
      } else if (recent.has(candidate.category)) {
        rule = 'recent-category';
      } else if (vetoed.has(candidate.category)) {
        rule = 'vetoed-category';
      }

      if (rule) {
        result.removed.push({ candidate, rule });
      } else {
        result.kept.push(candidate);
      }
    }

    return result;
  }
}
