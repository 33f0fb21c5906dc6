import { BookClubSnapshotSource } from '../../book-club/store/BookClubStore';
import { ValidationError } from '../../common/errors';
import { RECOMMENDATIONS_CONFIG } from '../config';
import {
  Candidate,
  FilterResult,
  HistoryEntry,
  Participant,
  Recommendation,
  RoundContext,
} from '../dto/recommendation.dto';
import { ConstraintFilter, recentCategories } from './ConstraintFilter';
import { ScoringEngine } from './ScoringEngine';

export interface RecommendationSnapshot {
  pool: Candidate[];
  participants: Participant[];
  history: HistoryEntry[];
  round: number;
  exclusions: string[];
}

/**
 * Ranks the pool for the round being decided. Reads everything up front, then runs
 * the filter and the scoring engine over that snapshot without touching the store again.
 */
export class RecommendationService {
  constructor(
    private readonly store: BookClubSnapshotSource,
    private readonly engine: ScoringEngine = new ScoringEngine(),
    private readonly constraints: ConstraintFilter = new ConstraintFilter(),
  ) {}

  async recommend(topN: number = RECOMMENDATIONS_CONFIG.DEFAULT_TOP_N): Promise<Recommendation[]> {
    if (!Number.isInteger(topN) || topN < 1) {
      throw new ValidationError(`topN must be a positive integer, got ${topN}`);
    }

    const snapshot = await this.loadSnapshot();
    return this.rank(snapshot, topN);
  }

  rank(snapshot: RecommendationSnapshot, topN: number): Recommendation[] {
    const result = this.constraints.partition(snapshot.pool, snapshot.history, snapshot.exclusions);
    this.logFilterStats(snapshot, result);

    if (result.kept.length === 0) {
      console.log(`No eligible books for round ${snapshot.round}`);
      return [];
    }

    const scored: Recommendation[] = result.kept.map(candidate => ({
      ...candidate,
      ...this.engine.score(candidate, snapshot.participants, snapshot.history),
    }));

    // Array.prototype.sort is stable: ties keep filter order
    return scored.sort((a, b) => b.score - a.score).slice(0, topN);
  }

  async distinctCategoriesInPool(): Promise<string[]> {
    const pool = await this.store.listCandidates();
    return [...new Set(pool.map(c => c.category))].sort();
  }

  async roundContext(): Promise<RoundContext> {
    const [history, round] = await Promise.all([this.store.listHistory(), this.store.currentRoundNumber()]);
    const vetoedCategories = await this.store.listExclusions(round);

    return {
      round,
      recentCategories: recentCategories(history, RECOMMENDATIONS_CONFIG.FILTER.RECENT_CATEGORY_WINDOW),
      vetoedCategories,
    };
  }

  private async loadSnapshot(): Promise<RecommendationSnapshot> {
    const [pool, participants, history, round] = await Promise.all([
      this.store.listCandidates(),
      this.store.listParticipants(),
      this.store.listHistory(),
      this.store.currentRoundNumber(),
    ]);
    const exclusions = await this.store.listExclusions(round);

    return { pool, participants, history, round, exclusions };
  }

  private logFilterStats(snapshot: RecommendationSnapshot, result: FilterResult): void {
    const byRule: Record<string, number> = {};
    for (const { rule } of result.removed) {
      byRule[rule] = (byRule[rule] || 0) + 1;
    }

    console.log(`Round ${snapshot.round}: ${result.kept.length} of ${snapshot.pool.length} books eligible`, {
      removed: byRule,
      vetoed: snapshot.exclusions,
    });
  }
}
