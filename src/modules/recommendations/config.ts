import { ScoringWeights } from './dto/recommendation.dto';

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  categoryMatch: 0.4,
  lengthFit: 0.2,
  suggesterInterest: 0.3,
  diversityBonus: 0.1,
});

export const RECOMMENDATIONS_CONFIG = {
  DEFAULT_TOP_N: 10,
  FILTER: {
    // Genres of this many most recent picks are off the table
    RECENT_CATEGORY_WINDOW: 2,
  },
  SCORING: {
    MAX_SCORE: 100,
    NEUTRAL_SCORE: 50,
    PAGES_PER_PENALTY_POINT: 5,
    SUGGESTED_INTEREST: 100,
    HOUSE_INTEREST: 50,
    WEIGHT_SUM_TOLERANCE: 1e-9,
  },
  // Checked top to bottom: first tier whose minimum is reached wins
  DIVERSITY_TIERS: [
    { minPicksSince: 5, score: 100 },
    { minPicksSince: 3, score: 70 },
    { minPicksSince: 0, score: 0 },
  ],
} as const;
