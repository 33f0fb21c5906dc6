import { DEFAULT_WEIGHTS, RECOMMENDATIONS_CONFIG } from '../config';
import {
  Candidate,
  CandidateScore,
  HistoryEntry,
  Participant,
  ScoreBreakdown,
  ScoringWeights,
} from '../dto/recommendation.dto';
import { byRecency } from './ConstraintFilter';

const { SCORING, DIVERSITY_TIERS } = RECOMMENDATIONS_CONFIG;

const FACTORS: Array<keyof ScoringWeights> = ['categoryMatch', 'lengthFit', 'suggesterInterest', 'diversityBonus'];

export function roundTo2(value: number): number {
  return Number(value.toFixed(2));
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function categoryMatch(candidate: Candidate, participants: readonly Participant[]): number {
  if (participants.length === 0) {
    return SCORING.NEUTRAL_SCORE;
  }

  const fans = participants.filter(p => p.likedCategories.includes(candidate.category)).length;
  return (fans / participants.length) * SCORING.MAX_SCORE;
}

/** Loses one point per five pages away from the members' median preference. */
export function lengthFit(candidate: Candidate, participants: readonly Participant[]): number {
  if (participants.length === 0) {
    return SCORING.NEUTRAL_SCORE;
  }

  const ideal = median(participants.map(p => p.preferredLength));
  const penalty = Math.abs(candidate.length - ideal) / SCORING.PAGES_PER_PENALTY_POINT;
  return Math.max(0, SCORING.MAX_SCORE - penalty);
}

export function suggesterInterest(candidate: Candidate): number {
  return candidate.suggestedBy !== null ? SCORING.SUGGESTED_INTEREST : SCORING.HOUSE_INTEREST;
}

/**
 * Rewards genres that have not been picked for a while. Counts the picks made since
 * the genre was last read, over the whole history.
 */
export function diversityBonus(candidate: Candidate, history: readonly HistoryEntry[]): number {
  const picksSince = byRecency(history).findIndex(entry => entry.category === candidate.category);
  if (picksSince === -1) {
    return SCORING.MAX_SCORE;
  }

  const tier = DIVERSITY_TIERS.find(t => picksSince >= t.minPicksSince);
  return tier ? tier.score : 0;
}

export function validateWeights(weights: ScoringWeights): void {
  const negative = FACTORS.filter(factor => !(weights[factor] >= 0));
  if (negative.length > 0) {
    throw new RangeError(`Scoring weights must be non-negative numbers: ${negative.join(', ')}`);
  }

  const sum = FACTORS.reduce((acc, factor) => acc + weights[factor], 0);
  if (Math.abs(sum - 1) > SCORING.WEIGHT_SUM_TOLERANCE) {
    throw new RangeError(`Scoring weights must sum to 1, got ${sum}`);
  }
}

export class ScoringEngine {
  private readonly weights: Readonly<ScoringWeights>;

  constructor(weights: ScoringWeights = DEFAULT_WEIGHTS) {
    validateWeights(weights);
    this.weights = Object.freeze({ ...weights });
  }

  getWeights(): Readonly<ScoringWeights> {
    return this.weights;
  }

  score(candidate: Candidate, participants: readonly Participant[], history: readonly HistoryEntry[]): CandidateScore {
    const breakdown: ScoreBreakdown = {
      categoryMatch: categoryMatch(candidate, participants),
      lengthFit: lengthFit(candidate, participants),
      suggesterInterest: suggesterInterest(candidate),
      diversityBonus: diversityBonus(candidate, history),
    };

    const total = FACTORS.reduce((acc, factor) => acc + this.weights[factor] * breakdown[factor], 0);

    return { score: roundTo2(total), breakdown };
  }
}
