export interface Participant {
  id: number;
  name: string;
  preferredLength: number;
  likedCategories: string[];
}

export interface Candidate {
  id: number;
  title: string;
  author: string;
  category: string;
  length: number;
  suggestedBy: number | null;
  suggestedByName: string | null;
}

/** A past pick, joined with the picked book. */
export interface HistoryEntry {
  candidateId: number;
  roundNumber: number;
  title: string;
  author: string;
  category: string;
  length: number;
  readDate: Date | null;
}

export interface ScoreBreakdown {
  categoryMatch: number;
  lengthFit: number;
  suggesterInterest: number;
  diversityBonus: number;
}

export type ScoringWeights = ScoreBreakdown;

export interface CandidateScore {
  score: number;
  breakdown: ScoreBreakdown;
}

export type Recommendation = Candidate & CandidateScore;

export type FilterRule = 'already-read' | 'recent-category' | 'vetoed-category';

export interface FilterResult {
  kept: Candidate[];
  removed: Array<{ candidate: Candidate; rule: FilterRule }>;
}

export interface RoundContext {
  round: number;
  recentCategories: string[];
  vetoedCategories: string[];
}
