import type { Candidate, HistoryEntry, Participant } from '../../src/modules/recommendations/dto/recommendation.dto';

let nextId = 1000;

export function createParticipant(overrides: Partial<Participant> = {}): Participant {
  return {
    id: nextId++,
    name: 'Member',
    preferredLength: 300,
    likedCategories: ['Fantasy'],
    ...overrides,
  };
}

export function createCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    id: nextId++,
    title: 'Untitled',
    author: 'Anonymous',
    category: 'Fantasy',
    length: 300,
    suggestedBy: null,
    suggestedByName: null,
    ...overrides,
  };
}

export function createHistoryEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    candidateId: nextId++,
    roundNumber: 1,
    title: 'Read before',
    author: 'Anonymous',
    category: 'Mystery',
    length: 300,
    readDate: null,
    ...overrides,
  };
}
