export const BOOK_CLUB_CONFIG = {
  // A newer veto from the same member in the same round replaces the oldest one
  VETOES_PER_MEMBER_PER_ROUND: 1,
  MEMBER: {
    DEFAULT_PREFERRED_LENGTH: 300,
    MIN_PREFERRED_LENGTH: 100,
    MAX_PREFERRED_LENGTH: 1000,
  },
  BOOK: {
    MIN_PAGE_COUNT: 1,
  },
} as const;
