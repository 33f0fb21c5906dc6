import GENRE_KEYWORDS from './genre-keywords.json';

// Genre -> substrings of "title author"; earlier genres win ties
const KEYWORDS: Readonly<Record<string, readonly string[]>> = GENRE_KEYWORDS;

export const GENRES_CONFIG = {
  UNSPECIFIED: 'Unspecified',
  KEYWORDS,
} as const;
