import { BookClubStore } from '../../book-club/store/BookClubStore';
import { NotFoundError, ValidationError } from '../../common/errors';
import { Candidate } from '../../recommendations/dto/recommendation.dto';
import { GENRES_CONFIG } from '../config';

export interface UnspecifiedBook extends Candidate {
  suggestedGenre: string;
}

/** Keyword guess from title and author. */
export function suggestGenre(title: string, author = ''): string {
  const combined = `${title.toLowerCase()} ${author.toLowerCase()}`;

  let best: string = GENRES_CONFIG.UNSPECIFIED;
  let bestHits = 0;
  for (const [genre, keywords] of Object.entries(GENRES_CONFIG.KEYWORDS)) {
    const hits = keywords.filter(keyword => combined.includes(keyword)).length;
    if (hits > bestHits) {
      best = genre;
      bestHits = hits;
    }
  }
  return best;
}

/** Fills in what an imported pool is missing: genres and page counts. */
export class GenreHelperService {
  constructor(private readonly store: BookClubStore) {}

  async listUnspecified(): Promise<UnspecifiedBook[]> {
    const books = await this.store.listCandidates();
    return books
      .filter(book => book.category === GENRES_CONFIG.UNSPECIFIED)
      .map(book => ({ ...book, suggestedGenre: suggestGenre(book.title, book.author) }));
  }

  async availableGenres(): Promise<string[]> {
    const books = await this.store.listCandidates();
    const genres = new Set(Object.keys(GENRES_CONFIG.KEYWORDS));
    for (const book of books) {
      if (book.category !== GENRES_CONFIG.UNSPECIFIED) {
        genres.add(book.category);
      }
    }
    return [...genres].sort();
  }

  async assignGenre(bookId: number, genre: string): Promise<void> {
    const value = genre.trim();
    if (value === '') {
      throw new ValidationError('Genre must not be empty');
    }
    if (!(await this.store.updateBookGenre(bookId, value))) {
      throw new NotFoundError(`Book ${bookId} does not exist`);
    }
    console.log(`Book ${bookId} genre set to ${value}`);
  }

  async assignPageCount(bookId: number, pageCount: number): Promise<void> {
    if (!Number.isInteger(pageCount) || pageCount <= 0) {
      throw new ValidationError('Page count must be a positive integer');
    }
    if (!(await this.store.updateBookPageCount(bookId, pageCount))) {
      throw new NotFoundError(`Book ${bookId} does not exist`);
    }
    console.log(`Book ${bookId} page count set to ${pageCount}`);
  }
}
