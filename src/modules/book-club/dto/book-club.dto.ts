import { ValidationError } from '../../common/errors';
import { BOOK_CLUB_CONFIG } from '../config';
import { NewBook, NewMember } from '../store/BookClubStore';

export interface VetoRequest {
  memberId: number;
  genre: string;
}

export interface MarkReadRequest {
  bookId: number;
}

export interface GenreCount {
  genre: string;
  count: number;
}

export interface ClubStats {
  members: number;
  books: number;
  booksRead: number;
  genreDistribution: GenreCount[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asBody(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return value;
}

export function requireText(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`"${field}" is required`);
  }
  return value.trim();
}

export function requireInteger(value: unknown, field: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ValidationError(`"${field}" must be an integer ${range}`);
  }
  return parsed;
}

export function parseNewMember(raw: unknown): NewMember {
  const body = asBody(raw);
  const { MEMBER } = BOOK_CLUB_CONFIG;

  const name = requireText(body, 'name');
  const liked = body.likedGenres;
  const likedGenres = Array.isArray(liked)
    ? [...new Set(liked.filter((g): g is string => typeof g === 'string').map(g => g.trim()).filter(Boolean))]
    : [];
  if (likedGenres.length === 0) {
    throw new ValidationError('Please provide a name and at least one liked genre');
  }

  const preferredLength = body.preferredLength === undefined
    ? MEMBER.DEFAULT_PREFERRED_LENGTH
    : requireInteger(body.preferredLength, 'preferredLength', MEMBER.MIN_PREFERRED_LENGTH, MEMBER.MAX_PREFERRED_LENGTH);

  return { name, preferredLength, likedGenres };
}

export function parseNewBook(raw: unknown): NewBook {
  const body = asBody(raw);

  return {
    title: requireText(body, 'title'),
    author: requireText(body, 'author'),
    genre: requireText(body, 'genre'),
    pageCount: requireInteger(body.pageCount, 'pageCount', BOOK_CLUB_CONFIG.BOOK.MIN_PAGE_COUNT),
    suggestedBy: body.suggestedBy === undefined || body.suggestedBy === null
      ? null
      : requireInteger(body.suggestedBy, 'suggestedBy', 1),
  };
}

export function parseVeto(raw: unknown): VetoRequest {
  const body = asBody(raw);
  return {
    memberId: requireInteger(body.memberId, 'memberId', 1),
    genre: requireText(body, 'genre'),
  };
}

export function parseMarkRead(raw: unknown): MarkReadRequest {
  const body = asBody(raw);
  return {
    bookId: requireInteger(body.bookId, 'bookId', 1),
  };
}

export function parseBody(raw: unknown): Record<string, unknown> {
  return asBody(raw);
}
