import { Candidate, HistoryEntry, Participant } from '../../recommendations/dto/recommendation.dto';

export interface NewBook {
  title: string;
  author: string;
  genre: string;
  pageCount: number;
  suggestedBy?: number | null;
}

export interface NewMember {
  name: string;
  preferredLength: number;
  likedGenres: string[];
}

/** What the recommender reads. Every call returns a fresh copy. */
export interface BookClubSnapshotSource {
  listParticipants(): Promise<Participant[]>;
  listCandidates(): Promise<Candidate[]>;
  /** Joined with the picked books, most recent round first. */
  listHistory(): Promise<HistoryEntry[]>;
  listExclusions(roundNumber: number): Promise<string[]>;
  /** Highest recorded round plus one, or 1 when nothing has been read yet. */
  currentRoundNumber(): Promise<number>;
}

export interface BookClubStore extends BookClubSnapshotSource {
  addMember(member: NewMember): Promise<number>;
  addBook(book: NewBook): Promise<number>;
  /** Returns false when no member has that id. */
  addVeto(memberId: number, genre: string, roundNumber: number): Promise<boolean>;
  /** Returns false when no book has that id. Same for the updates below. */
  markBookAsRead(bookId: number, roundNumber: number): Promise<boolean>;
  updateBookGenre(bookId: number, genre: string): Promise<boolean>;
  updateBookPageCount(bookId: number, pageCount: number): Promise<boolean>;
  reset(): Promise<void>;
}
