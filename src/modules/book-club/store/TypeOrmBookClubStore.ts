import { DataSource, EntityManager, EntityTarget, In, ObjectLiteral } from 'typeorm';

import { Book, Member, ReadingHistory, Veto } from '../../../entity';
import { Candidate, HistoryEntry, Participant } from '../../recommendations/dto/recommendation.dto';
import { BOOK_CLUB_CONFIG } from '../config';
import { BookClubStore, NewBook, NewMember } from './BookClubStore';

export function toParticipant(member: Member): Participant {
  return {
    id: member.id,
    name: member.name,
    preferredLength: member.preferred_length,
    likedCategories: [...member.liked_genres],
  };
}

export function toCandidate(book: Book, memberNames: Map<number, string>): Candidate {
  return {
    id: book.id,
    title: book.title,
    author: book.author,
    category: book.genre,
    length: book.page_count,
    suggestedBy: book.suggested_by,
    suggestedByName: book.suggested_by !== null ? memberNames.get(book.suggested_by) ?? null : null,
  };
}

export class TypeOrmBookClubStore implements BookClubStore {
  constructor(private readonly dataSource: DataSource) {}

  private get manager(): EntityManager {
    return this.dataSource.manager;
  }

  async listParticipants(): Promise<Participant[]> {
    const members = await this.manager.find(Member, { order: { id: 'ASC' } });
    return members.map(toParticipant);
  }

  async listCandidates(): Promise<Candidate[]> {
    const [books, members] = await Promise.all([
      this.manager.find(Book, { order: { id: 'ASC' } }),
      this.manager.find(Member),
    ]);
    const names = new Map(members.map(m => [m.id, m.name]));
    return books.map(book => toCandidate(book, names));
  }

  async listHistory(): Promise<HistoryEntry[]> {
    const entries = await this.manager.find(ReadingHistory, {
      order: { round_number: 'DESC', id: 'DESC' },
    });
    if (entries.length === 0) {
      return [];
    }

    const books = await this.manager.find(Book, {
      where: { id: In(entries.map(e => e.book_id)) },
    });
    const booksById = new Map(books.map(b => [b.id, b]));

    const history: HistoryEntry[] = [];
    for (const entry of entries) {
      const book = booksById.get(entry.book_id);
      if (!book) {
        console.error('Reading history points at a missing book', { historyId: entry.id, bookId: entry.book_id });
        continue;
      }
      history.push({
        candidateId: book.id,
        roundNumber: entry.round_number,
        title: book.title,
        author: book.author,
        category: book.genre,
        length: book.page_count,
        readDate: entry.read_date,
      });
    }
    return history;
  }

  async listExclusions(roundNumber: number): Promise<string[]> {
    const vetoes = await this.manager.find(Veto, {
      where: { round_number: roundNumber },
      order: { id: 'ASC' },
    });
    return vetoes.map(v => v.genre);
  }

  async currentRoundNumber(): Promise<number> {
    const raw = await this.manager
      .createQueryBuilder(ReadingHistory, 'history')
      .select('MAX(history.round_number)', 'max_round')
      .getRawOne<{ max_round: number | string | null }>();

    return Number(raw?.max_round ?? 0) + 1;
  }

  async addMember(member: NewMember): Promise<number> {
    const entity = this.manager.create(Member, {
      name: member.name,
      preferred_length: member.preferredLength,
      liked_genres: [...member.likedGenres],
    });
    const saved = await this.manager.save(entity);
    return saved.id;
  }

  async addBook(book: NewBook): Promise<number> {
    const entity = this.manager.create(Book, {
      title: book.title,
      author: book.author,
      genre: book.genre,
      page_count: book.pageCount,
      suggested_by: book.suggestedBy ?? null,
    });
    const saved = await this.manager.save(entity);
    return saved.id;
  }

  async addVeto(memberId: number, genre: string, roundNumber: number): Promise<boolean> {
    return this.dataSource.transaction(async manager => {
      const member = await manager.findOneBy(Member, { id: memberId });
      if (!member) {
        return false;
      }

      const existing = await manager.find(Veto, {
        where: { member_id: memberId, round_number: roundNumber },
        order: { id: 'ASC' },
      });
      const overflow = existing.length - BOOK_CLUB_CONFIG.VETOES_PER_MEMBER_PER_ROUND + 1;
      if (overflow > 0) {
        await manager.delete(Veto, existing.slice(0, overflow).map(v => v.id));
      }

      await manager.save(manager.create(Veto, { member_id: memberId, genre, round_number: roundNumber }));
      return true;
    });
  }

  async markBookAsRead(bookId: number, roundNumber: number): Promise<boolean> {
    const book = await this.manager.findOneBy(Book, { id: bookId });
    if (!book) {
      return false;
    }

    await this.manager.save(this.manager.create(ReadingHistory, { book_id: bookId, round_number: roundNumber }));
    return true;
  }

  async updateBookGenre(bookId: number, genre: string): Promise<boolean> {
    return this.updateBook(bookId, { genre });
  }

  async updateBookPageCount(bookId: number, pageCount: number): Promise<boolean> {
    return this.updateBook(bookId, { page_count: pageCount });
  }

  async reset(): Promise<void> {
    await this.dataSource.transaction(async manager => {
      // Children before parents
      const tables: Array<EntityTarget<ObjectLiteral>> = [Veto, ReadingHistory, Book, Member];
      for (const entity of tables) {
        await manager.createQueryBuilder().delete().from(entity).execute();
      }
    });
  }

  private async updateBook(bookId: number, changes: Partial<Pick<Book, 'genre' | 'page_count'>>): Promise<boolean> {
    const book = await this.manager.findOneBy(Book, { id: bookId });
    if (!book) {
      return false;
    }

    await this.manager.update(Book, { id: bookId }, changes);
    return true;
  }
}
