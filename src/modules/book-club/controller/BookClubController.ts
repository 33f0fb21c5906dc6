import { Request, Response } from 'express';

import { NotFoundError, ValidationError } from '../../common/errors';
import { sendError } from '../../common/http';
import {
  ClubStats,
  GenreCount,
  parseMarkRead,
  parseNewBook,
  parseNewMember,
  parseVeto,
} from '../dto/book-club.dto';
import { BookClubStore } from '../store/BookClubStore';

export class BookClubController {
    constructor(private readonly store: BookClubStore) {}

    async listMembers(_req: Request, res: Response) {
      try {
        res.json({ members: await this.store.listParticipants() });
      } catch (error) {
        sendError(res, error, 'Failed to list members');
      }
    }

    async addMember(req: Request, res: Response) {
      try {
        const member = parseNewMember(req.body);
        const id = await this.store.addMember(member);
        res.status(201).json({ message: `Added ${member.name} to the book club`, id });
      } catch (error) {
        sendError(res, error, 'Failed to add member');
      }
    }

    async listBooks(req: Request, res: Response) {
      try {
        const genre = typeof req.query.genre === 'string' ? req.query.genre : undefined;
        const books = await this.store.listCandidates();
        res.json({ books: genre ? books.filter(b => b.category === genre) : books });
      } catch (error) {
        sendError(res, error, 'Failed to list books');
      }
    }

    async addBook(req: Request, res: Response) {
      try {
        const book = parseNewBook(req.body);
        if (book.suggestedBy) {
          const members = await this.store.listParticipants();
          if (!members.some(m => m.id === book.suggestedBy)) {
            throw new ValidationError(`Member ${book.suggestedBy} does not exist`);
          }
        }

        const id = await this.store.addBook(book);
        res.status(201).json({ message: `Added '${book.title}' to the book pool`, id });
      } catch (error) {
        sendError(res, error, 'Failed to add book');
      }
    }

    async setVeto(req: Request, res: Response) {
      try {
        const { memberId, genre } = parseVeto(req.body);
        const round = await this.store.currentRoundNumber();

        if (!(await this.store.addVeto(memberId, genre, round))) {
          throw new NotFoundError(`Member ${memberId} does not exist`);
        }
        res.json({ message: `Saved veto on ${genre} for round ${round}`, round });
      } catch (error) {
        sendError(res, error, 'Failed to save veto');
      }
    }

    async listHistory(_req: Request, res: Response) {
      try {
        res.json({ history: await this.store.listHistory() });
      } catch (error) {
        sendError(res, error, 'Failed to read reading history');
      }
    }

    async markAsRead(req: Request, res: Response) {
      try {
        const request = parseMarkRead(req.body);
        const round = await this.store.currentRoundNumber();

        if (!(await this.store.markBookAsRead(request.bookId, round))) {
          throw new NotFoundError(`Book ${request.bookId} does not exist`);
        }
        res.status(201).json({ message: `Marked book ${request.bookId} as the round ${round} pick`, round });
      } catch (error) {
        sendError(res, error, 'Failed to record the pick');
      }
    }

    async getStats(_req: Request, res: Response) {
      try {
        const [members, books, history] = await Promise.all([
          this.store.listParticipants(),
          this.store.listCandidates(),
          this.store.listHistory(),
        ]);

        const counts = new Map<string, number>();
        for (const entry of history) {
          counts.set(entry.category, (counts.get(entry.category) || 0) + 1);
        }
        // Ties keep history order, most recent genre first
        const genreDistribution: GenreCount[] = [...counts.entries()]
          .map(([genre, count]) => ({ genre, count }))
          .sort((a, b) => b.count - a.count);

        const stats: ClubStats = {
          members: members.length,
          books: books.length,
          booksRead: history.length,
          genreDistribution,
        };
        res.json(stats);
      } catch (error) {
        sendError(res, error, 'Failed to compute stats');
      }
    }

    async reset(_req: Request, res: Response) {
      try {
        await this.store.reset();
        console.log('Book club data cleared');
        res.json({ message: 'All data cleared' });
      } catch (error) {
        sendError(res, error, 'Failed to clear data');
      }
    }
}
