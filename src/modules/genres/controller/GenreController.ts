import { Request, Response } from 'express';

import { parseBody, requireInteger, requireText } from '../../book-club/dto/book-club.dto';
import { sendError } from '../../common/http';
import { GenreHelperService } from '../service/GenreHelperService';

export class GenreController {
    constructor(private readonly genreHelper: GenreHelperService) {}

    async listUnspecified(_req: Request, res: Response) {
      try {
        const [books, genres] = await Promise.all([
          this.genreHelper.listUnspecified(),
          this.genreHelper.availableGenres(),
        ]);
        res.json({ books, genres });
      } catch (error) {
        sendError(res, error, 'Failed to list books without a genre');
      }
    }

    async assignGenre(req: Request, res: Response) {
      try {
        const bookId = requireInteger(req.params.id, 'id', 1);
        const genre = requireText(parseBody(req.body), 'genre');
        await this.genreHelper.assignGenre(bookId, genre);
        res.json({ message: `Set to: ${genre}` });
      } catch (error) {
        sendError(res, error, 'Failed to update genre');
      }
    }

    async assignPageCount(req: Request, res: Response) {
      try {
        const bookId = requireInteger(req.params.id, 'id', 1);
        const pageCount = requireInteger(parseBody(req.body).pageCount, 'pageCount', 1);
        await this.genreHelper.assignPageCount(bookId, pageCount);
        res.json({ message: `Updated to ${pageCount} pages` });
      } catch (error) {
        sendError(res, error, 'Failed to update page count');
      }
    }
}
