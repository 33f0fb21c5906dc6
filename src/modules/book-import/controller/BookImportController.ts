import { Request, Response } from 'express';

import { ValidationError } from '../../common/errors';
import { sendError } from '../../common/http';
import { BookImportService } from '../service/BookImportService';

export class BookImportController {
    constructor(private readonly importService: BookImportService) {}

    async importBooks(req: Request, res: Response) {
      try {
        if (!req.file) {
          throw new ValidationError('No file uploaded');
        }

        const result = await this.importService.importWorkbook(req.file.buffer);
        res.json(result);
      } catch (error) {
        sendError(res, error, 'Failed to import books');
      }
    }
}
