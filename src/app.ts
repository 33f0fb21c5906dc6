import express, { ErrorRequestHandler, Express, Request, Response } from 'express';
import multer from 'multer';

import { BookClubController, BookClubStore } from './modules/book-club';
import { BOOK_IMPORT_CONFIG, BookImportController, BookImportService } from './modules/book-import';
import { errorMessage } from './modules/common/errors';
import { GenreController, GenreHelperService } from './modules/genres';
import { ProgressManager } from './modules/progress/ProgressManager';
import { progressMiddleware } from './modules/progress/progressMiddleware';
import { RecommendationController, RecommendationService, ScoringEngine } from './modules/recommendations';

export interface AppDependencies {
  store: BookClubStore;
  engine?: ScoringEngine;
}

// xlsx uploads only, kept in memory
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter: (_req, file, cb: multer.FileFilterCallback) => {
    if (file.mimetype === BOOK_IMPORT_CONFIG.MIME_TYPE) {
      return cb(null, true);
    }
    return cb(new Error('Wrong file format. Please upload an Excel file (.xlsx)'));
  },
});

// Express treats four-argument handlers as error handlers
const handleUploadError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  ProgressManager.getInstance().errorProgress(BOOK_IMPORT_CONFIG.TASK_ID, errorMessage(error));
  res.status(400).json({
    message: 'File upload failed',
    error: errorMessage(error),
  });
};

export function createApp({ store, engine }: AppDependencies): Express {
  const app = express();
  app.use(express.json());

  const bookClub = new BookClubController(store);
  const recommendations = new RecommendationController(new RecommendationService(store, engine));
  const bookImport = new BookImportController(new BookImportService(store));
  const genres = new GenreController(new GenreHelperService(store));

  // Members & pool
  app.get('/members', (req, res) => bookClub.listMembers(req, res));
  app.post('/members', (req, res) => bookClub.addMember(req, res));
  app.get('/books', (req, res) => bookClub.listBooks(req, res));
  app.post('/books', (req, res) => bookClub.addBook(req, res));

  // Rounds, vetoes, history
  app.get('/rounds/current', (req, res) => recommendations.getCurrentRound(req, res));
  app.post('/vetoes', (req, res) => bookClub.setVeto(req, res));
  app.get('/history', (req, res) => bookClub.listHistory(req, res));
  app.post('/history', (req, res) => bookClub.markAsRead(req, res));
  app.get('/stats', (req, res) => bookClub.getStats(req, res));

  // Recommendations
  app.get('/recommendations', (req, res) => recommendations.getRecommendations(req, res));
  app.get('/genres', (req, res) => recommendations.getGenres(req, res));

  // Genre helper
  app.get('/genres/unspecified', (req, res) => genres.listUnspecified(req, res));
  app.patch('/books/:id/genre', (req, res) => genres.assignGenre(req, res));
  app.patch('/books/:id/page-count', (req, res) => genres.assignPageCount(req, res));

  // Import
  app.post('/upload/books', upload.single('file'), handleUploadError, (req: Request, res: Response) =>
    bookImport.importBooks(req, res));
  app.get('/progress/:taskId', progressMiddleware);

  app.post('/reset', (req, res) => bookClub.reset(req, res));

  return app;
}
