export { BookImportController } from './controller/BookImportController';
export { BookImportService } from './service/BookImportService';
export { BOOK_IMPORT_CONFIG } from './config';
