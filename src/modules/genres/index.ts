export { GenreController } from './controller/GenreController';
export { GenreHelperService, suggestGenre } from './service/GenreHelperService';
