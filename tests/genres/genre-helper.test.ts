import { NotFoundError } from '../../src/modules/common/errors';
import { GenreHelperService, suggestGenre } from '../../src/modules/genres/service/GenreHelperService';
import { InMemoryBookClubStore } from '../support/InMemoryBookClubStore';

describe('suggestGenre', () => {
  it('picks the genre with the most keyword hits', () => {
    expect(suggestGenre('The Dragon Wizard')).toBe('Fantasy');
    expect(suggestGenre('Shadow of Blood and Death')).toBe('Horror');
  });

  it('breaks ties in favour of the earlier genre', () => {
    expect(suggestGenre('Murder in the Dark')).toBe('Mystery');
  });

  it('looks at the author too', () => {
    expect(suggestGenre('Untitled', 'Oscar Wilde')).toBe('Literary Fiction');
  });

  it('falls back to Unspecified', () => {
    expect(suggestGenre('Quiet Gardens', 'Ann Lee')).toBe('Unspecified');
  });
});

describe('GenreHelperService', () => {
  let store: InMemoryBookClubStore;
  let helper: GenreHelperService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryBookClubStore();
    helper = new GenreHelperService(store);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('lists books without a genre with a suggestion', async () => {
    await store.addBook({ title: 'The Dragon Wizard', author: 'A', genre: 'Unspecified', pageCount: 300 });
    await store.addBook({ title: 'Known', author: 'B', genre: 'Mystery', pageCount: 300 });

    const books = await helper.listUnspecified();

    expect(books.map(b => [b.title, b.suggestedGenre])).toEqual([['The Dragon Wizard', 'Fantasy']]);
  });

  it('offers the known genres plus those used in the pool', async () => {
    await store.addBook({ title: 'A', author: 'A', genre: 'Cozy', pageCount: 300 });
    await store.addBook({ title: 'B', author: 'B', genre: 'Unspecified', pageCount: 300 });

    await expect(helper.availableGenres()).resolves.toEqual([
      'Contemporary Fiction',
      'Cozy',
      'Fantasy',
      'Historical Fiction',
      'Horror',
      'Literary Fiction',
      'Mystery',
      'Non-Fiction',
      'Romance',
      'Science Fiction',
      'Thriller',
    ]);
  });

  it('assigns a genre and a page count', async () => {
    const id = await store.addBook({ title: 'A', author: 'A', genre: 'Unspecified', pageCount: 300 });

    await helper.assignGenre(id, '  Fantasy ');
    await helper.assignPageCount(id, 412);

    expect(store.books[0]).toMatchObject({ genre: 'Fantasy', pageCount: 412 });
  });

  it('rejects empty genres, bad page counts and unknown books', async () => {
    const id = await store.addBook({ title: 'A', author: 'A', genre: 'Unspecified', pageCount: 300 });

    await expect(helper.assignGenre(id, '  ')).rejects.toThrow('Genre must not be empty');
    await expect(helper.assignPageCount(id, 0)).rejects.toThrow('Page count must be a positive integer');
    await expect(helper.assignGenre(id + 1, 'Fantasy')).rejects.toMatchObject({
      message: `Book ${id + 1} does not exist`,
      status: 404,
    });
    await expect(helper.assignPageCount(id + 1, 10)).rejects.toBeInstanceOf(NotFoundError);
  });
});
