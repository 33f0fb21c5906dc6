import { loadDemoData } from '../../src/scripts/seed-demo';
import { InMemoryBookClubStore } from '../support/InMemoryBookClubStore';

describe('loadDemoData', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads the demo club ready for round 3', async () => {
    const store = new InMemoryBookClubStore();
    await store.addMember({ name: 'Leftover', preferredLength: 300, likedGenres: ['Horror'] });

    await loadDemoData(store);

    expect(store.members.map(m => m.name)).toEqual(['Avery', 'Blake', 'Casey', 'Drew']);
    expect(store.books).toHaveLength(20);
    await expect(store.currentRoundNumber()).resolves.toBe(3);
    expect((await store.listHistory()).map(h => h.title)).toEqual(['The Orchard Case', 'The Second Shelf']);
  });

  it('links suggested books to their members', async () => {
    const store = new InMemoryBookClubStore();

    await loadDemoData(store, {
      members: [{ name: 'Avery', preferredLength: 300, likedGenres: ['Fantasy'] }],
      books: [
        { title: 'One', author: 'A', genre: 'Fantasy', pageCount: 200, suggestedBy: 'Avery' },
        { title: 'Two', author: 'B', genre: 'Mystery', pageCount: 250, suggestedBy: 'Nobody' },
      ],
      history: [],
    });

    expect((await store.listCandidates()).map(c => c.suggestedByName)).toEqual(['Avery', null]);
  });

  it('fails on history that names an unknown book', async () => {
    await expect(loadDemoData(new InMemoryBookClubStore(), {
      members: [],
      books: [],
      history: [{ title: 'Missing', round: 1 }],
    })).rejects.toThrow("Demo history refers to unknown book 'Missing'");
  });
});
