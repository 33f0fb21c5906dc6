import { ValidationError } from '../../src/modules/common/errors';
import { RecommendationService } from '../../src/modules/recommendations/service/RecommendationService';
import { ScoringEngine } from '../../src/modules/recommendations/service/ScoringEngine';
import { InMemoryBookClubStore } from '../support/InMemoryBookClubStore';

describe('RecommendationService', () => {
  let store: InMemoryBookClubStore;
  let service: RecommendationService;
  let avery: number;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryBookClubStore();
    service = new RecommendationService(store);

    avery = await store.addMember({ name: 'Avery', preferredLength: 350, likedGenres: ['Fantasy'] });
    await store.addMember({ name: 'Blake', preferredLength: 280, likedGenres: ['Mystery'] });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function seedPool(): Promise<Record<string, number>> {
    return {
      alpha: await store.addBook({ title: 'Alpha', author: 'A', genre: 'Fantasy', pageCount: 310 }),
      beta: await store.addBook({ title: 'Beta', author: 'B', genre: 'Mystery', pageCount: 315, suggestedBy: avery }),
      gamma: await store.addBook({ title: 'Gamma', author: 'C', genre: 'Horror', pageCount: 315 }),
    };
  }

  it('returns an empty list for an empty pool', async () => {
    await expect(service.recommend(10)).resolves.toEqual([]);
  });

  it('ranks eligible books best first with their breakdown', async () => {
    await seedPool();

    const result = await service.recommend();

    expect(result.map(r => [r.title, r.score])).toEqual([
      ['Beta', 80],
      ['Alpha', 64.8],
      ['Gamma', 45],
    ]);
    expect(result[0]).toMatchObject({
      author: 'B',
      category: 'Mystery',
      length: 315,
      suggestedBy: avery,
      suggestedByName: 'Avery',
      breakdown: { categoryMatch: 50, lengthFit: 100, suggesterInterest: 100, diversityBonus: 100 },
    });
  });

  it('truncates to topN', async () => {
    await seedPool();

    const result = await service.recommend(2);

    expect(result.map(r => r.title)).toEqual(['Beta', 'Alpha']);
  });

  it('returns every eligible book when topN exceeds the pool', async () => {
    await seedPool();

    expect(await service.recommend(50)).toHaveLength(3);
  });

  it('filters read books, recent genres and this round\'s vetoes', async () => {
    const { gamma } = await seedPool();
    const delta = await store.addBook({ title: 'Delta', author: 'D', genre: 'Mystery', pageCount: 200 });
    await store.markBookAsRead(delta, 1);

    expect((await service.recommend()).map(r => r.title)).toEqual(['Alpha', 'Gamma']);

    await store.addVeto(avery, 'Horror', 2);
    const result = await service.recommend();

    expect(result.map(r => r.title)).toEqual(['Alpha']);
    expect(result.some(r => r.id === gamma)).toBe(false);
  });

  it('ignores vetoes recorded for other rounds', async () => {
    await seedPool();
    await store.addVeto(avery, 'Horror', 2);

    expect((await service.recommend()).map(r => r.title)).toEqual(['Beta', 'Alpha', 'Gamma']);
  });

  it('keeps filter order for equal scores', async () => {
    await store.addBook({ title: 'First', author: 'A', genre: 'Horror', pageCount: 315 });
    await store.addBook({ title: 'Second', author: 'B', genre: 'Romance', pageCount: 315 });
    await store.addBook({ title: 'Third', author: 'C', genre: 'Thriller', pageCount: 315 });

    const result = await service.recommend();

    expect(result.map(r => r.score)).toEqual([45, 45, 45]);
    expect(result.map(r => r.title)).toEqual(['First', 'Second', 'Third']);
  });

  it('returns an empty list when every book is excluded', async () => {
    await store.addBook({ title: 'Only', author: 'A', genre: 'Horror', pageCount: 300 });
    await store.addVeto(avery, 'Horror', 1);

    await expect(service.recommend()).resolves.toEqual([]);
  });

  it('gives the same answer for the same data', async () => {
    await seedPool();

    const first = await service.recommend(3);
    const second = await service.recommend(3);

    expect(second).toEqual(first);
  });

  it('scores with the injected engine', async () => {
    await seedPool();
    const categoryOnly = new RecommendationService(
      store,
      new ScoringEngine({ categoryMatch: 1, lengthFit: 0, suggesterInterest: 0, diversityBonus: 0 }),
    );

    const result = await categoryOnly.recommend();

    expect(result.map(r => [r.title, r.score])).toEqual([['Alpha', 50], ['Beta', 50], ['Gamma', 0]]);
  });

  it.each([0, -1, 2.5, Number.NaN])('rejects topN of %p', async (topN) => {
    await expect(service.recommend(topN)).rejects.toBeInstanceOf(ValidationError);
  });

  it('lists the distinct genres of the pool in order', async () => {
    await seedPool();
    await store.addBook({ title: 'Epsilon', author: 'E', genre: 'Fantasy', pageCount: 100 });

    await expect(service.distinctCategoriesInPool()).resolves.toEqual(['Fantasy', 'Horror', 'Mystery']);
  });

  it('describes the round being decided', async () => {
    const { alpha, beta } = await seedPool();
    await store.markBookAsRead(alpha, 1);
    await store.markBookAsRead(beta, 2);
    await store.addVeto(avery, 'Horror', 3);
    await store.addVeto(avery, 'Romance', 2);

    await expect(service.roundContext()).resolves.toEqual({
      round: 3,
      recentCategories: ['Mystery', 'Fantasy'],
      vetoedCategories: ['Horror'],
    });
  });
});
