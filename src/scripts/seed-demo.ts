import { createAppDataSource } from '../data-source';
import { BookClubStore, TypeOrmBookClubStore } from '../modules/book-club';
import demoData from './demo-data.json';

export interface DemoData {
  members: Array<{ name: string; preferredLength: number; likedGenres: string[] }>;
  books: Array<{ title: string; author: string; genre: string; pageCount: number; suggestedBy: string | null }>;
  history: Array<{ title: string; round: number }>;
}

/** Wipes the store and loads a small club with two rounds already read. */
export async function loadDemoData(store: BookClubStore, data: DemoData = demoData): Promise<void> {
  console.log('Resetting database...');
  await store.reset();

  const memberIds = new Map<string, number>();
  for (const member of data.members) {
    memberIds.set(member.name, await store.addMember(member));
    console.log(`  Added ${member.name}`);
  }

  const bookIds = new Map<string, number>();
  for (const book of data.books) {
    const suggestedBy = book.suggestedBy ? memberIds.get(book.suggestedBy) ?? null : null;
    bookIds.set(book.title, await store.addBook({ ...book, suggestedBy }));
  }
  console.log(`Added ${data.books.length} books to the pool`);

  for (const entry of data.history) {
    const bookId = bookIds.get(entry.title);
    if (bookId === undefined) {
      throw new Error(`Demo history refers to unknown book '${entry.title}'`);
    }
    await store.markBookAsRead(bookId, entry.round);
    console.log(`  Round ${entry.round}: ${entry.title}`);
  }

  const nextRound = await store.currentRoundNumber();
  console.log(`Demo data loaded: ${data.members.length} members, ${data.books.length} books, ready for round ${nextRound}`);
}

async function main(): Promise<void> {
  const dataSource = createAppDataSource();
  await dataSource.initialize();
  try {
    await loadDemoData(new TypeOrmBookClubStore(dataSource));
  } finally {
    await dataSource.destroy();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to load demo data:', error);
    process.exit(1);
  });
}
