import { createApp } from './app';
import { createAppDataSource } from './data-source';
import { TypeOrmBookClubStore } from './modules/book-club';

const PORT = Number(process.env.PORT || 40_286);

async function main(): Promise<void> {
  const dataSource = createAppDataSource();
  await dataSource.initialize();
  console.log('Database connected');

  const app = createApp({ store: new TypeOrmBookClubStore(dataSource) });
  app.listen(PORT, () => {
    console.log(`Server listening on port ${PORT}`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
