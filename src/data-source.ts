import 'reflect-metadata';
import path from 'node:path';

import { DataSource, DataSourceOptions } from 'typeorm';

import { Book, Member, ReadingHistory, Veto } from './entity';

export const ENTITIES = [Member, Book, ReadingHistory, Veto];

/**
 * Connection settings come from the environment: either DATABASE_URL, or the
 * TYPEORM_HOST / TYPEORM_DATABASE family.
 */
export function buildDataSourceOptions(env: NodeJS.ProcessEnv = process.env): DataSourceOptions {
  const url = env.DATABASE_URL;
  const host = env.TYPEORM_HOST;
  const database = env.TYPEORM_DATABASE;

  if (!url && !(host && database)) {
    throw new Error(
      'Database connection is not configured. Set DATABASE_URL to a PostgreSQL connection string, ' +
      'or TYPEORM_HOST and TYPEORM_DATABASE (with TYPEORM_PORT, TYPEORM_USERNAME, TYPEORM_PASSWORD as needed).',
    );
  }

  return {
    type: 'postgres',
    ...(url
      ? { url }
      : {
        host,
        port: +(env.TYPEORM_PORT || '5432'),
        username: env.TYPEORM_USERNAME,
        password: env.TYPEORM_PASSWORD,
        database,
      }),
    synchronize: false,
    migrationsRun: env.TYPEORM_MIGRATIONS_RUN === 'true',
    logging: env.TYPEORM_LOGGING === 'true',
    entities: ENTITIES,
    migrations: [path.join(__dirname, './migration/*.{ts,js}')],
  };
}

export function createAppDataSource(env: NodeJS.ProcessEnv = process.env): DataSource {
  return new DataSource(buildDataSourceOptions(env));
}
