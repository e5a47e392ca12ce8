import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { ShortenerDatabase } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type ShortenerDbClient = Kysely<ShortenerDatabase>;

/**
 * Create a Kysely instance for a PostgreSQL connection string
 */
export const createDbClient = (connectionString: string): ShortenerDbClient => {
  return new Kysely<ShortenerDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the database client.
 * Returns undefined when no DATABASE_URL is configured.
 */
export const initDatabase = (config: AppConfig): ShortenerDbClient | undefined => {
  const { url } = config.database;

  if (url === undefined || url === '') {
    return undefined;
  }

  return createDbClient(url);
};

// Re-export types
export type { ShortUrls, ShortenerDatabase, Timestamp } from './types.js';
