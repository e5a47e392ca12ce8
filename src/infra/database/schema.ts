/**
 * Database schema bootstrap
 *
 * Creates the short_urls table when missing. Uses Kysely's schema builder so the
 * same definition runs on PostgreSQL and on SQLite in tests.
 */

import type { ShortenerDatabase } from './types.js';
import type { Kysely } from 'kysely';

export const SHORT_URLS_TABLE = 'short_urls';

/**
 * Ensures the tables required by the service exist.
 */
export const ensureSchema = async (db: Kysely<ShortenerDatabase>): Promise<void> => {
  await db.schema
    .createTable(SHORT_URLS_TABLE)
    .ifNotExists()
    .addColumn('short_code', 'varchar(6)', (col) => col.primaryKey())
    .addColumn('original_url', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull())
    .addColumn('click_count', 'integer', (col) => col.notNull().defaultTo(0))
    .execute();
};
