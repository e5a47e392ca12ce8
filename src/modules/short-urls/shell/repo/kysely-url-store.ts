/**
 * URL Store Implementation (Kysely)
 *
 * Kysely-based implementation for the short_urls table.
 * Atomicity is delegated to the database engine:
 * - insert: INSERT ... ON CONFLICT (short_code) DO NOTHING RETURNING
 * - incrementClick: UPDATE ... SET click_count = click_count + 1 RETURNING
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createDuplicateCodeError,
  createNotFoundError,
  createStoreError,
  type ShortUrlError,
} from '../../core/errors.js';

import type { UrlStore } from '../../core/ports.js';
import type { ShortUrlRecord } from '../../core/types.js';
import type { ShortenerDatabase, ShortUrls } from '../../../../infra/database/types.js';
import type { Kysely, Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

const SHORT_URL_COLUMNS = ['short_code', 'original_url', 'created_at', 'click_count'] as const;

/**
 * Row type from database query.
 */
type QueryRow = Selectable<ShortUrls>;

/**
 * Options for creating the Kysely URL store.
 */
export interface KyselyUrlStoreOptions {
  db: Kysely<ShortenerDatabase>;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Store Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based URL store.
 */
class KyselyUrlStore implements UrlStore {
  private readonly db: Kysely<ShortenerDatabase>;
  private readonly log: Logger;

  constructor(options: KyselyUrlStoreOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'UrlStore' });
  }

  async insert(record: ShortUrlRecord): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    const { shortCode } = record;

    this.log.debug({ shortCode }, 'Inserting short URL');

    try {
      const row = await this.db
        .insertInto('short_urls')
        .values({
          short_code: shortCode,
          original_url: record.originalUrl,
          created_at: record.createdAt.toISOString(),
          click_count: record.clickCount,
        })
        .onConflict((oc) => oc.column('short_code').doNothing())
        .returning(SHORT_URL_COLUMNS)
        .executeTakeFirst();

      // No returned row: the conflict clause skipped the insert
      if (row === undefined) {
        this.log.debug({ shortCode }, 'Short code already taken');
        return err(createDuplicateCodeError(shortCode));
      }

      this.log.debug({ shortCode }, 'Short URL inserted');
      return ok(this.mapRowToRecord(row));
    } catch (error) {
      this.log.error({ err: error, shortCode }, 'Failed to insert short URL');
      return err(createStoreError('Failed to insert short URL', error));
    }
  }

  async get(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    this.log.debug({ shortCode }, 'Finding short URL by code');

    try {
      const row = await this.db
        .selectFrom('short_urls')
        .select(SHORT_URL_COLUMNS)
        .where('short_code', '=', shortCode)
        .executeTakeFirst();

      if (row === undefined) {
        this.log.debug({ shortCode }, 'Short URL not found');
        return err(createNotFoundError(shortCode));
      }

      return ok(this.mapRowToRecord(row));
    } catch (error) {
      this.log.error({ err: error, shortCode }, 'Failed to find short URL by code');
      return err(createStoreError('Failed to find short URL by code', error));
    }
  }

  async incrementClick(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    this.log.debug({ shortCode }, 'Incrementing click count');

    try {
      const row = await this.db
        .updateTable('short_urls')
        .set((eb) => ({ click_count: eb('click_count', '+', 1) }))
        .where('short_code', '=', shortCode)
        .returning(SHORT_URL_COLUMNS)
        .executeTakeFirst();

      if (row === undefined) {
        this.log.debug({ shortCode }, 'Short URL not found for increment');
        return err(createNotFoundError(shortCode));
      }

      this.log.debug({ shortCode, clickCount: row.click_count }, 'Click count incremented');
      return ok(this.mapRowToRecord(row));
    } catch (error) {
      this.log.error({ err: error, shortCode }, 'Failed to increment click count');
      return err(createStoreError('Failed to increment click count', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private mapRowToRecord(row: QueryRow): ShortUrlRecord {
    return {
      shortCode: row.short_code,
      originalUrl: row.original_url,
      createdAt: toDate(row.created_at),
      clickCount: Number(row.click_count),
    };
  }
}

/**
 * Normalizes a timestamp column value to a Date.
 */
const toDate = (value: Date | string): Date => {
  return value instanceof Date ? value : new Date(value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a new UrlStore backed by Kysely.
 */
export const makeKyselyUrlStore = (options: KyselyUrlStoreOptions): UrlStore => {
  return new KyselyUrlStore(options);
};
