/**
 * URL Store Implementation (In-Memory)
 *
 * Map-backed store used when no database is configured.
 * Each mutation reads and writes the map inside one synchronous section
 * (no await between check and write), so concurrent requests are linearized.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createDuplicateCodeError,
  createNotFoundError,
  type ShortUrlError,
} from '../../core/errors.js';

import type { UrlStore } from '../../core/ports.js';
import type { ShortUrlRecord } from '../../core/types.js';
import type { Logger } from 'pino';

/**
 * Options for creating the in-memory URL store.
 */
export interface InMemoryUrlStoreOptions {
  logger: Logger;
  /** Records to seed the store with */
  records?: ShortUrlRecord[];
}

/**
 * Copies a record so callers never share a mutable reference with the store.
 */
const cloneRecord = (record: ShortUrlRecord): ShortUrlRecord => ({
  shortCode: record.shortCode,
  originalUrl: record.originalUrl,
  createdAt: new Date(record.createdAt.getTime()),
  clickCount: record.clickCount,
});

class InMemoryUrlStore implements UrlStore {
  private readonly records = new Map<string, ShortUrlRecord>();
  private readonly log: Logger;

  constructor(options: InMemoryUrlStoreOptions) {
    this.log = options.logger.child({ repo: 'InMemoryUrlStore' });

    for (const record of options.records ?? []) {
      this.records.set(record.shortCode, cloneRecord(record));
    }
  }

  insert(record: ShortUrlRecord): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    const { shortCode } = record;

    if (this.records.has(shortCode)) {
      this.log.debug({ shortCode }, 'Short code already taken');
      return Promise.resolve(err(createDuplicateCodeError(shortCode)));
    }

    const stored = cloneRecord(record);
    this.records.set(shortCode, stored);

    this.log.debug({ shortCode }, 'Short URL inserted');
    return Promise.resolve(ok(cloneRecord(stored)));
  }

  get(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    const record = this.records.get(shortCode);

    if (record === undefined) {
      this.log.debug({ shortCode }, 'Short URL not found');
      return Promise.resolve(err(createNotFoundError(shortCode)));
    }

    return Promise.resolve(ok(cloneRecord(record)));
  }

  incrementClick(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>> {
    const record = this.records.get(shortCode);

    if (record === undefined) {
      this.log.debug({ shortCode }, 'Short URL not found for increment');
      return Promise.resolve(err(createNotFoundError(shortCode)));
    }

    const updated: ShortUrlRecord = { ...record, clickCount: record.clickCount + 1 };
    this.records.set(shortCode, updated);

    this.log.debug({ shortCode, clickCount: updated.clickCount }, 'Click count incremented');
    return Promise.resolve(ok(cloneRecord(updated)));
  }
}

/**
 * Creates a new in-memory UrlStore.
 */
export const makeInMemoryUrlStore = (options: InMemoryUrlStoreOptions): UrlStore => {
  return new InMemoryUrlStore(options);
};
