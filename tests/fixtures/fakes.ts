/**
 * Test fakes and mocks
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createDuplicateCodeError,
  createNotFoundError,
  createStoreError,
  type ShortUrlError,
} from '@/modules/short-urls/core/errors.js';

import type { CodeGenerator, UrlStore } from '@/modules/short-urls/core/ports.js';
import type { ShortUrlRecord } from '@/modules/short-urls/core/types.js';
import type { Kysely } from 'kysely';

// =============================================================================
// Short URL Fakes
// =============================================================================

/**
 * Creates a test short URL record with defaults.
 */
export const createTestShortUrlRecord = (
  overrides: Partial<ShortUrlRecord> = {}
): ShortUrlRecord => ({
  shortCode: 'Ab3Xy9',
  originalUrl: 'https://example.com/some/long/path',
  createdAt: new Date('2024-01-15T10:00:00.000Z'),
  clickCount: 0,
  ...overrides,
});

type UrlStoreOperation = 'insert' | 'get' | 'incrementClick';

interface FakeUrlStoreOptions {
  /** Records the store starts with */
  records?: ShortUrlRecord[];
  /** Operations that fail with a StoreError */
  failOn?: UrlStoreOperation[];
}

/**
 * Fake UrlStore with call tracking and failure injection.
 */
export interface FakeUrlStore extends UrlStore {
  /** Number of calls per operation */
  readonly calls: Record<UrlStoreOperation, number>;
  /** Current snapshot of a stored record */
  peek(shortCode: string): ShortUrlRecord | undefined;
  /** Number of stored records */
  size(): number;
}

/**
 * Creates a fake UrlStore for testing.
 */
export const makeFakeUrlStore = (options: FakeUrlStoreOptions = {}): FakeUrlStore => {
  const records = new Map<string, ShortUrlRecord>();
  const failOn = new Set(options.failOn ?? []);
  const calls: Record<UrlStoreOperation, number> = { insert: 0, get: 0, incrementClick: 0 };

  for (const record of options.records ?? []) {
    records.set(record.shortCode, { ...record });
  }

  const fail = (operation: UrlStoreOperation): Result<never, ShortUrlError> =>
    err(createStoreError(`Simulated ${operation} failure`, new Error('connection lost')));

  return {
    calls,

    async insert(record) {
      calls.insert++;
      if (failOn.has('insert')) return fail('insert');

      if (records.has(record.shortCode)) {
        return err(createDuplicateCodeError(record.shortCode));
      }

      records.set(record.shortCode, { ...record });
      return ok({ ...record });
    },

    async get(shortCode) {
      calls.get++;
      if (failOn.has('get')) return fail('get');

      const record = records.get(shortCode);
      return record === undefined ? err(createNotFoundError(shortCode)) : ok({ ...record });
    },

    async incrementClick(shortCode) {
      calls.incrementClick++;
      if (failOn.has('incrementClick')) return fail('incrementClick');

      const record = records.get(shortCode);
      if (record === undefined) {
        return err(createNotFoundError(shortCode));
      }

      const updated = { ...record, clickCount: record.clickCount + 1 };
      records.set(shortCode, updated);
      return ok({ ...updated });
    },

    peek(shortCode) {
      const record = records.get(shortCode);
      return record === undefined ? undefined : { ...record };
    },

    size() {
      return records.size;
    },
  };
};

/**
 * Creates a code generator that replays the given codes in order.
 * Once exhausted it keeps returning the last code.
 */
export const makeSequenceCodeGenerator = (
  codes: string[]
): CodeGenerator & { readonly generated: string[] } => {
  const generated: string[] = [];
  let index = 0;

  return {
    generated,
    generate() {
      const code = codes[Math.min(index, codes.length - 1)] ?? '';
      index++;
      generated.push(code);
      return code;
    },
  };
};

/**
 * Creates a random source that replays the given values in a loop.
 */
export const makeFixedRandom = (values: number[]): (() => number) => {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
};

// =============================================================================
// Health Check Fakes
// =============================================================================

interface FakeKyselyDbOptions {
  /** If provided, the health check query will fail with this error */
  failWithError?: Error;
  /** If provided, the health check query will delay by this many ms */
  delayMs?: number;
}

/**
 * Creates a fake Kysely client for testing health checkers.
 *
 * The fake implements just enough to support the `sql\`SELECT 1\`.execute(db)` pattern
 * used by the db health checker.
 */
export const makeFakeKyselyDb = <T>(options: FakeKyselyDbOptions = {}): Kysely<T> => {
  const { failWithError, delayMs = 0 } = options;

  const fakeCompiledQuery = {
    sql: 'SELECT 1',
    parameters: [],
    query: { kind: 'RawNode' },
  };

  const runQuery = async () => {
    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    if (failWithError !== undefined) {
      throw failWithError;
    }
    return { rows: [{ '?column?': 1 }] };
  };

  const fakeExecutor = {
    executeQuery: runQuery,
    compileQuery: () => fakeCompiledQuery,
    transformQuery: (node: unknown) => node,
    provideConnection: async <R>(fn: (conn: unknown) => Promise<R>) => {
      return fn({ executeQuery: runQuery });
    },
  };

  const fakeDb = {
    getExecutor: () => fakeExecutor,
  };

  return fakeDb as unknown as Kysely<T>;
};
