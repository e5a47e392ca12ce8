/**
 * Unit tests for get-url-stats use case
 */

import { describe, expect, it } from 'vitest';

import { getUrlStats } from '@/modules/short-urls/core/usecases/get-url-stats.js';

import { createTestShortUrlRecord, makeFakeUrlStore } from '../../fixtures/fakes.js';

describe('getUrlStats use case', () => {
  it('returns the stored stats', async () => {
    const urlStore = makeFakeUrlStore({
      records: [createTestShortUrlRecord({ clickCount: 12 })],
    });

    const result = await getUrlStats({ urlStore }, { shortCode: 'Ab3Xy9' });

    expect(result._unsafeUnwrap()).toEqual({
      shortCode: 'Ab3Xy9',
      originalUrl: 'https://example.com/some/long/path',
      clickCount: 12,
      createdAt: new Date('2024-01-15T10:00:00.000Z'),
    });
  });

  it('does not count as a visit', async () => {
    const urlStore = makeFakeUrlStore({ records: [createTestShortUrlRecord()] });

    await getUrlStats({ urlStore }, { shortCode: 'Ab3Xy9' });
    await getUrlStats({ urlStore }, { shortCode: 'Ab3Xy9' });

    expect(urlStore.calls.incrementClick).toBe(0);
    expect(urlStore.peek('Ab3Xy9')?.clickCount).toBe(0);
  });

  it('returns NotFoundError for an unknown code', async () => {
    const urlStore = makeFakeUrlStore();

    const result = await getUrlStats({ urlStore }, { shortCode: 'Zz9Zz9' });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'NotFoundError',
      shortCode: 'Zz9Zz9',
    });
  });

  it('rejects a malformed code before querying the store', async () => {
    const urlStore = makeFakeUrlStore();

    const result = await getUrlStats({ urlStore }, { shortCode: 'bad!' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ValidationError',
      field: 'short_code',
      message: 'Short code must be 6 alphanumeric characters',
    });
    expect(urlStore.calls.get).toBe(0);
  });

  it('propagates store failures', async () => {
    const urlStore = makeFakeUrlStore({ failOn: ['get'] });

    const result = await getUrlStats({ urlStore }, { shortCode: 'Ab3Xy9' });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'StoreError',
      message: 'Simulated get failure',
      retryable: true,
    });
  });
});
