/**
 * Get URL Stats Use Case
 *
 * Reports the current state of a short URL. Read-only.
 */

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type ShortUrlError } from '../errors.js';
import { CODE_LENGTH, isValidShortCode, type UrlStats } from '../types.js';

import type { UrlStore } from '../ports.js';

export interface GetUrlStatsDeps {
  urlStore: UrlStore;
}

export interface GetUrlStatsInput {
  shortCode: string;
}

/**
 * Returns click analytics for a short code.
 * Malformed codes are rejected with a ValidationError before the store is queried.
 */
export const getUrlStats = async (
  deps: GetUrlStatsDeps,
  input: GetUrlStatsInput
): Promise<Result<UrlStats, ShortUrlError>> => {
  const { shortCode } = input;

  if (!isValidShortCode(shortCode)) {
    return err(
      createValidationError(
        'short_code',
        `Short code must be ${String(CODE_LENGTH)} alphanumeric characters`
      )
    );
  }

  const recordResult = await deps.urlStore.get(shortCode);
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }

  const record = recordResult.value;

  return ok({
    shortCode: record.shortCode,
    originalUrl: record.originalUrl,
    clickCount: record.clickCount,
    createdAt: record.createdAt,
  });
};
