/**
 * Create Short URL Use Case
 *
 * Validates a URL and stores it under a freshly generated short code.
 * Not idempotent: shortening the same URL twice yields two distinct records.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createGenerationExhaustedError,
  isDuplicateCodeError,
  type ShortUrlError,
} from '../errors.js';
import { MAX_GENERATION_ATTEMPTS, type ShortUrlRecord, type ShortUrlsConfig } from '../types.js';
import { buildShortUrl, validateUrl } from '../url-utils.js';

import type { CodeGenerator, UrlStore } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for create short URL use case.
 */
export interface CreateShortUrlDeps {
  urlStore: UrlStore;
  codeGenerator: CodeGenerator;
  config: ShortUrlsConfig;
  /** Code proposals allowed before giving up (default: MAX_GENERATION_ATTEMPTS) */
  maxAttempts?: number;
}

/**
 * Input for create short URL use case.
 */
export interface CreateShortUrlInput {
  /** Raw, unvalidated URL */
  url: unknown;
}

/**
 * Result of create short URL use case.
 */
export interface CreateShortUrlResult {
  /** The stored record */
  record: ShortUrlRecord;
  /** Public short URL for the record */
  shortUrl: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a short URL.
 *
 * Flow:
 * 1. Validate and normalize the URL
 * 2. Propose a code and try to insert it, up to `maxAttempts` times
 *    - DuplicateCodeError: propose another code
 *    - Any other error: propagate
 * 3. Return the stored record and its public short URL
 *
 * Nothing is stored when validation fails or attempts run out.
 */
export const createShortUrl = async (
  deps: CreateShortUrlDeps,
  input: CreateShortUrlInput
): Promise<Result<CreateShortUrlResult, ShortUrlError>> => {
  const { urlStore, codeGenerator, config, maxAttempts = MAX_GENERATION_ATTEMPTS } = deps;

  const validated = validateUrl(input.url);
  if (validated.isErr()) {
    return err(validated.error);
  }

  const originalUrl = validated.value;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const record: ShortUrlRecord = {
      shortCode: codeGenerator.generate(),
      originalUrl,
      createdAt: new Date(),
      clickCount: 0,
    };

    const insertResult = await urlStore.insert(record);

    if (insertResult.isOk()) {
      return ok({
        record: insertResult.value,
        shortUrl: buildShortUrl(config.publicBaseUrl, insertResult.value.shortCode),
      });
    }

    if (!isDuplicateCodeError(insertResult.error)) {
      return err(insertResult.error);
    }
  }

  return err(createGenerationExhaustedError(maxAttempts));
};
