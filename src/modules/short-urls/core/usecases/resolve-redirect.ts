/**
 * Resolve Redirect Use Case
 *
 * Resolves a short code to its original URL and records the visit.
 */

import { ok, err, type Result } from 'neverthrow';

import { createNotFoundError, type ShortUrlError } from '../errors.js';
import { isValidShortCode } from '../types.js';

import type { UrlStore } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for resolve redirect use case.
 */
export interface ResolveRedirectDeps {
  urlStore: UrlStore;
}

/**
 * Input for resolve redirect use case.
 */
export interface ResolveRedirectInput {
  /** Short code, not pre-validated */
  shortCode: string;
}

/**
 * Result of resolve redirect use case.
 */
export interface ResolveRedirectResult {
  /** Original URL to redirect to */
  url: string;
  /** Click count including this visit */
  clickCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolves a short code for a redirect.
 *
 * Flow:
 * 1. Malformed codes are reported as not found without touching the store
 * 2. Look up the record
 * 3. Increment the click count (awaited, so the visit is counted before the
 *    caller sends its response)
 * 4. Return the original URL
 */
export const resolveRedirect = async (
  deps: ResolveRedirectDeps,
  input: ResolveRedirectInput
): Promise<Result<ResolveRedirectResult, ShortUrlError>> => {
  const { urlStore } = deps;
  const { shortCode } = input;

  if (!isValidShortCode(shortCode)) {
    return err(createNotFoundError(shortCode));
  }

  const recordResult = await urlStore.get(shortCode);
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }

  const incrementResult = await urlStore.incrementClick(shortCode);
  if (incrementResult.isErr()) {
    return err(incrementResult.error);
  }

  return ok({
    url: recordResult.value.originalUrl,
    clickCount: incrementResult.value.clickCount,
  });
};
