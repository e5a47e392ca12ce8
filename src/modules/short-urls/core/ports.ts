/**
 * Short URLs Module - Port Interfaces
 *
 * Defines the store and code generator contracts that the shell layer must implement.
 */

import type { ShortUrlError } from './errors.js';
import type { ShortUrlRecord } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// URL Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Durable, concurrency-safe storage for short URL records keyed by short code.
 *
 * Every operation is atomic with respect to concurrent callers. All mutation of
 * records passes through this interface.
 */
export interface UrlStore {
  /**
   * Inserts a new record if its short code is free.
   * The existence check and the write are a single step: of two callers racing
   * on the same code, exactly one succeeds and the other gets DuplicateCodeError.
   */
  insert(record: ShortUrlRecord): Promise<Result<ShortUrlRecord, ShortUrlError>>;

  /**
   * Finds a record by its short code.
   */
  get(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>>;

  /**
   * Adds 1 to the click count and returns the updated record.
   * Concurrent increments on the same code never lose updates.
   */
  incrementClick(shortCode: string): Promise<Result<ShortUrlRecord, ShortUrlError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Code Generator
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Proposes candidate short codes.
 * Pure with respect to the store: uniqueness is enforced by UrlStore.insert.
 */
export interface CodeGenerator {
  generate(): string;
}
