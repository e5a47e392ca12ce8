/**
 * Short URLs Module - Domain Types
 *
 * Contains domain types, constants, and type guards for the short URL engine.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Short code length */
export const CODE_LENGTH = 6;

/** Symbols a short code is drawn from (62 symbols) */
export const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/** Code pattern regex for validation */
export const CODE_PATTERN = /^[A-Za-z0-9]{6}$/;

/** Maximum accepted URL length */
export const MAX_URL_LENGTH = 2048;

/** Code proposals allowed per shorten request */
export const MAX_GENERATION_ATTEMPTS = 10;

/** Schemes accepted for shortening */
export const ALLOWED_PROTOCOLS: readonly string[] = ['http:', 'https:'];

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Short URL domain entity.
 *
 * Born fully formed by a single insert; only `clickCount` changes afterwards.
 */
export interface ShortUrlRecord {
  /** 6-character alphanumeric code (primary key) */
  readonly shortCode: string;
  /** Normalized original URL */
  readonly originalUrl: string;
  /** Creation timestamp */
  readonly createdAt: Date;
  /** Number of successful redirects */
  readonly clickCount: number;
}

/**
 * Click analytics for a short URL.
 */
export interface UrlStats {
  readonly shortCode: string;
  readonly originalUrl: string;
  readonly clickCount: number;
  readonly createdAt: Date;
}

/**
 * Configuration for the short URLs module.
 */
export interface ShortUrlsConfig {
  /** Base URL for constructing short links (e.g. "https://sho.rt") */
  readonly publicBaseUrl: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates if a string is a well-formed short code.
 */
export const isValidShortCode = (code: string): boolean => {
  return CODE_PATTERN.test(code);
};
