/**
 * Short URLs Module - URL Utilities
 *
 * Pure functions for validating, normalizing and building URLs.
 * These functions have no side effects and are fully testable.
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import { ALLOWED_PROTOCOLS, MAX_URL_LENGTH } from './types.js';

/** Splits an absolute URL into scheme, authority and the remainder */
const ABSOLUTE_URL_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)(.*)$/s;

const WHITESPACE_PATTERN = /\s/;

const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001F\u007F]/;

/** Visible ASCII only; anything else cannot go into a header verbatim */
const HEADER_SAFE_PATTERN = /^[!-~]*$/;

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates a candidate URL for shortening and returns its normalized form.
 *
 * Accepted: absolute http/https URLs with a non-empty host and no whitespace or
 * control characters.
 *
 * Normalization:
 * - Surrounding whitespace is trimmed
 * - Scheme and host are lower-cased
 * - Userinfo, path, query and fragment are kept verbatim
 *
 * @param raw - Untrusted input claiming to be a URL
 * @returns Normalized URL or a ValidationError on field `url`
 */
export const validateUrl = (raw: unknown): Result<string, ValidationError> => {
  if (typeof raw !== 'string' || raw.trim() === '') {
    return err(createValidationError('url', 'URL is required'));
  }

  const trimmed = raw.trim();

  if (trimmed.length > MAX_URL_LENGTH) {
    return err(
      createValidationError(
        'url',
        `URL exceeds maximum length of ${String(MAX_URL_LENGTH)} characters`
      )
    );
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return err(createValidationError('url', 'Invalid URL format'));
  }

  if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
    const scheme = parsed.protocol.replace(/:$/, '');
    return err(
      createValidationError(
        'url',
        `Unsupported URL scheme '${scheme}'. Only http and https are allowed`
      )
    );
  }

  if (WHITESPACE_PATTERN.test(trimmed)) {
    return err(createValidationError('url', 'URL must not contain whitespace'));
  }

  if (CONTROL_CHARACTER_PATTERN.test(trimmed)) {
    return err(createValidationError('url', 'URL must not contain control characters'));
  }

  const match = ABSOLUTE_URL_PATTERN.exec(trimmed);
  if (match === null) {
    return err(createValidationError('url', 'Invalid URL format'));
  }

  const [, scheme = '', authority = '', rest = ''] = match;

  // Userinfo keeps its case; only the host[:port] part is lower-cased
  const at = authority.lastIndexOf('@');
  const userinfo = at === -1 ? '' : authority.slice(0, at + 1);
  const hostPort = at === -1 ? authority : authority.slice(at + 1);

  if (parsed.hostname === '' || hostPort === '' || hostPort.startsWith(':')) {
    return err(createValidationError('url', 'URL must include a host'));
  }

  return ok(`${scheme.toLowerCase()}://${userinfo}${hostPort.toLowerCase()}${rest}`);
};

// ─────────────────────────────────────────────────────────────────────────────
// Redirects
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns a form of a stored URL that fits in a Location header.
 *
 * ASCII URLs are returned as stored. Others are serialized by the WHATWG parser,
 * which punycodes the host and percent-encodes path, query and fragment.
 *
 * @example
 * toRedirectLocation('https://example.com/日本') // 'https://example.com/%E6%97%A5%E6%9C%AC'
 */
export const toRedirectLocation = (url: string): string => {
  if (HEADER_SAFE_PATTERN.test(url)) {
    return url;
  }
  return new URL(url).href;
};

// ─────────────────────────────────────────────────────────────────────────────
// Short URL Construction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the public short URL for a code.
 *
 * @example
 * buildShortUrl('https://sho.rt/', 'Ab3Xy9') // 'https://sho.rt/Ab3Xy9'
 */
export const buildShortUrl = (publicBaseUrl: string, shortCode: string): string => {
  const baseUrl = publicBaseUrl.replace(/\/+$/, '');
  return `${baseUrl}/${shortCode}`;
};
