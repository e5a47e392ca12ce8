/**
 * Short URLs Module - Public API
 *
 * Short code allocation, redirects with click accounting, and click analytics.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type { ShortUrlRecord, UrlStats, ShortUrlsConfig } from './core/types.js';

export {
  // Constants
  CODE_LENGTH,
  CODE_ALPHABET,
  CODE_PATTERN,
  MAX_URL_LENGTH,
  MAX_GENERATION_ATTEMPTS,
  // Type guards
  isValidShortCode,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ShortUrlError,
  StoreError,
  ValidationError,
  NotFoundError,
  GenerationExhaustedError,
  DuplicateCodeError,
} from './core/errors.js';

export {
  createStoreError,
  createValidationError,
  createNotFoundError,
  createGenerationExhaustedError,
  createDuplicateCodeError,
  isDuplicateCodeError,
  isServerFault,
  SHORT_URL_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { UrlStore, CodeGenerator } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Utilities
// ─────────────────────────────────────────────────────────────────────────────

export { validateUrl, buildShortUrl, toRedirectLocation } from './core/url-utils.js';

export {
  makeRandomCodeGenerator,
  type RandomSource,
  type RandomCodeGeneratorOptions,
} from './core/code-generator.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  createShortUrl,
  type CreateShortUrlDeps,
  type CreateShortUrlInput,
  type CreateShortUrlResult,
} from './core/usecases/create-short-url.js';

export {
  resolveRedirect,
  type ResolveRedirectDeps,
  type ResolveRedirectInput,
  type ResolveRedirectResult,
} from './core/usecases/resolve-redirect.js';

export {
  getUrlStats,
  type GetUrlStatsDeps,
  type GetUrlStatsInput,
} from './core/usecases/get-url-stats.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Store Implementations
// ─────────────────────────────────────────────────────────────────────────────

export { makeKyselyUrlStore, type KyselyUrlStoreOptions } from './shell/repo/kysely-url-store.js';
export {
  makeInMemoryUrlStore,
  type InMemoryUrlStoreOptions,
} from './shell/repo/in-memory-url-store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeShortUrlRoutes, type MakeShortUrlRoutesDeps } from './shell/rest/routes.js';
