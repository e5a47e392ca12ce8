/**
 * Short URLs REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static } from '@sinclair/typebox';

import { CODE_LENGTH } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create short URL request body schema.
 * Format and length checks happen in the core validator, after trimming, so its
 * messages reach the client.
 */
export const CreateShortUrlBodySchema = Type.Object(
  {
    url: Type.String({ description: 'The http(s) URL to shorten' }),
  },
  { additionalProperties: false }
);

export type CreateShortUrlBody = Static<typeof CreateShortUrlBodySchema>;

/**
 * Short code URL params schema.
 * Not pattern-checked here: redirects answer 404 and stats answer 400 for malformed codes.
 */
export const ShortCodeParamsSchema = Type.Object(
  {
    shortCode: Type.String({
      description: `The ${String(CODE_LENGTH)}-character short code`,
    }),
  },
  { additionalProperties: false }
);

export type ShortCodeParams = Static<typeof ShortCodeParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Success response for a created short URL.
 */
export const CreateShortUrlResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    short_code: Type.String({
      minLength: CODE_LENGTH,
      maxLength: CODE_LENGTH,
      description: 'The generated short code',
    }),
    original_url: Type.String({ description: 'The normalized original URL' }),
    short_url: Type.String({ description: 'Public URL that redirects to the original' }),
  }),
});

export type CreateShortUrlResponse = Static<typeof CreateShortUrlResponseSchema>;

/**
 * Success response with click analytics.
 */
export const UrlStatsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    short_code: Type.String(),
    original_url: Type.String(),
    click_count: Type.Integer({ minimum: 0, description: 'Successful redirects so far' }),
    created_at: Type.String({ format: 'date-time', description: 'Creation time (ISO 8601)' }),
  }),
});

export type UrlStatsResponse = Static<typeof UrlStatsResponseSchema>;

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
