/**
 * Short URLs REST Routes
 *
 * - POST /api/shorten: Create a short URL
 * - GET /api/stats/:shortCode: Click analytics
 * - GET /:shortCode: Redirect to the original URL
 */

import {
  CreateShortUrlBodySchema,
  ShortCodeParamsSchema,
  CreateShortUrlResponseSchema,
  UrlStatsResponseSchema,
  ErrorResponseSchema,
  type CreateShortUrlBody,
  type ShortCodeParams,
} from './schemas.js';
import { getHttpStatusForError, isServerFault, type ShortUrlError } from '../../core/errors.js';
import { createShortUrl } from '../../core/usecases/create-short-url.js';
import { getUrlStats } from '../../core/usecases/get-url-stats.js';
import { resolveRedirect } from '../../core/usecases/resolve-redirect.js';
import { toRedirectLocation } from '../../core/url-utils.js';

import type { CodeGenerator, UrlStore } from '../../core/ports.js';
import type { ShortUrlsConfig } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for short URL routes.
 */
export interface MakeShortUrlRoutesDeps {
  urlStore: UrlStore;
  codeGenerator: CodeGenerator;
  config: ShortUrlsConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends a domain error with its mapped status.
 * Server faults are logged as errors; client faults only at debug level.
 */
function sendError(request: FastifyRequest, reply: FastifyReply, error: ShortUrlError) {
  if (isServerFault(error)) {
    request.log.error({ error }, 'Short URL request failed');
  } else {
    request.log.debug({ error }, 'Short URL request rejected');
  }

  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates short URL REST routes.
 */
export const makeShortUrlRoutes = (deps: MakeShortUrlRoutesDeps): FastifyPluginAsync => {
  const { urlStore, codeGenerator, config } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/shorten - Create short URL
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: CreateShortUrlBody }>(
      '/api/shorten',
      {
        schema: {
          body: CreateShortUrlBodySchema,
          response: {
            201: CreateShortUrlResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await createShortUrl(
          { urlStore, codeGenerator, config },
          { url: request.body.url }
        );

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        const { record, shortUrl } = result.value;
        request.log.info(
          { shortCode: record.shortCode, originalUrl: record.originalUrl },
          'Created short URL'
        );

        return reply.status(201).send({
          ok: true,
          data: {
            short_code: record.shortCode,
            original_url: record.originalUrl,
            short_url: shortUrl,
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/stats/:shortCode - Click analytics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: ShortCodeParams }>(
      '/api/stats/:shortCode',
      {
        schema: {
          params: ShortCodeParamsSchema,
          response: {
            200: UrlStatsResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getUrlStats({ urlStore }, { shortCode: request.params.shortCode });

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        const stats = result.value;

        return reply.status(200).send({
          ok: true,
          data: {
            short_code: stats.shortCode,
            original_url: stats.originalUrl,
            click_count: stats.clickCount,
            created_at: stats.createdAt.toISOString(),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /:shortCode - Redirect
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: ShortCodeParams }>(
      '/:shortCode',
      {
        schema: {
          params: ShortCodeParamsSchema,
          response: {
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { shortCode } = request.params;

        const result = await resolveRedirect({ urlStore }, { shortCode });

        if (result.isErr()) {
          return sendError(request, reply, result.error);
        }

        request.log.info({ shortCode, url: result.value.url }, 'Redirect');

        return reply.status(302).header('location', toRedirectLocation(result.value.url)).send();
      }
    );
  };
};
