/**
 * Health check routes
 * Provides liveness and readiness endpoints for orchestrator probes
 *
 * Endpoints:
 * - GET /, GET /health/live, GET /api/health - Liveness probe (is the process alive?)
 * - GET /health/ready - Readiness probe (is the store reachable?)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { Clock } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

/** Paths answering the liveness check */
export const LIVENESS_PATHS = ['/', '/health/live', '/api/health'] as const;

export interface MakeHealthRoutesDeps extends Partial<GetReadinessDeps> {
  /** Defaults to the system clock */
  clock?: Clock;
}

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { version, checkers = [], clock = () => new Date() } = deps;
  const startedAt = clock().getTime();

  return async (fastify) => {
    /**
     * Liveness probe. Does NOT check dependencies - that is the readiness probe's job.
     */
    for (const path of LIVENESS_PATHS) {
      fastify.get<{ Reply: LivenessResponse }>(
        path,
        {
          schema: {
            response: {
              200: LivenessResponseSchema,
            },
          },
        },
        async (_request, reply) => {
          return reply.status(200).send({ status: 'ok' });
        }
      );
    }

    /**
     * Readiness probe. Returns 503 if any dependency is unavailable.
     */
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness({ version, checkers }, { startedAt, now: clock() });

        const httpStatus = response.status === 'unhealthy' ? 503 : 200;

        return reply.status(httpStatus).send(response);
      }
    );
  };
};
