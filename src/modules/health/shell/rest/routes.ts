/**
 * Health REST routes
 *
 * - GET /health/live:  200 while the process is up
 * - GET /health/ready: 503 until the sales export is loaded or while any
 *   critical check fails; 200 with `degraded` for non-critical failures
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

const readinessStatusCode = (status: ReadinessResponse['status']): 200 | 503 =>
  status === 'unhealthy' ? 503 : 200;

export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const readinessDeps: GetReadinessDeps = {
    checkers: deps.checkers ?? [],
    version: deps.version,
  };
  const bootedAt = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => reply.status(200).send({ status: 'ok' })
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (_request, reply) => {
        const readiness = await getReadiness(readinessDeps, {
          uptime: Math.floor((Date.now() - bootedAt) / 1000),
          timestamp: new Date().toISOString(),
        });

        return reply.status(readinessStatusCode(readiness.status)).send(readiness);
      }
    );
  };
};
