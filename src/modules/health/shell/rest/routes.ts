/**
 * Health routes for the HTTP transport
 *
 * - GET /health/live  - the process is up
 * - GET /health/ready - every checker ran; 503 when a critical one failed
 * - GET /health       - same report as /health/ready
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

const READINESS_PATHS = ['/health/ready', '/health'] as const;

export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const readinessDeps: GetReadinessDeps = {
    checkers: deps.checkers ?? [],
    version: deps.version,
    checkTimeoutMs: deps.checkTimeoutMs,
  };
  const startedAt = Date.now();

  const checkReadiness = (): Promise<ReadinessResponse> =>
    getReadiness(readinessDeps, {
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString(),
    });

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async () => ({ status: 'ok' as const })
    );

    for (const path of READINESS_PATHS) {
      fastify.get<{ Reply: ReadinessResponse }>(
        path,
        {
          schema: {
            response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema },
          },
        },
        async (_request, reply) => {
          const report = await checkReadiness();
          return reply.status(report.status === 'unhealthy' ? 503 : 200).send(report);
        }
      );
    }
  };
};
