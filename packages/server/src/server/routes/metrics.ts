import type { FastifyInstance } from 'fastify';
import { createSuccessResponse } from '../types.js';
import type { Pipeline } from '../../pipeline.js';

/**
 * Register metrics API routes
 */
export function registerMetricsRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  /**
   * GET /api/v1/metrics - Current metrics snapshot
   */
  app.get('/api/v1/metrics', async (request, reply) => {
    return reply.send(createSuccessResponse(pipeline.monitor.snapshot(), request.id));
  });

  /**
   * GET /api/v1/metrics/verify - Compare metrics with a replay of the audit log
   */
  app.get('/api/v1/metrics/verify', async (request, reply) => {
    const verification = await pipeline.monitor.verify();
    return reply.send(createSuccessResponse(verification, request.id));
  });
}
