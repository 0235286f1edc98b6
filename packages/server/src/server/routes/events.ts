/**
 * Event Routes
 *
 * Read access to the audit log.
 */

import type { FastifyInstance } from 'fastify';
import { eventQuerySchema } from '@ztgate/shared';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import type { Pipeline } from '../../pipeline.js';

/**
 * Register event API routes
 */
export function registerEventRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  /**
   * GET /api/v1/events - Query audit log entries
   */
  app.get('/api/v1/events', async (request, reply) => {
    const queryResult = eventQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid query parameters',
          { errors: queryResult.error.errors },
          request.id
        )
      );
    }

    const events = await pipeline.monitor.queryEvents(queryResult.data);
    return reply.send(createSuccessResponse({ items: events, total: events.length }, request.id));
  });
}
