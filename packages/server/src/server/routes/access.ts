/**
 * Access Routes
 *
 * Entry point for access requests: runs the full decision and enforcement
 * pipeline and returns the outcome.
 */

import type { FastifyInstance } from 'fastify';
import { accessRequestBodySchema, type AccessDecisionResponse } from '@ztgate/shared';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import type { Pipeline } from '../../pipeline.js';

/**
 * Register access API routes
 */
export function registerAccessRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  /**
   * POST /api/v1/access - Evaluate and enforce an access request
   */
  app.post('/api/v1/access', async (request, reply) => {
    const bodyResult = accessRequestBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid access request',
          { errors: bodyResult.error.errors },
          request.id
        )
      );
    }

    const outcome = await pipeline.pep.enforce(bodyResult.data);

    const response: AccessDecisionResponse = {
      decision: outcome.decision,
      reason: outcome.reason,
      cloud: outcome.cloud,
      enforcement: outcome.enforcement,
      remediationActions: [...outcome.remediationActions],
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
