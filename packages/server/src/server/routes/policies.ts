import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import type { Pipeline } from '../../pipeline.js';
import type { PolicySnapshot } from '../../security/types.js';

function summarize(snapshot: PolicySnapshot) {
  return {
    name: snapshot.name,
    version: snapshot.version,
    source: snapshot.source,
    hash: snapshot.hash,
    policies: snapshot.policySet.policies.length,
    defaultDecision: snapshot.policySet.defaultDecision,
    loadedAt: snapshot.loadedAt.toISOString(),
  };
}

/**
 * Register policy API routes
 */
export function registerPolicyRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  /**
   * GET /api/v1/policies - Active policy summary
   */
  app.get('/api/v1/policies', async (request, reply) => {
    return reply.send(createSuccessResponse(summarize(pipeline.policyStore.current()), request.id));
  });

  /**
   * POST /api/v1/policies/reload - Re-read the policy document
   * A rejected document leaves the active policy in place (409).
   */
  app.post('/api/v1/policies/reload', async (request, reply) => {
    const result = await pipeline.reloadPolicy();

    if (!result.reloaded) {
      return reply.status(409).send(
        createErrorResponse(
          ErrorCode.CONFLICT,
          result.error?.message ?? 'Policy reload rejected',
          {
            validationErrors: result.error?.validationErrors ?? [],
            active: summarize(result.snapshot),
          },
          request.id
        )
      );
    }

    return reply.send(createSuccessResponse(summarize(result.snapshot), request.id));
  });
}
