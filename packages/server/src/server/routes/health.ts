import type { FastifyInstance } from 'fastify';
import {
  createSuccessResponse,
  type HealthStatus,
  type ReadinessResponse,
  type LivenessResponse,
  type ComponentCheck,
} from '../types.js';
import type { Pipeline } from '../../pipeline.js';

/**
 * Package version - should match package.json
 */
const VERSION = '0.1.0';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  /**
   * GET /health - Basic health check
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus & { policyLoaded: boolean } = {
      status: pipeline.policyStore.isLoaded() ? 'ok' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      policyLoaded: pipeline.policyStore.isLoaded(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/ready - Readiness check
   * Ready once a policy is active and the audit log has been replayed
   */
  app.get('/health/ready', async (request, reply) => {
    const checks: ComponentCheck[] = [checkPolicy(pipeline), checkMonitor(pipeline)];
    const allHealthy = checks.every((c) => c.healthy);

    const response: ReadinessResponse = {
      ready: allHealthy,
      checks,
      timestamp: new Date().toISOString(),
    };

    if (!allHealthy) {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }

    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/live - Liveness check
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}

function checkPolicy(pipeline: Pipeline): ComponentCheck {
  if (!pipeline.policyStore.isLoaded()) {
    return { name: 'policy', healthy: false, message: 'No policy loaded' };
  }
  const snapshot = pipeline.policyStore.current();
  return {
    name: 'policy',
    healthy: true,
    message: `Policy ${snapshot.name} v${snapshot.version} active`,
  };
}

function checkMonitor(pipeline: Pipeline): ComponentCheck {
  const healthy = pipeline.monitor.isInitialized();
  return {
    name: 'monitor',
    healthy,
    message: healthy ? `Audit log at ${pipeline.monitor.logPath}` : 'Audit log not replayed',
  };
}
