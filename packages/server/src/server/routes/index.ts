import type { FastifyInstance } from 'fastify';
import type { Pipeline } from '../../pipeline.js';
import { registerHealthRoutes } from './health.js';
import { registerAccessRoutes } from './access.js';
import { registerMetricsRoutes } from './metrics.js';
import { registerEventRoutes } from './events.js';
import { registerPolicyRoutes } from './policies.js';

export function registerRoutes(app: FastifyInstance, pipeline: Pipeline): void {
  registerHealthRoutes(app, pipeline);
  registerAccessRoutes(app, pipeline);
  registerMetricsRoutes(app, pipeline);
  registerEventRoutes(app, pipeline);
  registerPolicyRoutes(app, pipeline);
}

export {
  registerHealthRoutes,
  registerAccessRoutes,
  registerMetricsRoutes,
  registerEventRoutes,
  registerPolicyRoutes,
};
