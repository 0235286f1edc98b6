import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import { serverConfigSchema, createErrorResponse, ErrorCode, type ServerConfig } from './types.js';
import { registerRoutes } from './routes/index.js';
import type { Pipeline } from '../pipeline.js';
import { ConfigError, MalformedRequestError } from '../security/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * Server configuration plus the running pipeline the routes serve.
 */
export interface AppConfig extends Partial<ServerConfig> {
  pipeline: Pipeline;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  const { pipeline, ...serverConfig } = config;

  // Validate and apply defaults
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  // Global error handler
  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    if (error instanceof MalformedRequestError) {
      return reply.status(400).send(
        createErrorResponse(ErrorCode.BAD_REQUEST, error.message, { issues: error.issues }, request.id)
      );
    }

    if (error instanceof ConfigError) {
      logger.error({ err: error, requestId: request.id }, 'No usable policy');
      return reply.status(503).send(
        createErrorResponse(ErrorCode.SERVICE_UNAVAILABLE, error.message, undefined, request.id)
      );
    }

    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(ErrorCode.BAD_REQUEST, 'Validation error', { errors: error.validation }, request.id)
      );
    }

    if (error.statusCode) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(createErrorResponse(code, error.message, undefined, request.id));
    }

    return reply.status(500).send(
      createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, request.id)
    );
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(ErrorCode.NOT_FOUND, `Route ${request.method} ${request.url} not found`, undefined, request.id)
    );
  });

  registerRoutes(app, pipeline);

  return app;
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 503:
      return ErrorCode.SERVICE_UNAVAILABLE;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}
