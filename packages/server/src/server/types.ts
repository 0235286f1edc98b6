import { z } from 'zod';
import { ApiErrorCode, type ApiError, type ApiResponse } from '@ztgate/shared';

export type {
  ApiResponse,
  ApiError,
  HealthStatus,
  ComponentCheck,
  ReadinessResponse,
  LivenessResponse,
} from '@ztgate/shared';

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://localhost:5173']),
  requestTimeout: z.number().int().min(1000).default(30000),
  enableLogging: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export const ErrorCode = ApiErrorCode;
export type ErrorCode = ApiErrorCode;

/**
 * Create a success response
 */
export function createSuccessResponse<T>(data: T, requestId?: string): ApiResponse<T> {
  const response: ApiResponse<T> = { success: true, data };
  if (requestId !== undefined) {
    response.requestId = requestId;
  }
  return response;
}

/**
 * Create an error response
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiResponse<never> {
  const error: ApiError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  const response: ApiResponse<never> = { success: false, error };
  if (requestId !== undefined) {
    response.requestId = requestId;
  }
  return response;
}
