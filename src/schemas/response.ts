import { randomUUID } from 'node:crypto';
import { z } from '@hono/zod-openapi';
import type { Context } from 'hono';
import type { AppBindings } from '../env.js';

// =================================================================================
// Error Codes - Machine-readable error identifiers
// =================================================================================

export const ErrorCode = {
  // Validation errors (4xx)
  INVALID_REQUEST: 'INVALID_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource errors (4xx)
  NOT_FOUND: 'NOT_FOUND',

  // Rate limiting (429)
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  // External provider errors (5xx)
  PROVIDER_ERROR: 'PROVIDER_ERROR',
  PROVIDER_TIMEOUT: 'PROVIDER_TIMEOUT',

  // Local state errors (5xx)
  CACHE_ERROR: 'CACHE_ERROR',
  CREDENTIAL_ERROR: 'CREDENTIAL_ERROR',

  // Generic errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export const ErrorCodeSchema = z.enum([
  ErrorCode.INVALID_REQUEST,
  ErrorCode.VALIDATION_ERROR,
  ErrorCode.NOT_FOUND,
  ErrorCode.RATE_LIMIT_EXCEEDED,
  ErrorCode.PROVIDER_ERROR,
  ErrorCode.PROVIDER_TIMEOUT,
  ErrorCode.CACHE_ERROR,
  ErrorCode.CREDENTIAL_ERROR,
  ErrorCode.INTERNAL_ERROR,
  ErrorCode.SERVICE_UNAVAILABLE,
]).openapi('ErrorCode');

// =================================================================================
// Error Code to HTTP Status Mapping
// =================================================================================

export type ErrorStatus = 400 | 404 | 429 | 500 | 502 | 503 | 504;

export const ERROR_STATUS_MAP: Record<ErrorCodeType, ErrorStatus> = {
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.PROVIDER_ERROR]: 502,
  [ErrorCode.PROVIDER_TIMEOUT]: 504,
  [ErrorCode.CACHE_ERROR]: 503,
  [ErrorCode.CREDENTIAL_ERROR]: 502,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
};

// =================================================================================
// Response Meta Schema
// =================================================================================

export const ResponseMetaSchema = z.object({
  requestId: z.string().describe('Unique request identifier for tracing'),
  timestamp: z.string().datetime().describe('ISO-8601 timestamp'),
  latencyMs: z.number().int().nonnegative().optional().describe('Request processing time in milliseconds'),
}).openapi('ResponseMeta');

export type ResponseMeta = z.infer<typeof ResponseMetaSchema>;

// =================================================================================
// Error Response Schema
// =================================================================================

export const ErrorDetailsSchema = z.object({
  code: ErrorCodeSchema.describe('Machine-readable error code'),
  message: z.string().describe('Human-readable error message'),
  details: z.record(z.string(), z.unknown()).optional().describe('Additional error context'),
}).openapi('ErrorDetails');

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: ErrorDetailsSchema,
  meta: ResponseMetaSchema,
}).openapi('ErrorResponse');

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =================================================================================
// Success Response Schema Factory
// =================================================================================

/**
 * Creates a typed success response schema wrapping the provided data schema
 *
 * @example
 * const LookupSuccessSchema = createSuccessSchema(CacheRecordDataSchema, 'LookupSuccess');
 */
export function createSuccessSchema<T extends z.ZodTypeAny>(
  dataSchema: T,
  name: string
) {
  return z.object({
    success: z.literal(true),
    data: dataSchema,
    meta: ResponseMetaSchema,
  }).openapi(name);
}

// =================================================================================
// Response Helper Utilities
// =================================================================================

/**
 * Build response meta from Hono context
 */
export function buildMeta(c: Context<AppBindings>): ResponseMeta {
  const startTime = c.get('startTime');
  return {
    requestId: c.get('requestId') || randomUUID(),
    timestamp: new Date().toISOString(),
    latencyMs: startTime ? Date.now() - startTime : undefined,
  };
}

/**
 * Create a standardized success response
 *
 * @example
 * return createSuccessResponse(c, { deleted: 12 });
 */
export function createSuccessResponse<T>(
  c: Context<AppBindings>,
  data: T,
  headers?: Record<string, string>
) {
  return c.json({
    success: true as const,
    data,
    meta: buildMeta(c),
  }, 200, headers);
}

/**
 * Create a standardized error response
 *
 * @example
 * return createErrorResponse(c, ErrorCode.NOT_FOUND, 'No cache entry for key');
 */
export function createErrorResponse<C extends ErrorCodeType>(
  c: Context<AppBindings>,
  code: C,
  message: string,
  details?: Record<string, unknown>
) {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    meta: buildMeta(c),
  };

  return c.json(response, ERROR_STATUS_MAP[code]);
}

// =================================================================================
// API Error Class
// =================================================================================

/**
 * Custom error class for throwing typed API errors
 *
 * @example
 * throw new APIError(ErrorCode.NOT_FOUND, 'No cache entry', { key });
 */
export class APIError extends Error {
  code: ErrorCodeType;
  details?: Record<string, unknown>;
  status: ErrorStatus;

  constructor(code: ErrorCodeType, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'APIError';
    this.code = code;
    this.details = details;
    this.status = ERROR_STATUS_MAP[code];
  }
}
