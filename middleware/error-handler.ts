import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppBindings } from '../src/env.js';
import {
  ErrorCode,
  ERROR_STATUS_MAP,
  APIError,
  buildMeta,
  type ErrorCodeType,
  type ErrorResponse,
} from '../src/schemas/response.js';
import { ResolverError } from '../lib/external-services/errors.js';
import { TimeoutError } from '../lib/fetch-utils.js';

// =================================================================================
// Error Handler Middleware - Consistent Error Responses
// =================================================================================

/**
 * Patterns to redact from error messages (security)
 */
const REDACT_PATTERNS = [
  /api[_-]?key[=:][^\s&]+/gi,        // API keys in query strings
  /api[_-]?secret[=:][^\s&]+/gi,     // Secrets
  /NPO\s+[^\s:]+:[^\s]+/g,           // Signed authorization values
  /bearer\s+[^\s]+/gi,               // Bearer tokens
  /authorization[=:][^\s]+/gi,       // Auth headers
  /\/(?:home|root|Users)\/[^\s]+/gi, // File paths
  /at\s+[^\s]+\s+\([^)]+\)/gi,       // Stack trace lines
  /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/g,  // IP addresses
];

/**
 * Sanitize error message to prevent leaking sensitive information
 */
export function sanitizeMessage(message: string | undefined): string {
  if (!message) return 'An unexpected error occurred';

  let sanitized = message;
  for (const pattern of REDACT_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  // Truncate very long messages
  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 200) + '...';
  }

  return sanitized;
}

/**
 * Categorize an error into an ErrorCode
 */
export function categorizeError(error: Error): ErrorCodeType {
  if (error instanceof APIError) {
    return error.code;
  }

  if (error instanceof ResolverError) {
    switch (error.code) {
      case 'NETWORK_FAILURE':
      case 'BOT_PROTECTION_DETECTED':
        return ErrorCode.PROVIDER_ERROR;
      case 'RATE_LIMIT_TIMEOUT':
        return ErrorCode.PROVIDER_TIMEOUT;
      case 'AUTH_REJECTED':
        return ErrorCode.CREDENTIAL_ERROR;
      case 'CORRUPT_STATE':
        return ErrorCode.CACHE_ERROR;
      case 'LOOKUP_ABORTED':
        return ErrorCode.SERVICE_UNAVAILABLE;
    }
  }

  if (error instanceof HTTPException) {
    if (error.status === 404) return ErrorCode.NOT_FOUND;
    if (error.status === 429) return ErrorCode.RATE_LIMIT_EXCEEDED;
    if (error.status < 500) return ErrorCode.INVALID_REQUEST;
  }

  const message = error.message?.toLowerCase() || '';

  // Zod validation errors
  if (error.name === 'ZodError') {
    return ErrorCode.VALIDATION_ERROR;
  }

  if (error instanceof TimeoutError || message.includes('timed out')) {
    return ErrorCode.PROVIDER_TIMEOUT;
  }

  // Filesystem errors from the cache directory
  if (/\b(?:ENOSPC|EACCES|EROFS|EMFILE)\b/.test(error.message)) {
    return ErrorCode.CACHE_ERROR;
  }

  if (message.includes('fetch failed')) {
    return ErrorCode.PROVIDER_ERROR;
  }

  return ErrorCode.INTERNAL_ERROR;
}

/**
 * Hono error handler middleware
 * Catches errors and returns consistent JSON responses with envelope format
 */
export const errorHandler: ErrorHandler<AppBindings> = (error, c) => {
  const logger = c.get('logger');
  // Log the full error for debugging (not exposed to client)
  logger?.error('Error handler caught:', {
    name: error.name,
    message: sanitizeMessage(error.message),
    stack: error.stack?.split('\n').slice(1, 3).join('\n'),
    path: c.req.path,
    method: c.req.method,
  });

  const code = categorizeError(error);
  const message = code === ErrorCode.INTERNAL_ERROR && !(error instanceof APIError)
    ? 'Internal server error'
    : sanitizeMessage(error.message);

  // Build details from APIError if available
  const details = error instanceof APIError ? error.details : undefined;

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
};
