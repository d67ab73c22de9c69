/**
 * Application-Level Rate Limiter
 *
 * Per-client sliding window over request timestamps, kept in process memory.
 * Guards the lookup endpoints, whose upstream calls are the expensive part.
 */

import type { Context, MiddlewareHandler } from 'hono';
import type { AppBindings } from '../src/env.js';
import { createErrorResponse, ErrorCode } from '../src/schemas/response.js';

export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the time window
   */
  maxRequests: number;

  /**
   * Time window in seconds
   */
  windowSeconds: number;
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch seconds */
  resetAt: number;
  retryAfter?: number;
}

/**
 * Request timestamps (epoch seconds) per client
 */
export class RateLimitStore {
  private readonly windows = new Map<string, number[]>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Check and, when allowed, record one request for a client
   */
  check(clientId: string, config: RateLimitConfig): RateLimitResult {
    const now = Math.floor(this.now() / 1000);
    const windowStart = now - config.windowSeconds;

    // Filter requests within the sliding window
    const recent = (this.windows.get(clientId) ?? []).filter(timestamp => timestamp > windowStart);

    if (recent.length >= config.maxRequests) {
      this.windows.set(clientId, recent);
      const resetAt = recent[0] + config.windowSeconds;
      return {
        allowed: false,
        limit: config.maxRequests,
        remaining: 0,
        resetAt,
        retryAfter: Math.max(1, resetAt - now),
      };
    }

    recent.push(now);
    this.windows.set(clientId, recent);
    this.prune(windowStart);

    return {
      allowed: true,
      limit: config.maxRequests,
      remaining: config.maxRequests - recent.length,
      resetAt: now + config.windowSeconds,
    };
  }

  get size(): number {
    return this.windows.size;
  }

  /** Drop clients with no request left in the window */
  private prune(windowStart: number): void {
    for (const [clientId, timestamps] of this.windows) {
      if (timestamps[timestamps.length - 1] <= windowStart) {
        this.windows.delete(clientId);
      }
    }
  }
}

/**
 * Get client IP from request
 */
function getClientIP(c: Context<AppBindings>): string {
  return c.req.header('x-forwarded-for')?.split(',')[0].trim() ||
         c.req.header('x-real-ip') ||
         'unknown';
}

/**
 * Rate limiting middleware factory
 */
export function rateLimiter(
  config: RateLimitConfig,
  store: RateLimitStore = new RateLimitStore()
): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const result = store.check(getClientIP(c), config);

    // Add rate limit headers
    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.resetAt.toString());

    if (!result.allowed) {
      const retryAfter = result.retryAfter ?? config.windowSeconds;
      c.header('Retry-After', retryAfter.toString());
      return createErrorResponse(
        c,
        ErrorCode.RATE_LIMIT_EXCEEDED,
        `Rate limit exceeded. Maximum ${result.limit} requests per ${config.windowSeconds}s.`,
        {
          limit: result.limit,
          reset_at: result.resetAt,
          retry_after: retryAfter,
        }
      );
    }

    await next();
  };
}
