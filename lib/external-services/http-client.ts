/**
 * Service Provider Framework - Rate-Limited HTTP Client
 *
 * Eliminates boilerplate from individual providers by providing:
 * - Per-host token-bucket throttling (shared across providers via {@link HostRateLimiter})
 * - Automatic retry on transient statuses with exponential backoff
 * - Standardized error handling and request events
 * - User-Agent management
 *
 * Connections are pooled per origin by Node's fetch dispatcher (keep-alive),
 * so repeated calls to one upstream reuse sockets.
 *
 * Each call spends exactly one token from its host's bucket, however many
 * retry attempts it makes.
 */

import type { z } from 'zod';
import type { ServiceContext } from './service-context.js';
import { fetchWithRetry, DEFAULT_RETRY_CONFIG, DEFAULT_TIMEOUT_MS, TimeoutError } from '../fetch-utils.js';
import { HostRateLimiter } from './rate-limiter.js';
import { NetworkFailureError, RateLimitTimeoutError } from './errors.js';
import { trackProviderRequest } from './analytics.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface HttpClientConfig {
  /** Provider name (used in logs and events) */
  providerName: string;

  /** Shared per-host limiter */
  rateLimiter: HostRateLimiter;

  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;

  /** Base backoff delay in milliseconds (default: 500) */
  baseDelayMs?: number;

  /** Default request timeout in milliseconds (default: 15000) */
  defaultTimeout?: number;

  /** HTTP status codes that should be retried (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];

  /** User-Agent header (default: a desktop browser string, upstream pages serve bots differently) */
  userAgent?: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Appended to the URL's query string */
  query?: Record<string, string | number | undefined>;
  /** Serialized as a JSON body */
  json?: unknown;
  body?: string;
  /**
   * Whether a transient failure may be retried (default true). A POST that
   * only reads, such as a search, is idempotent.
   */
  idempotent?: boolean;
}

export class ServiceHttpClient {
  private readonly config: Required<Omit<HttpClientConfig, 'rateLimiter'>>;
  private readonly rateLimiter: HostRateLimiter;

  constructor(config: HttpClientConfig) {
    this.rateLimiter = config.rateLimiter;
    this.config = {
      providerName: config.providerName,
      maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
      defaultTimeout: config.defaultTimeout ?? DEFAULT_TIMEOUT_MS,
      retryableStatuses: config.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
      userAgent: config.userAgent ?? BROWSER_USER_AGENT,
    };
  }

  get providerName(): string {
    return this.config.providerName;
  }

  async get(url: string, options: RequestOptions, context: ServiceContext): Promise<Response> {
    return this.request('GET', url, options, context);
  }

  async post(url: string, options: RequestOptions, context: ServiceContext): Promise<Response> {
    return this.request('POST', url, options, context);
  }

  /**
   * Send a request through the host's token bucket and the retry loop
   *
   * Any status comes back as a Response, including 4xx and a 5xx that
   * outlived its retries; callers decide what a status means.
   *
   * @throws {RateLimitTimeoutError} when the host bucket stays empty past the wait bound
   * @throws {NetworkFailureError} on connection failure or timeout after retries
   */
  async request(
    method: 'GET' | 'POST',
    url: string,
    options: RequestOptions,
    context: ServiceContext
  ): Promise<Response> {
    const { logger } = context;
    const target = this.buildUrl(url, options.query);
    const operation = this.extractOperation(target);
    const startTime = Date.now();

    if ((context.rateLimitStrategy ?? 'enforce') === 'enforce') {
      try {
        const waitedMs = await this.rateLimiter.acquire(target);
        if (waitedMs > 0) {
          logger.debug('Rate limit wait', { provider: this.config.providerName, waitedMs });
        }
      } catch (error) {
        if (error instanceof RateLimitTimeoutError) {
          trackProviderRequest({
            provider: this.config.providerName,
            operation,
            status: 'rate_limited',
            errorType: 'RATE_LIMIT_TIMEOUT',
            latencyMs: Date.now() - startTime,
          }, context);
          logger.warn('Rate limit wait exceeded', { provider: this.config.providerName, host: error.host });
        }
        throw error;
      }
    }

    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      ...options.headers,
    };
    let body = options.body;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetchWithRetry(
        target,
        { method, headers, body },
        {
          maxRetries: options.idempotent === false ? 0 : this.config.maxRetries,
          baseDelayMs: this.config.baseDelayMs,
          timeoutMs: context.timeoutMs ?? this.config.defaultTimeout,
          retryableStatuses: this.config.retryableStatuses,
          onRetry: ({ attempt, maxRetries, delayMs, reason }) => {
            logger.debug('Retrying request', {
              provider: this.config.providerName,
              operation,
              attempt,
              maxRetries,
              delayMs,
              reason,
            });
          },
        }
      );

      const latencyMs = Date.now() - startTime;
      const authRejected = response.status === 401 || response.status === 403;
      trackProviderRequest({
        provider: this.config.providerName,
        operation,
        status: response.ok ? 'success' : authRejected ? 'auth_rejected' : 'error',
        errorType: response.ok ? undefined : `HTTP_${response.status}`,
        latencyMs,
      }, context);

      if (response.ok) {
        logger.debug('HTTP request success', { provider: this.config.providerName, operation, latencyMs });
      } else {
        logger.warn('HTTP request failed', {
          provider: this.config.providerName,
          operation,
          status: response.status,
          latencyMs,
        });
      }

      return response;
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      const timedOut = error instanceof TimeoutError;
      trackProviderRequest({
        provider: this.config.providerName,
        operation,
        status: timedOut ? 'timeout' : 'error',
        errorType: timedOut ? 'TIMEOUT' : 'FETCH_ERROR',
        latencyMs,
      }, context);
      logger.warn(timedOut ? 'Request timeout' : 'Fetch error', {
        provider: this.config.providerName,
        operation,
        error: error instanceof Error ? error.message : String(error),
        latencyMs,
      });
      throw new NetworkFailureError(target, error);
    }
  }

  /**
   * GET, parse and validate JSON
   *
   * Returns `null` on any failure (HTTP error, timeout, rate-limit timeout,
   * parse error, unexpected shape); every failure is logged through context.logger.
   */
  async fetchJSON<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions,
    context: ServiceContext
  ): Promise<T | null> {
    const response = await this.safeRequest('GET', url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    }, context);
    if (!response) return null;

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (parseError) {
      context.logger.error('JSON parse error', {
        provider: this.config.providerName,
        operation: this.extractOperation(url),
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return null;
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      context.logger.warn('Unexpected response shape', {
        provider: this.config.providerName,
        operation: this.extractOperation(url),
        issues: parsed.error.issues.slice(0, 3).map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  /**
   * GET a page body as text; `null` on any failure
   */
  async fetchText(url: string, options: RequestOptions, context: ServiceContext): Promise<string | null> {
    const response = await this.safeRequest('GET', url, {
      ...options,
      headers: { Accept: 'text/html,application/xhtml+xml,*/*;q=0.8', ...options.headers },
    }, context);
    if (!response) return null;

    try {
      return await response.text();
    } catch (error) {
      context.logger.warn('Body read failed', {
        provider: this.config.providerName,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async safeRequest(
    method: 'GET' | 'POST',
    url: string,
    options: RequestOptions,
    context: ServiceContext
  ): Promise<Response | null> {
    try {
      const response = await this.request(method, url, options, context);
      if (!response.ok) {
        await response.body?.cancel();
        return null;
      }
      return response;
    } catch (error) {
      if (error instanceof NetworkFailureError || error instanceof RateLimitTimeoutError) {
        return null;
      }
      throw error;
    }
  }

  private buildUrl(url: string, query?: RequestOptions['query']): string {
    if (!query) return url;
    const target = new URL(url);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) target.searchParams.set(key, String(value));
    }
    return target.toString();
  }

  /**
   * Last path segment of the URL, used as the operation name in events
   */
  private extractOperation(url: string): string {
    try {
      const segments = new URL(url).pathname.split('/').filter(Boolean);
      return segments.length > 0 ? segments[segments.length - 1].toLowerCase() : 'fetch';
    } catch {
      return 'fetch';
    }
  }
}
