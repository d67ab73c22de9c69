// =================================================================================
// Fetch Utilities - Timeout, Retry, and Error Handling for External Calls
// =================================================================================

/**
 * Default timeout for external calls (15 seconds)
 */
export const DEFAULT_TIMEOUT_MS = 15000;

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay for backoff in ms (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay cap in ms (default: 8000) */
  maxDelayMs?: number;
  /** Request timeout in ms (default: 15000) */
  timeoutMs?: number;
  /** HTTP status codes that should be retried */
  retryableStatuses?: number[];
  /** Invoked before each backoff sleep */
  onRetry?: (info: { attempt: number; maxRetries: number; delayMs: number; reason: string }) => void;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'onRetry'>> = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * Custom timeout error
 */
export class TimeoutError extends Error {
  name = 'TimeoutError';
  url: string;
  timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`);
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Fetch with timeout - wraps native fetch with AbortController timeout
 *
 * @throws {TimeoutError} On timeout
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, {
      ...options,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Calculate delay with exponential backoff and jitter
 *
 * @param attempt - Current attempt (0-indexed)
 */
export function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * 0.3 * exponentialDelay; // 0-30% jitter
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

function errorCode(error: Error): unknown {
  if ('code' in error) return error.code;
  if (error.cause instanceof Error && 'code' in error.cause) return error.cause.code;
  return undefined;
}

/**
 * Network-level failures (resets, DNS, timeouts) are retryable.
 * undici reports them as `TypeError: fetch failed` with the system error in `cause`.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TimeoutError) return true;
  const retryableCodes = ['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EAI_AGAIN', 'UND_ERR_SOCKET'];
  const code = errorCode(error);
  if (typeof code === 'string' && retryableCodes.includes(code)) return true;
  return error.name === 'TypeError' && error.message === 'fetch failed';
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Fetch with retry - wraps fetch with exponential backoff retry logic
 *
 * Returns the last response when every attempt produced a retryable status,
 * and rethrows the last error when every attempt failed at the network level.
 */
export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  config: RetryConfig = {}
): Promise<Response> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    timeoutMs = DEFAULT_RETRY_CONFIG.timeoutMs,
    retryableStatuses = DEFAULT_RETRY_CONFIG.retryableStatuses,
    onRetry,
  } = config;

  let lastError: Error | undefined;
  let lastResponse: Response | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let reason: string;
    try {
      const response = await fetchWithTimeout(url, options, timeoutMs);

      if (response.ok || !retryableStatuses.includes(response.status)) {
        return response;
      }

      lastResponse = response;
      lastError = undefined;
      reason = `HTTP ${response.status}`;
    } catch (error) {
      if (!(error instanceof Error) || !isRetryableError(error)) {
        throw error;
      }
      lastError = error;
      lastResponse = undefined;
      reason = error.message;
    }

    // Don't delay after the last attempt
    if (attempt < maxRetries) {
      const delay = calculateBackoff(attempt, baseDelayMs, maxDelayMs);
      onRetry?.({ attempt: attempt + 1, maxRetries, delayMs: Math.round(delay), reason });
      // Discard the body of a response we are not going to use
      await lastResponse?.body?.cancel();
      await sleep(delay);
    }
  }

  if (lastResponse) {
    return lastResponse;
  }

  if (lastError) {
    lastError.message = `Failed after ${maxRetries + 1} attempts: ${lastError.message}`;
    throw lastError;
  }

  throw new Error('Unexpected state: no response or error after retries');
}
