/**
 * Service Context
 *
 * Unified context passed to every provider call within one lookup.
 * Carries the request-scoped logger, the event hook, and tracing metadata.
 */

import type { LogSink } from '../logger.js';
import type { PipelineEvent } from './analytics.js';

/**
 * Rate limit enforcement strategy
 * - 'enforce': Wait until the host bucket allows (default)
 * - 'disabled': Skip throttling (tests, one-off admin calls)
 */
export type RateLimitStrategy = 'enforce' | 'disabled';

export interface ServiceContext {
  /** Structured logger for consistent logging */
  logger: LogSink;

  /** Rate limit enforcement strategy (default 'enforce') */
  rateLimitStrategy?: RateLimitStrategy;

  /** Per-request timeout override in milliseconds */
  timeoutMs?: number;

  /**
   * Caller-side abandonment. Checked between lookup stages only;
   * HTTP calls already in flight run to completion.
   */
  signal?: AbortSignal;

  /** Receives provider and lookup events; formatting is up to the receiver */
  onEvent?: (event: PipelineEvent) => void;

  /** Request-specific metadata for tracing/debugging */
  metadata?: Record<string, unknown>;
}

export function createServiceContext(
  logger: LogSink,
  options?: Omit<ServiceContext, 'logger'>
): ServiceContext {
  return {
    logger,
    rateLimitStrategy: options?.rateLimitStrategy ?? 'enforce',
    timeoutMs: options?.timeoutMs,
    signal: options?.signal,
    onEvent: options?.onEvent,
    metadata: options?.metadata,
  };
}
