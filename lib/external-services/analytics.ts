/**
 * Pipeline event instrumentation
 *
 * Providers and the orchestrator emit events through the service context;
 * {@link LookupMetrics} is the in-process receiver the server wires up.
 *
 * @module external-services/analytics
 */

import type { ServiceContext } from './service-context.js';

/**
 * Individual provider HTTP request
 */
export interface ProviderRequestEvent {
  kind: 'provider_request';
  /** Provider name (poms, tmdb, web-fallback, credentials) */
  provider: string;
  /** Specific operation (search, find, alternative_titles, ...) */
  operation: string;
  status: 'success' | 'error' | 'timeout' | 'auth_rejected' | 'rate_limited';
  /** HTTP status code or error class when status is not success */
  errorType?: string;
  latencyMs: number;
}

/**
 * Outcome of one resolve() call
 */
export interface LookupOutcomeEvent {
  kind: 'lookup_outcome';
  status: 'cache_hit' | 'found' | 'not_found' | 'aborted';
  /** Stage that produced the accepted candidate */
  method?: 'poms' | 'tmdb_alt' | 'web';
  /** Stages entered, e.g. 'poms→tmdb_alt→web' */
  stages: string;
  totalLatencyMs: number;
}

export type PipelineEvent = ProviderRequestEvent | LookupOutcomeEvent;

type WithoutKind<T> = Omit<T, 'kind'>;

/**
 * Emit a provider request event. A throwing receiver is logged, never propagated.
 */
export function trackProviderRequest(event: WithoutKind<ProviderRequestEvent>, context: ServiceContext): void {
  emit({ kind: 'provider_request', ...event }, context);
}

export function trackLookupOutcome(event: WithoutKind<LookupOutcomeEvent>, context: ServiceContext): void {
  emit({ kind: 'lookup_outcome', ...event }, context);
}

function emit(event: PipelineEvent, context: ServiceContext): void {
  if (!context.onEvent) return;
  try {
    context.onEvent(event);
  } catch (error) {
    context.logger.warn('Event receiver failed', {
      kind: event.kind,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export interface ProviderCounters {
  requests: number;
  errors: number;
  totalLatencyMs: number;
}

export interface MetricsSnapshot {
  lookups: Record<LookupOutcomeEvent['status'], number>;
  methods: Record<NonNullable<LookupOutcomeEvent['method']>, number>;
  providers: Record<string, ProviderCounters & { avgLatencyMs: number }>;
  since: string;
}

/**
 * In-memory counters over pipeline events
 */
export class LookupMetrics {
  private readonly lookups: MetricsSnapshot['lookups'] = { cache_hit: 0, found: 0, not_found: 0, aborted: 0 };
  private readonly methods: MetricsSnapshot['methods'] = { poms: 0, tmdb_alt: 0, web: 0 };
  private readonly providers = new Map<string, ProviderCounters>();
  private readonly since = new Date().toISOString();

  /** Bound so it can be handed out directly as `onEvent` */
  readonly record = (event: PipelineEvent): void => {
    if (event.kind === 'lookup_outcome') {
      this.lookups[event.status]++;
      if (event.method) this.methods[event.method]++;
      return;
    }

    const counters = this.providers.get(event.provider) ?? { requests: 0, errors: 0, totalLatencyMs: 0 };
    counters.requests++;
    counters.totalLatencyMs += event.latencyMs;
    if (event.status !== 'success') counters.errors++;
    this.providers.set(event.provider, counters);
  };

  snapshot(): MetricsSnapshot {
    const providers: MetricsSnapshot['providers'] = {};
    for (const [name, counters] of this.providers) {
      providers[name] = {
        ...counters,
        avgLatencyMs: counters.requests ? Math.round(counters.totalLatencyMs / counters.requests) : 0,
      };
    }
    return {
      lookups: { ...this.lookups },
      methods: { ...this.methods },
      providers,
      since: this.since,
    };
  }
}
