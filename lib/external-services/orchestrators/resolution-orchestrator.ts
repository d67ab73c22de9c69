/**
 * Resolution Orchestrator
 *
 * Turns a (title, year, media type, IMDB id?) query into a cached record.
 *
 * Stage order per lookup:
 *
 *   CacheCheck → PrimarySearch → [AuthRetry] → AlternateTitleSearch → WebFallback → Persist
 *
 * - The first stage with an accepted candidate wins; later stages are skipped.
 * - A failing stage is a miss for that stage, never an aborted lookup.
 * - Persist always runs, so a repeated query inside the TTL never reaches the network.
 * - An auth rejection gets one credential refresh and one retry per lookup.
 * - A caller signal is honoured at stage boundaries; an abandoned lookup persists nothing.
 *
 * @module lib/external-services/orchestrators/resolution-orchestrator
 */

import type {
  AcceptedCandidate,
  IAlternateTitleProvider,
  IPrimarySearchProvider,
  IWebFallbackProvider,
  LookupRequest,
} from '../capabilities.js';
import type { ServiceContext } from '../service-context.js';
import type { CacheRecord, LookupMethod } from '../../cache/cache-record.js';
import { trackLookupOutcome } from '../analytics.js';
import { LookupAbortedError, errorMessage } from '../errors.js';
import { buildLookupKey, isValidImdbId, type LookupQuery } from '../../utils/lookup-key.js';
import { titlesMatch } from '../../utils/string-similarity.js';

// =================================================================================
// Types
// =================================================================================

/**
 * Cache operations the orchestrator needs ({@link DiskCache} satisfies it)
 */
export interface RecordStore {
  read(key: string): Promise<CacheRecord | null>;
  findByTitleYear(key: string): Promise<CacheRecord | null>;
  write(key: string, record: CacheRecord): Promise<boolean>;
}

/**
 * ({@link CredentialManager} satisfies it)
 */
export interface CredentialRefresher {
  forceRefresh(context: ServiceContext): Promise<boolean>;
}

export interface ResolutionDependencies {
  cache: RecordStore;
  credentials: CredentialRefresher;
  primary: IPrimarySearchProvider;
  alternateTitles?: IAlternateTitleProvider;
  webFallback?: IWebFallbackProvider;
}

export interface ResolutionConfig {
  /** Alternate titles retried against the primary search (default: 5) */
  maxAlternateTitles?: number;

  /** Clock for record timestamps */
  now?: () => Date;
}

type Stage = 'cache' | 'poms' | 'poms_auth_retry' | 'tmdb_alt' | 'web';

/**
 * Mutable state of one lookup
 */
interface LookupState {
  stages: Stage[];
  authRetryUsed: boolean;
  discoveredExternalId: string | null;
  /** Every alternate title fetched, also handed to the web fallback */
  alternateTitles: string[];
}

interface Resolution {
  accepted: AcceptedCandidate;
  method: LookupMethod;
  matchedTitle: string | null;
}

// =================================================================================
// Resolution Orchestrator
// =================================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new ResolutionOrchestrator({ cache, credentials, primary, alternateTitles, webFallback });
 * const record = await orchestrator.resolve(
 *   { title: 'Apocalypse Now', year: 1979, mediaType: 'film' },
 *   createServiceContext(logger)
 * );
 * ```
 */
export class ResolutionOrchestrator {
  private readonly config: Required<ResolutionConfig>;

  constructor(
    private readonly deps: ResolutionDependencies,
    config: ResolutionConfig = {}
  ) {
    this.config = {
      maxAlternateTitles: config.maxAlternateTitles ?? 5,
      now: config.now ?? (() => new Date()),
    };
  }

  /**
   * Resolve a query to a found or not_found record
   *
   * @throws {LookupAbortedError} only when `context.signal` aborted the lookup
   */
  async resolve(query: LookupQuery, context: ServiceContext): Promise<CacheRecord> {
    const { logger } = context;
    const startTime = Date.now();
    const request = this.toRequest(query, context);
    const key = buildLookupKey(request);
    const state: LookupState = { stages: [], authRetryUsed: false, discoveredExternalId: null, alternateTitles: [] };

    try {
      this.checkAbort('cache', context);
      state.stages.push('cache');
      const cached = await this.readCache(key, context);
      if (cached) {
        trackLookupOutcome({
          status: 'cache_hit',
          method: cached.lookup_method ?? undefined,
          stages: state.stages.join('→'),
          totalLatencyMs: Date.now() - startTime,
        }, context);
        return cached;
      }

      logger.info('Starting resolution', {
        key,
        title: request.title,
        year: request.year,
        mediaType: request.mediaType,
        externalId: request.externalId,
      });

      const resolution = await this.runStages(request, state, context);

      this.checkAbort('persist', context);
      const record = this.toRecord(key, request, resolution, state);
      const written = await this.deps.cache.write(key, record);
      if (!written) {
        logger.warn('Resolution not persisted', { key });
      }

      const totalLatencyMs = Date.now() - startTime;
      logger.info(resolution ? 'Resolution found' : 'Resolution not found', {
        key,
        method: resolution?.method,
        title: record.title,
        year: record.year,
        stages: state.stages.join('→'),
        totalLatencyMs,
      });
      trackLookupOutcome({
        status: record.status,
        method: resolution?.method,
        stages: state.stages.join('→'),
        totalLatencyMs,
      }, context);

      return record;
    } catch (error) {
      if (error instanceof LookupAbortedError) {
        logger.info('Lookup abandoned', { key, stage: error.stage, stages: state.stages.join('→') });
        trackLookupOutcome({
          status: 'aborted',
          stages: state.stages.join('→'),
          totalLatencyMs: Date.now() - startTime,
        }, context);
      }
      throw error;
    }
  }

  // =================================================================================
  // Stages
  // =================================================================================

  private async runStages(
    request: LookupRequest,
    state: LookupState,
    context: ServiceContext
  ): Promise<Resolution | null> {
    this.checkAbort('poms', context);
    state.stages.push('poms');
    const primary = await this.searchPrimary(request, state, context);
    if (primary) return { accepted: primary, method: 'poms', matchedTitle: null };

    const viaAlternate = await this.searchAlternateTitles(request, state, context);
    if (viaAlternate) return viaAlternate;

    const web = this.deps.webFallback;
    if (web?.isAvailable()) {
      this.checkAbort('web', context);
      state.stages.push('web');
      try {
        const accepted = await web.searchWeb(request, state.alternateTitles, context);
        if (accepted) return { accepted, method: 'web', matchedTitle: null };
      } catch (error) {
        context.logger.error('Web fallback stage failed', { error: errorMessage(error) });
      }
    }

    return null;
  }

  /**
   * Primary search with the one-shot refresh-and-retry on auth rejection
   */
  private async searchPrimary(
    request: LookupRequest,
    state: LookupState,
    context: ServiceContext
  ): Promise<AcceptedCandidate | null> {
    const { logger } = context;

    try {
      let result = await this.deps.primary.search(request, context);

      if (result.status === 'auth_rejected' && !state.authRetryUsed) {
        state.authRetryUsed = true;
        logger.warn('Primary search rejected credentials, refreshing', { title: request.title });

        const refreshed = await this.deps.credentials.forceRefresh(context);
        if (!refreshed) {
          logger.error('Credential refresh failed, primary search gives up for this lookup');
          return null;
        }

        this.checkAbort('poms_auth_retry', context);
        state.stages.push('poms_auth_retry');
        result = await this.deps.primary.search(request, context);
      }

      switch (result.status) {
        case 'matched':
          return result.match;
        case 'auth_rejected':
          logger.error('Primary search still rejected after credential refresh', {
            title: request.title,
            error: result.error.message,
          });
          return null;
        case 'unavailable':
          logger.warn('Primary search unavailable', { title: request.title, reason: result.reason });
          return null;
        case 'no_match':
          logger.debug('Primary search found no match', {
            title: request.title,
            candidatesSeen: result.candidatesSeen,
          });
          return null;
      }
    } catch (error) {
      if (error instanceof LookupAbortedError) throw error;
      logger.error('Primary search failed', { title: request.title, error: errorMessage(error) });
      return null;
    }
  }

  private async searchAlternateTitles(
    request: LookupRequest,
    state: LookupState,
    context: ServiceContext
  ): Promise<Resolution | null> {
    const provider = this.deps.alternateTitles;
    if (!provider?.isAvailable()) {
      context.logger.debug('Alternate-title resolver not configured, skipping');
      return null;
    }

    this.checkAbort('tmdb_alt', context);
    state.stages.push('tmdb_alt');

    try {
      state.alternateTitles = await this.fetchAlternateTitles(provider, request, state, context);
    } catch (error) {
      context.logger.error('Alternate-title lookup failed', { title: request.title, error: errorMessage(error) });
      return null;
    }

    const candidates = state.alternateTitles
      .filter(title => !titlesMatch(title, request.title))
      .slice(0, this.config.maxAlternateTitles);

    for (const alternate of candidates) {
      this.checkAbort('tmdb_alt', context);
      context.logger.info('Trying alternate title', { title: request.title, alternate });

      const accepted = await this.searchPrimary({ ...request, title: alternate }, state, context);
      if (accepted) {
        return { accepted, method: 'tmdb_alt', matchedTitle: alternate };
      }
    }

    return null;
  }

  private async fetchAlternateTitles(
    provider: IAlternateTitleProvider,
    request: LookupRequest,
    state: LookupState,
    context: ServiceContext
  ): Promise<string[]> {
    let externalId = request.externalId;

    if (!externalId) {
      externalId = await provider.findExternalId(request.title, request.year, request.mediaType, context);
      if (!externalId) return [];
      state.discoveredExternalId = externalId;
    }

    return provider.alternateTitles(externalId, request.mediaType, context);
  }

  // =================================================================================
  // Helpers
  // =================================================================================

  private toRequest(query: LookupQuery, context: ServiceContext): LookupRequest {
    let externalId: string | null = null;
    if (query.externalId) {
      if (isValidImdbId(query.externalId)) {
        externalId = query.externalId.toLowerCase();
      } else {
        context.logger.warn('Ignoring malformed IMDB id', { externalId: query.externalId });
      }
    }

    return {
      title: query.title.trim(),
      year: query.year ?? null,
      mediaType: query.mediaType,
      externalId,
    };
  }

  /**
   * Exact key first, then the same title/year stored under an external id.
   * A failing cache read is a miss.
   */
  private async readCache(key: string, context: ServiceContext): Promise<CacheRecord | null> {
    try {
      return (await this.deps.cache.read(key)) ?? (await this.deps.cache.findByTitleYear(key));
    } catch (error) {
      context.logger.error('Cache read failed, treating as miss', { key, error: errorMessage(error) });
      return null;
    }
  }

  private checkAbort(stage: string, context: ServiceContext): void {
    if (context.signal?.aborted) {
      throw new LookupAbortedError(stage);
    }
  }

  private toRecord(
    key: string,
    request: LookupRequest,
    resolution: Resolution | null,
    state: LookupState
  ): CacheRecord {
    const now = this.config.now().toISOString();
    const discovered = state.discoveredExternalId;

    if (!resolution) {
      return {
        lookup_key: key,
        title: request.title,
        year: request.year,
        description: null,
        source_url: null,
        external_id: request.externalId,
        internal_id: null,
        media_type: request.mediaType,
        status: 'not_found',
        fetched_at: now,
        last_accessed_at: now,
        content_rating: null,
        director: null,
        genres: [],
        appreciation: null,
        lookup_method: null,
        discovered_external_id: discovered,
        matched_title: null,
      };
    }

    const { candidate } = resolution.accepted;
    return {
      lookup_key: key,
      title: candidate.title,
      year: candidate.year,
      description: candidate.description,
      source_url: candidate.url,
      external_id: request.externalId ?? candidate.externalId ?? discovered,
      internal_id: candidate.internalId,
      media_type: candidate.mediaType,
      status: 'found',
      fetched_at: now,
      last_accessed_at: now,
      content_rating: candidate.contentRating,
      director: candidate.director,
      genres: candidate.genres,
      appreciation: candidate.appreciation,
      lookup_method: resolution.method,
      discovered_external_id: discovered,
      matched_title: resolution.matchedTitle,
    };
  }
}
