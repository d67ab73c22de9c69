/**
 * Shared test fixtures: log sinks, contexts, HTTP clients and upstream payloads
 */

import { vi } from 'vitest';
import type { LogSink } from '../../../lib/logger.js';
import type { CacheRecord } from '../../../lib/cache/cache-record.js';
import type { Candidate } from '../../../lib/external-services/capabilities.js';
import { createServiceContext, type ServiceContext } from '../../../lib/external-services/service-context.js';
import type { PipelineEvent } from '../../../lib/external-services/analytics.js';
import { HostRateLimiter } from '../../../lib/external-services/rate-limiter.js';
import { ServiceHttpClient } from '../../../lib/external-services/http-client.js';

export const APOCALYPSE_SYNOPSIS =
  'Kapitein Willard vaart tijdens de oorlog in Vietnam de rivier op om een ontspoorde kolonel te vinden en diens bewind te beëindigen.';

export const DOWNFALL_SYNOPSIS =
  'De laatste dagen van het Derde Rijk in de bunker onder Berlijn, gezien door de ogen van een jonge secretaresse die alles ziet gebeuren.';

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

/**
 * Context with throttling off and an event recorder
 */
export function testContext(options: { signal?: AbortSignal; logger?: LogSink } = {}) {
  const events: PipelineEvent[] = [];
  const logger = options.logger ?? mockLogger();
  const context: ServiceContext = createServiceContext(logger, {
    rateLimitStrategy: 'disabled',
    signal: options.signal,
    onEvent: (event) => events.push(event),
  });
  return { context, events, logger };
}

/**
 * Client without retries, so an error status is final on the first attempt
 */
export function testClient(providerName: string, rateLimiter: HostRateLimiter = new HostRateLimiter({})): ServiceHttpClient {
  return new ServiceHttpClient({
    providerName,
    rateLimiter,
    maxRetries: 0,
    baseDelayMs: 1,
    defaultTimeout: 2000,
  });
}

export function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    title: 'Apocalypse Now',
    year: 1979,
    mediaType: 'film',
    description: APOCALYPSE_SYNOPSIS,
    url: 'https://www.cinema.nl/db/8290-apocalypse-now',
    internalId: '8290',
    externalId: null,
    contentRating: '16',
    director: 'Francis Ford Coppola',
    genres: ['Drama', 'Oorlog'],
    appreciation: 10,
    confidenceSignal: 0,
    ...overrides,
  };
}

export function cacheRecord(overrides: Partial<CacheRecord> = {}): CacheRecord {
  return {
    lookup_key: 'vpro-apocalypse-now-1979-tt0078788-m',
    title: 'Apocalypse Now',
    year: 1979,
    description: APOCALYPSE_SYNOPSIS,
    source_url: 'https://www.cinema.nl/db/8290-apocalypse-now',
    external_id: 'tt0078788',
    internal_id: '8290',
    media_type: 'film',
    status: 'found',
    fetched_at: '2026-01-10T12:00:00.000Z',
    last_accessed_at: '2026-01-10T12:00:00.000Z',
    content_rating: '16',
    director: 'Francis Ford Coppola',
    genres: ['Drama'],
    appreciation: 10,
    lookup_method: 'poms',
    discovered_external_id: null,
    matched_title: null,
    ...overrides,
  };
}

// =================================================================================
// Upstream payloads
// =================================================================================

export interface PomsPageFixture {
  type?: 'MOVIE' | 'SERIES';
  title: string;
  year?: number;
  url?: string;
  description?: string | null;
  director?: string;
  ageRating?: string;
  appreciation?: number;
  genres?: string[];
}

export function pomsPage(page: PomsPageFixture) {
  const relations: Array<{ type: string; value: string }> = [];
  if (page.year !== undefined) relations.push({ type: 'CINEMA_YEAR', value: String(page.year) });
  if (page.director) relations.push({ type: 'CINEMA_DIRECTOR', value: page.director });
  if (page.ageRating) relations.push({ type: 'CINEMA_AGERATING', value: page.ageRating });
  if (page.appreciation !== undefined) relations.push({ type: 'CINEMA_APPRECIATION', value: String(page.appreciation) });

  return {
    type: page.type ?? 'MOVIE',
    title: page.title,
    url: page.url ?? null,
    relations,
    genres: (page.genres ?? []).map(displayName => ({ displayName })),
    paragraphs: page.description === null ? [] : [{ body: page.description ?? APOCALYPSE_SYNOPSIS }],
  };
}

export function pomsSearchResponse(...pages: PomsPageFixture[]) {
  return { items: pages.map(page => ({ result: pomsPage(page) })) };
}

export interface CinemaPageFixture {
  title: string;
  year: number;
  kind?: 'film' | 'serie';
  synopsis?: string;
  imdbId?: string;
  director?: string;
  stars?: number;
  rating?: string;
}

/**
 * A cinema.nl style page: heading, meta line, blockquote synopsis, credits
 */
export function cinemaPageHtml(page: CinemaPageFixture): string {
  const imdb = page.imdbId
    ? `<a href="https://www.imdb.com/title/${page.imdbId}/">IMDb</a>`
    : '';
  return `<!doctype html>
<html>
<head><title>${page.title} | Cinema</title></head>
<body>
  <h1>${page.title}</h1>
  <div class="meta">${page.kind ?? 'film'} • ${page.year} • drama, oorlog • 150 min</div>
  <blockquote>${page.synopsis ?? APOCALYPSE_SYNOPSIS}</blockquote>
  <div class="credits">
    <p>Regie: ${page.director ?? 'Francis Ford Coppola'}</p>
  </div>
  <div class="kijkwijzer">${page.rating ?? '16'}</div>
  <div class="rating">${page.stars ?? 5} van 5 sterren</div>
  ${imdb}
</body>
</html>`;
}
