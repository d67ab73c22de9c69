import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { CacheRecord } from '../../../cache/cache-record.js';
import {
  ServiceCapability,
  type AcceptedCandidate,
  type Candidate,
  type IAlternateTitleProvider,
  type IPrimarySearchProvider,
  type IWebFallbackProvider,
  type LookupRequest,
  type PrimarySearchResult,
} from '../../capabilities.js';
import { AuthRejectedError, LookupAbortedError } from '../../errors.js';
import { ResolutionOrchestrator, type RecordStore, type ResolutionDependencies } from '../resolution-orchestrator.js';
import {
  APOCALYPSE_SYNOPSIS,
  DOWNFALL_SYNOPSIS,
  cacheRecord,
  candidate,
  testContext,
} from '../../../../src/__tests__/mocks/fixtures.js';

const NOW = new Date('2026-03-01T09:00:00.000Z');
const NOW_ISO = '2026-03-01T09:00:00.000Z';

const DOWNFALL_QUERY = { title: 'Downfall', year: 2004, mediaType: 'film' as const };
const derUntergang = candidate({
  title: 'Der Untergang',
  year: 2004,
  description: DOWNFALL_SYNOPSIS,
  url: 'https://www.cinema.nl/db/777-der-untergang',
  internalId: '777',
  director: 'Oliver Hirschbiegel',
  genres: ['Drama'],
});

// =================================================================================
// Fakes
// =================================================================================

class MemoryStore implements RecordStore {
  readonly records = new Map<string, CacheRecord>();
  readonly read = vi.fn(async (key: string): Promise<CacheRecord | null> => this.records.get(key) ?? null);
  readonly findByTitleYear = vi.fn(async (_key: string): Promise<CacheRecord | null> => null);
  readonly write = vi.fn(async (key: string, record: CacheRecord): Promise<boolean> => {
    this.records.set(key, record);
    return true;
  });
}

const matched = (accepted: Candidate, matchType: AcceptedCandidate['matchType'] = 'exact'): PrimarySearchResult => ({
  status: 'matched',
  match: { candidate: { ...accepted, confidenceSignal: 1 }, matchType },
});
const noMatch: PrimarySearchResult = { status: 'no_match', candidatesSeen: 0 };
const rejected = (): PrimarySearchResult => ({ status: 'auth_rejected', error: new AuthRejectedError(401) });

function fakePrimary(answer: (request: LookupRequest) => PrimarySearchResult | Promise<PrimarySearchResult>) {
  return {
    name: 'poms',
    capabilities: [ServiceCapability.PRIMARY_SEARCH],
    isAvailable: () => true,
    search: vi.fn(async (request: LookupRequest) => answer(request)),
    searchMany: vi.fn(async (): Promise<Candidate[]> => []),
  } satisfies IPrimarySearchProvider;
}

function fakeAlternates(titles: string[], discoveredId: string | null = 'tt0363163') {
  return {
    name: 'tmdb',
    capabilities: [ServiceCapability.ALTERNATE_TITLES],
    isAvailable: () => true,
    alternateTitles: vi.fn(async (): Promise<string[]> => titles),
    findExternalId: vi.fn(async (): Promise<string | null> => discoveredId),
  } satisfies IAlternateTitleProvider;
}

function fakeWeb(result: AcceptedCandidate | null) {
  return {
    name: 'web-fallback',
    capabilities: [ServiceCapability.WEB_FALLBACK],
    isAvailable: () => true,
    searchWeb: vi.fn(async (): Promise<AcceptedCandidate | null> => result),
  } satisfies IWebFallbackProvider;
}

describe('ResolutionOrchestrator', () => {
  let store: MemoryStore;
  let credentials: { forceRefresh: Mock<(context: unknown) => Promise<boolean>> };

  const orchestrator = (deps: Partial<ResolutionDependencies> & Pick<ResolutionDependencies, 'primary'>) =>
    new ResolutionOrchestrator({ cache: store, credentials, ...deps }, { now: () => NOW });

  beforeEach(() => {
    store = new MemoryStore();
    credentials = { forceRefresh: vi.fn(async (_context: unknown) => true) };
  });

  // =================================================================================
  // Stage outcomes
  // =================================================================================

  it('persists a primary match with every field', async () => {
    const primary = fakePrimary(() => matched(candidate()));
    const { context, events } = testContext();

    const record = await orchestrator({ primary }).resolve({ title: ' Apocalypse Now ', year: 1979, mediaType: 'film' }, context);

    expect(record).toEqual({
      lookup_key: 'vpro-apocalypse-now-1979-none-m',
      title: 'Apocalypse Now',
      year: 1979,
      description: APOCALYPSE_SYNOPSIS,
      source_url: 'https://www.cinema.nl/db/8290-apocalypse-now',
      external_id: null,
      internal_id: '8290',
      media_type: 'film',
      status: 'found',
      fetched_at: NOW_ISO,
      last_accessed_at: NOW_ISO,
      content_rating: '16',
      director: 'Francis Ford Coppola',
      genres: ['Drama', 'Oorlog'],
      appreciation: 10,
      lookup_method: 'poms',
      discovered_external_id: null,
      matched_title: null,
    });
    expect(store.write).toHaveBeenCalledWith('vpro-apocalypse-now-1979-none-m', record);
    expect(primary.search).toHaveBeenCalledWith(
      { title: 'Apocalypse Now', year: 1979, mediaType: 'film', externalId: null },
      context
    );
    expect(events).toContainEqual(expect.objectContaining({ kind: 'lookup_outcome', status: 'found', method: 'poms', stages: 'cache→poms' }));
  });

  it('retries the primary search under alternate titles', async () => {
    const primary = fakePrimary(request => (request.title === 'Der Untergang' ? matched(derUntergang, 'title') : noMatch));
    const alternateTitles = fakeAlternates(['Downfall', 'La Chute', 'Der Untergang']);
    const { context, events } = testContext();

    const record = await orchestrator({ primary, alternateTitles }).resolve(DOWNFALL_QUERY, context);

    expect(record).toMatchObject({
      lookup_key: 'vpro-downfall-2004-none-m',
      title: 'Der Untergang',
      status: 'found',
      lookup_method: 'tmdb_alt',
      matched_title: 'Der Untergang',
      external_id: 'tt0363163',
      discovered_external_id: 'tt0363163',
    });
    expect(primary.search.mock.calls.map(([request]) => request.title)).toEqual(['Downfall', 'La Chute', 'Der Untergang']);
    expect(alternateTitles.findExternalId).toHaveBeenCalledWith('Downfall', 2004, 'film', context);
    expect(events).toContainEqual(expect.objectContaining({ status: 'found', stages: 'cache→poms→tmdb_alt' }));
  });

  it('uses the caller IMDB id for alternate titles instead of discovering one', async () => {
    const primary = fakePrimary(() => noMatch);
    const alternateTitles = fakeAlternates([]);
    const { context } = testContext();

    const record = await orchestrator({ primary, alternateTitles }).resolve({ ...DOWNFALL_QUERY, externalId: 'TT0363163' }, context);

    expect(alternateTitles.findExternalId).not.toHaveBeenCalled();
    expect(alternateTitles.alternateTitles).toHaveBeenCalledWith('tt0363163', 'film', context);
    expect(record.lookup_key).toBe('vpro-downfall-2004-tt0363163-m');
    expect(record.external_id).toBe('tt0363163');
  });

  it('falls back to the web with the alternate titles it gathered', async () => {
    const primary = fakePrimary(() => noMatch);
    const alternateTitles = fakeAlternates(['La Chute']);
    const webFallback = fakeWeb({ candidate: { ...derUntergang, confidenceSignal: 1 }, matchType: 'title' });
    const { context } = testContext();

    const record = await orchestrator({ primary, alternateTitles, webFallback }).resolve(DOWNFALL_QUERY, context);

    expect(record.lookup_method).toBe('web');
    expect(record.source_url).toBe('https://www.cinema.nl/db/777-der-untergang');
    expect(webFallback.searchWeb).toHaveBeenCalledWith(
      { title: 'Downfall', year: 2004, mediaType: 'film', externalId: null },
      ['La Chute'],
      context
    );
  });

  it('persists not_found when every stage misses', async () => {
    const primary = fakePrimary(() => noMatch);
    const webFallback = fakeWeb(null);
    const { context, events } = testContext();

    const record = await orchestrator({ primary, webFallback }).resolve(DOWNFALL_QUERY, context);

    expect(record).toEqual({
      lookup_key: 'vpro-downfall-2004-none-m',
      title: 'Downfall',
      year: 2004,
      description: null,
      source_url: null,
      external_id: null,
      internal_id: null,
      media_type: 'film',
      status: 'not_found',
      fetched_at: NOW_ISO,
      last_accessed_at: NOW_ISO,
      content_rating: null,
      director: null,
      genres: [],
      appreciation: null,
      lookup_method: null,
      discovered_external_id: null,
      matched_title: null,
    });
    expect(store.write).toHaveBeenCalledTimes(1);
    expect(events).toContainEqual(expect.objectContaining({ status: 'not_found', stages: 'cache→poms→web' }));
  });

  it('treats a throwing stage as a miss', async () => {
    const primary = fakePrimary(() => {
      throw new Error('socket hang up');
    });
    const { context, logger } = testContext();

    const record = await orchestrator({ primary }).resolve(DOWNFALL_QUERY, context);

    expect(record.status).toBe('not_found');
    expect(logger.error).toHaveBeenCalledWith('Primary search failed', { title: 'Downfall', error: 'socket hang up' });
  });

  it('ignores a malformed IMDB id', async () => {
    const primary = fakePrimary(() => noMatch);
    const { context, logger } = testContext();

    const record = await orchestrator({ primary }).resolve({ ...DOWNFALL_QUERY, externalId: 'imdb-123' }, context);

    expect(record.lookup_key).toBe('vpro-downfall-2004-none-m');
    expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed IMDB id', { externalId: 'imdb-123' });
  });

  // =================================================================================
  // Cache
  // =================================================================================

  it('answers a repeated query from the cache without searching', async () => {
    const primary = fakePrimary(() => matched(candidate()));
    const resolver = orchestrator({ primary });
    const query = { title: 'Apocalypse Now', year: 1979, mediaType: 'film' as const };

    const first = await resolver.resolve(query, testContext().context);
    const { context, events } = testContext();
    const second = await resolver.resolve(query, context);

    expect(second).toEqual(first);
    expect(primary.search).toHaveBeenCalledTimes(1);
    expect(store.write).toHaveBeenCalledTimes(1);
    expect(events).toEqual([
      expect.objectContaining({ kind: 'lookup_outcome', status: 'cache_hit', method: 'poms', stages: 'cache' }),
    ]);
  });

  it('answers a cached not_found without searching', async () => {
    const primary = fakePrimary(() => noMatch);
    const resolver = orchestrator({ primary });

    await resolver.resolve(DOWNFALL_QUERY, testContext().context);
    const again = await resolver.resolve(DOWNFALL_QUERY, testContext().context);

    expect(again.status).toBe('not_found');
    expect(primary.search).toHaveBeenCalledTimes(1);
  });

  it('falls back to a record stored under an external id', async () => {
    const stored = cacheRecord();
    store.findByTitleYear.mockResolvedValueOnce(stored);
    const primary = fakePrimary(() => noMatch);

    const record = await orchestrator({ primary }).resolve({ title: 'Apocalypse Now', year: 1979, mediaType: 'film' }, testContext().context);

    expect(record).toBe(stored);
    expect(store.findByTitleYear).toHaveBeenCalledWith('vpro-apocalypse-now-1979-none-m');
    expect(primary.search).not.toHaveBeenCalled();
  });

  it('treats a failing cache read as a miss', async () => {
    store.read.mockRejectedValueOnce(new Error('EIO'));
    const primary = fakePrimary(() => matched(candidate()));

    const record = await orchestrator({ primary }).resolve({ title: 'Apocalypse Now', year: 1979, mediaType: 'film' }, testContext().context);
    expect(record.status).toBe('found');
  });

  it('still returns the record when persisting fails', async () => {
    store.write.mockResolvedValueOnce(false);
    const primary = fakePrimary(() => matched(candidate()));
    const { context, logger } = testContext();

    const record = await orchestrator({ primary }).resolve({ title: 'Apocalypse Now', year: 1979, mediaType: 'film' }, context);

    expect(record.status).toBe('found');
    expect(logger.warn).toHaveBeenCalledWith('Resolution not persisted', { key: 'vpro-apocalypse-now-1979-none-m' });
  });

  // =================================================================================
  // Credential refresh
  // =================================================================================

  it('refreshes credentials once and retries after an auth rejection', async () => {
    let calls = 0;
    const primary = fakePrimary(() => (++calls === 1 ? rejected() : matched(candidate())));
    const { context } = testContext();

    const record = await orchestrator({ primary }).resolve({ title: 'Apocalypse Now', year: 1979, mediaType: 'film' }, context);

    expect(record.lookup_method).toBe('poms');
    expect(credentials.forceRefresh).toHaveBeenCalledTimes(1);
    expect(primary.search).toHaveBeenCalledTimes(2);
  });

  it('gives up on the primary search when the refresh fails', async () => {
    credentials.forceRefresh.mockResolvedValue(false);
    const primary = fakePrimary(() => rejected());
    const { context, logger } = testContext();

    const record = await orchestrator({ primary }).resolve(DOWNFALL_QUERY, context);

    expect(record.status).toBe('not_found');
    expect(primary.search).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Credential refresh failed, primary search gives up for this lookup');
  });

  it('allows only one refresh per lookup', async () => {
    const primary = fakePrimary(() => rejected());
    const alternateTitles = fakeAlternates(['Der Untergang']);
    const { context, logger } = testContext();

    const record = await orchestrator({ primary, alternateTitles }).resolve(DOWNFALL_QUERY, context);

    expect(record.status).toBe('not_found');
    expect(credentials.forceRefresh).toHaveBeenCalledTimes(1);
    expect(primary.search).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith('Primary search still rejected after credential refresh', {
      title: 'Der Untergang',
      error: 'Upstream rejected credentials (HTTP 401)',
    });
  });

  // =================================================================================
  // Abandonment
  // =================================================================================

  it('does nothing for an already abandoned lookup', async () => {
    const controller = new AbortController();
    controller.abort();
    const primary = fakePrimary(() => matched(candidate()));
    const { context, events } = testContext({ signal: controller.signal });

    const error = await orchestrator({ primary }).resolve(DOWNFALL_QUERY, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LookupAbortedError);
    expect(error).toMatchObject({ stage: 'cache' });
    expect(store.read).not.toHaveBeenCalled();
    expect(events).toEqual([expect.objectContaining({ kind: 'lookup_outcome', status: 'aborted', stages: '' })]);
  });

  it('persists nothing when abandoned between stages', async () => {
    const controller = new AbortController();
    const primary = fakePrimary(() => {
      controller.abort();
      return matched(candidate());
    });
    const { context } = testContext({ signal: controller.signal });

    await expect(
      orchestrator({ primary }).resolve({ title: 'Apocalypse Now', year: 1979, mediaType: 'film' }, context)
    ).rejects.toMatchObject({ code: 'LOOKUP_ABORTED', stage: 'persist' });
    expect(store.write).not.toHaveBeenCalled();
  });
});
