/**
 * POMS Service Provider (NPO/VPRO cinema database)
 *
 * Primary search backend. Requests are signed with HMAC-SHA256 over the
 * origin, the request date, the path and the sorted query parameters:
 *
 *   origin:{origin},x-npo-date:{date},uri:/v1/api/{path},{k1}:{v1},{k2}:{v2}
 *
 * and sent as `Authorization: NPO {key}:{base64 signature}`.
 *
 * Implements:
 * - IPrimarySearchProvider: title → accepted candidate, plus the unfiltered list
 *
 * An auth rejection (401/403) is reported as `auth_rejected`; the
 * orchestrator owns the refresh-and-retry decision.
 *
 * @module lib/external-services/providers/poms-provider
 */

import { createHmac } from 'node:crypto';
import { z } from 'zod';
import type {
  Candidate,
  IPrimarySearchProvider,
  LookupRequest,
  PrimarySearchResult,
} from '../capabilities.js';
import { ServiceCapability } from '../capabilities.js';
import type { ServiceContext } from '../service-context.js';
import type { ServiceHttpClient } from '../http-client.js';
import type { Credentials } from '../credentials/credential-manager.js';
import { DEFAULT_MATCH_POLICY, selectCandidate, type MatchPolicy } from '../candidate-matcher.js';
import { AuthRejectedError, errorMessage } from '../errors.js';
import type { MediaType } from '../../utils/lookup-key.js';
import { cleanDescription } from '../../utils/description.js';
import { similarity, titlesMatch } from '../../utils/string-similarity.js';
import { extractInternalId, type CinemaPageScraper } from './cinema-page-scraper.js';

// =================================================================================
// Constants
// =================================================================================

export const POMS_API_BASE = 'https://rs.poms.omroep.nl/v1/api';
export const POMS_ORIGIN = 'https://www.vprogids.nl';
export const POMS_PROFILE = 'vprocinema';
export const POMS_SEARCH_PATH = 'pages/';
export const POMS_MAX_RESULTS = 10;

/** Pages scraped per search to fill in missing descriptions */
const MAX_DESCRIPTION_SCRAPES = 3;

const POMS_TYPE: Record<MediaType, 'MOVIE' | 'SERIES'> = {
  film: 'MOVIE',
  series: 'SERIES',
};

// =================================================================================
// Types
// =================================================================================

const PomsRelationSchema = z.object({
  type: z.string().optional(),
  value: z.union([z.string(), z.number()]).nullish(),
});

const PomsPageSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  url: z.string().nullish(),
  relations: z.array(PomsRelationSchema).optional(),
  genres: z.array(z.object({ displayName: z.string().nullish() })).optional(),
  paragraphs: z.array(z.object({ body: z.string().nullish() })).optional(),
});

/**
 * Search response: `items[].result` is a page document
 */
const PomsSearchResponseSchema = z.object({
  items: z.array(z.object({ result: PomsPageSchema.optional() })).optional(),
});

export type PomsPage = z.infer<typeof PomsPageSchema>;

/**
 * Anything that can hand out the current key/secret pair
 */
export interface CredentialSource {
  currentCredentials(): Credentials;
}

export interface PomsProviderOptions {
  client: ServiceHttpClient;
  credentials: CredentialSource;
  /** Fills in descriptions the API omits; no fill-in without it */
  pageScraper?: CinemaPageScraper;
  matchPolicy?: Partial<Omit<MatchPolicy, 'allowFuzzy'>>;
  /** Request date header source */
  now?: () => Date;
}

type FetchOutcome =
  | { status: 'ok'; pages: PomsPage[] }
  | { status: 'auth_rejected'; error: AuthRejectedError }
  | { status: 'unavailable'; reason: string };

// =================================================================================
// Signing
// =================================================================================

/**
 * Base64 HMAC-SHA256 signature for a POMS request
 *
 * `iecomp` is a cache-buster and is left out of the signed parameters.
 */
export function signPomsRequest(
  secret: string,
  date: string,
  path: string,
  params: Record<string, string>,
  origin: string = POMS_ORIGIN
): string {
  const paramString = Object.keys(params)
    .filter(key => key !== 'iecomp')
    .sort()
    .map(key => `,${key}:${params[key]}`)
    .join('');
  const cleanPath = path.split('?')[0];
  const message = `origin:${origin},x-npo-date:${date},uri:/v1/api/${cleanPath}${paramString}`;
  return createHmac('sha256', secret).update(message, 'utf8').digest('base64');
}

// =================================================================================
// Parsing
// =================================================================================

/**
 * Page document → candidate; null when the type differs from the one asked for
 *
 * The description is cleaned and validated here; an unusable one comes back null.
 */
export function parsePomsPage(page: PomsPage, mediaType: MediaType): Candidate | null {
  if (page.type !== POMS_TYPE[mediaType]) return null;

  let year: number | null = null;
  let appreciation: number | null = null;
  let director: string | null = null;
  let contentRating: string | null = null;

  for (const relation of page.relations ?? []) {
    const value = relation.value == null ? '' : String(relation.value).trim();
    if (!value) continue;

    switch (relation.type) {
      case 'CINEMA_YEAR':
        year = parseInteger(value) ?? year;
        break;
      case 'CINEMA_DIRECTOR':
        director ??= value;
        break;
      case 'CINEMA_APPRECIATION':
        appreciation = parseInteger(value) ?? appreciation;
        break;
      case 'CINEMA_AGERATING':
        // Kijkwijzer codes arrive as "_16", "AL"
        contentRating ??= value.replace(/^_+/, '');
        break;
    }
  }

  const genres = (page.genres ?? [])
    .map(genre => genre.displayName?.trim() ?? '')
    .filter(Boolean);

  const url = page.url || null;

  return {
    title: page.title?.trim() ?? '',
    year,
    mediaType,
    description: cleanDescription(page.paragraphs?.[0]?.body),
    url,
    internalId: extractInternalId(url),
    externalId: null,
    contentRating,
    director,
    genres,
    appreciation,
    confidenceSignal: 0,
  };
}

function parseInteger(value: string): number | null {
  return /^-?\d+$/.test(value) ? Number(value) : null;
}

// =================================================================================
// POMS Provider
// =================================================================================

export class PomsProvider implements IPrimarySearchProvider {
  readonly name = 'poms';
  readonly capabilities = [ServiceCapability.PRIMARY_SEARCH];

  private readonly client: ServiceHttpClient;
  private readonly credentials: CredentialSource;
  private readonly pageScraper?: CinemaPageScraper;
  private readonly policy: Omit<MatchPolicy, 'allowFuzzy'>;
  private readonly now: () => Date;

  constructor(options: PomsProviderOptions) {
    this.client = options.client;
    this.credentials = options.credentials;
    this.pageScraper = options.pageScraper;
    this.policy = {
      similarityThreshold: options.matchPolicy?.similarityThreshold ?? DEFAULT_MATCH_POLICY.similarityThreshold,
      yearTolerance: options.matchPolicy?.yearTolerance ?? DEFAULT_MATCH_POLICY.yearTolerance,
    };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Always available - credentials fall back to defaults
   */
  isAvailable(): boolean {
    return true;
  }

  async search(request: LookupRequest, context: ServiceContext): Promise<PrimarySearchResult> {
    const { logger } = context;
    const fetched = await this.fetchPages(request, context);
    if (fetched.status !== 'ok') return fetched;

    const candidates = await this.toCandidates(fetched.pages, request, context, candidate =>
      titlesMatch(candidate.title, request.title) ||
      similarity(candidate.title, request.title) >= this.policy.similarityThreshold
    );

    if (candidates.length === 0) {
      logger.debug('POMS: no candidates with a usable description', {
        title: request.title,
        results: fetched.pages.length,
      });
      return { status: 'no_match', candidatesSeen: 0 };
    }

    const match = selectCandidate(
      request,
      candidates,
      { ...this.policy, allowFuzzy: !request.externalId },
      logger
    );
    return match
      ? { status: 'matched', match }
      : { status: 'no_match', candidatesSeen: candidates.length };
  }

  /**
   * Every candidate with a usable description, in API order (manual match selection)
   */
  async searchMany(request: LookupRequest, context: ServiceContext): Promise<Candidate[]> {
    const fetched = await this.fetchPages(request, context);
    if (fetched.status !== 'ok') {
      context.logger.warn('POMS: multi-result search failed', { title: request.title, status: fetched.status });
      return [];
    }
    return this.toCandidates(fetched.pages, request, context, () => true);
  }

  // =================================================================================
  // Internals
  // =================================================================================

  private async fetchPages(request: LookupRequest, context: ServiceContext): Promise<FetchOutcome> {
    const { logger } = context;
    const params = { profile: POMS_PROFILE, max: String(POMS_MAX_RESULTS) };
    const url = `${POMS_API_BASE}/${POMS_SEARCH_PATH}?${new URLSearchParams(params).toString()}`;
    const credentials = this.credentials.currentCredentials();
    const date = this.now().toUTCString();
    const signature = signPomsRequest(credentials.secret, date, POMS_SEARCH_PATH, params);

    try {
      const response = await this.client.post(url, {
        headers: {
          Accept: 'application/json',
          Origin: POMS_ORIGIN,
          'x-npo-date': date,
          Authorization: `NPO ${credentials.key}:${signature}`,
        },
        json: {
          highlight: true,
          searches: { text: request.title },
          facets: { types: { include: POMS_TYPE[request.mediaType] } },
        },
      }, context);

      if (response.status === 401 || response.status === 403) {
        await response.body?.cancel();
        logger.warn('POMS: credentials rejected', { status: response.status, keyPrefix: credentials.key.slice(0, 4) });
        return { status: 'auth_rejected', error: new AuthRejectedError(response.status) };
      }

      if (!response.ok) {
        const snippet = (await response.text()).slice(0, 200);
        logger.error('POMS: API error', { status: response.status, body: snippet });
        return { status: 'unavailable', reason: `HTTP ${response.status}` };
      }

      const parsed = PomsSearchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error('POMS: unexpected response shape', { issue: parsed.error.issues[0]?.message });
        return { status: 'unavailable', reason: 'invalid response' };
      }

      const pages = (parsed.data.items ?? []).flatMap(item => (item.result ? [item.result] : []));
      logger.debug('POMS: search results', { title: request.title, results: pages.length });
      return { status: 'ok', pages };
    } catch (error) {
      logger.error('POMS: request failed', { title: request.title, error: errorMessage(error) });
      return { status: 'unavailable', reason: errorMessage(error) };
    }
  }

  /**
   * Parse, fill in missing descriptions from the cinema page, and drop the rest
   *
   * @param worthScraping - only these candidates may cost a page fetch
   */
  private async toCandidates(
    pages: PomsPage[],
    request: LookupRequest,
    context: ServiceContext,
    worthScraping: (candidate: Candidate) => boolean
  ): Promise<Candidate[]> {
    const parsed = pages.flatMap(page => {
      const candidate = parsePomsPage(page, request.mediaType);
      return candidate && candidate.title ? [candidate] : [];
    });

    let scrapes = 0;
    const usable: Candidate[] = [];

    for (const candidate of parsed) {
      if (candidate.description) {
        usable.push(candidate);
        continue;
      }

      if (!this.pageScraper || !candidate.url || scrapes >= MAX_DESCRIPTION_SCRAPES || !worthScraping(candidate)) {
        continue;
      }

      scrapes++;
      const scraped = await this.pageScraper.scrape(candidate.url, context);
      if (scraped?.description) {
        context.logger.info('POMS: description filled from page', { title: candidate.title, url: scraped.url });
        usable.push({
          ...candidate,
          description: scraped.description,
          externalId: candidate.externalId ?? scraped.externalId,
          contentRating: candidate.contentRating ?? scraped.contentRating,
        });
      }
    }

    return usable;
  }
}
