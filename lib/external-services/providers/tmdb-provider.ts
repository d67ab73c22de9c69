/**
 * TMDB Service Provider
 *
 * Supplies alternate-language titles for a work so the primary search can be
 * retried under them. It never decides acceptance itself.
 *
 * Implements:
 * - IAlternateTitleProvider: IMDB id → prioritized titles, title/year → IMDB id
 *
 * Title priority: original title, then titles released in FR, NL, BE and DE
 * (the markets the cinema database files films under), then everything else.
 *
 * @see https://developer.themoviedb.org/reference/intro/getting-started
 * @module lib/external-services/providers/tmdb-provider
 */

import { z } from 'zod';
import type { IAlternateTitleProvider } from '../capabilities.js';
import { ServiceCapability } from '../capabilities.js';
import type { ServiceContext } from '../service-context.js';
import type { ServiceHttpClient } from '../http-client.js';
import { isValidImdbId, type MediaType } from '../../utils/lookup-key.js';

// =================================================================================
// Constants
// =================================================================================

export const TMDB_API_BASE = 'https://api.themoviedb.org/3';

export const PREFERRED_COUNTRIES = ['FR', 'NL', 'BE', 'DE'] as const;

const TMDB_PATH: Record<MediaType, 'movie' | 'tv'> = {
  film: 'movie',
  series: 'tv',
};

// =================================================================================
// Types
// =================================================================================

const TmdbFindSchema = z.object({
  movie_results: z.array(z.object({ id: z.number() })).optional(),
  tv_results: z.array(z.object({ id: z.number() })).optional(),
});

const TmdbDetailsSchema = z.object({
  original_title: z.string().nullish(),
  original_name: z.string().nullish(),
});

const TmdbAlternativeTitleSchema = z.object({
  iso_3166_1: z.string().nullish(),
  title: z.string().nullish(),
});

/** Movies answer with `titles`, TV shows with `results` */
const TmdbAlternativeTitlesSchema = z.object({
  titles: z.array(TmdbAlternativeTitleSchema).optional(),
  results: z.array(TmdbAlternativeTitleSchema).optional(),
});

const TmdbSearchSchema = z.object({
  results: z.array(z.object({
    id: z.number(),
    release_date: z.string().nullish(),
    first_air_date: z.string().nullish(),
  })).optional(),
});

const TmdbExternalIdsSchema = z.object({
  imdb_id: z.string().nullish(),
});

export interface TmdbProviderOptions {
  client: ServiceHttpClient;
  apiKey?: string;
}

// =================================================================================
// TMDB Provider
// =================================================================================

export class TmdbProvider implements IAlternateTitleProvider {
  readonly name = 'tmdb';
  readonly capabilities = [ServiceCapability.ALTERNATE_TITLES];

  private readonly client: ServiceHttpClient;
  private readonly apiKey?: string;

  constructor(options: TmdbProviderOptions) {
    this.client = options.client;
    this.apiKey = options.apiKey || undefined;
  }

  /**
   * Requires TMDB_API_KEY
   */
  isAvailable(): boolean {
    return !!this.apiKey;
  }

  /**
   * Prioritized, case-insensitively unique titles for an IMDB id
   */
  async alternateTitles(externalId: string, mediaType: MediaType, context: ServiceContext): Promise<string[]> {
    const { logger } = context;
    if (!this.isAvailable()) {
      logger.debug('TMDB API key not configured, skipping alternate titles');
      return [];
    }

    const tmdbId = await this.findTmdbId(externalId, mediaType, context);
    if (tmdbId === null) {
      logger.debug('TMDB: no entry for IMDB id', { externalId, mediaType });
      return [];
    }

    const titles = await this.prioritizedTitles(tmdbId, mediaType, context);
    logger.info('TMDB: alternate titles', {
      externalId,
      count: titles.length,
      first: titles.slice(0, 5),
    });
    return titles;
  }

  /**
   * IMDB id for a title, preferring the result released in the given year
   */
  async findExternalId(
    title: string,
    year: number | null,
    mediaType: MediaType,
    context: ServiceContext
  ): Promise<string | null> {
    if (!this.isAvailable()) return null;

    const kind = TMDB_PATH[mediaType];
    const search = await this.get(
      `/search/${kind}`,
      TmdbSearchSchema,
      context,
      kind === 'movie' ? { query: title, year: year ?? undefined } : { query: title, first_air_date_year: year ?? undefined }
    );
    const results = search?.results ?? [];
    if (results.length === 0) {
      context.logger.debug('TMDB: title search found nothing', { title, year });
      return null;
    }

    const releaseYear = (date: string | null | undefined): number | null =>
      date && /^\d{4}/.test(date) ? Number(date.slice(0, 4)) : null;

    const best =
      (year !== null && results.find(result => releaseYear(result.release_date ?? result.first_air_date) === year)) ||
      results[0];

    const ids = await this.get(`/${kind}/${best.id}/external_ids`, TmdbExternalIdsSchema, context);
    const imdbId = ids?.imdb_id ?? null;

    if (!isValidImdbId(imdbId)) {
      context.logger.debug('TMDB: result has no IMDB id', { title, tmdbId: best.id });
      return null;
    }

    context.logger.info('TMDB: discovered IMDB id', { title, year, imdbId });
    return imdbId.toLowerCase();
  }

  // =================================================================================
  // Internals
  // =================================================================================

  private async findTmdbId(externalId: string, mediaType: MediaType, context: ServiceContext): Promise<number | null> {
    const found = await this.get(`/find/${encodeURIComponent(externalId)}`, TmdbFindSchema, context, {
      external_source: 'imdb_id',
    });
    if (!found) return null;

    const results = mediaType === 'series' ? found.tv_results : found.movie_results;
    return results?.[0]?.id ?? null;
  }

  private async prioritizedTitles(tmdbId: number, mediaType: MediaType, context: ServiceContext): Promise<string[]> {
    const kind = TMDB_PATH[mediaType];
    const details = await this.get(`/${kind}/${tmdbId}`, TmdbDetailsSchema, context);
    const alternatives = await this.get(`/${kind}/${tmdbId}/alternative_titles`, TmdbAlternativeTitlesSchema, context);

    const titles: string[] = [];
    const seen = new Set<string>();
    const add = (title: string | null | undefined): void => {
      const trimmed = title?.trim();
      if (!trimmed || seen.has(trimmed.toLowerCase())) return;
      seen.add(trimmed.toLowerCase());
      titles.push(trimmed);
    };

    add(details?.original_title ?? details?.original_name);

    const entries = alternatives?.titles ?? alternatives?.results ?? [];
    for (const country of PREFERRED_COUNTRIES) {
      for (const entry of entries) {
        if (entry.iso_3166_1 === country) add(entry.title);
      }
    }
    for (const entry of entries) add(entry.title);

    return titles;
  }

  private get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    context: ServiceContext,
    query: Record<string, string | number | undefined> = {}
  ): Promise<T | null> {
    return this.client.fetchJSON(`${TMDB_API_BASE}${path}`, schema, {
      query: { ...query, api_key: this.apiKey },
    }, context);
  }
}
