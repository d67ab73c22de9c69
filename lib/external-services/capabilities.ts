/**
 * Service Provider Framework - Capability Interfaces
 *
 * Each lookup backend implements one capability. The orchestrator only
 * sees these interfaces, so backends can be swapped or mocked freely.
 */

import type { MediaType } from '../utils/lookup-key.js';
import type { ServiceContext } from './service-context.js';
import type { AuthRejectedError } from './errors.js';

export enum ServiceCapability {
  PRIMARY_SEARCH = 'primary-search',
  ALTERNATE_TITLES = 'alternate-titles',
  WEB_FALLBACK = 'web-fallback',
}

/**
 * Base capability interface - all providers implement at minimum
 */
export interface IServiceProvider {
  /** Provider name (e.g., 'poms', 'tmdb') */
  readonly name: string;

  readonly capabilities: ServiceCapability[];

  /**
   * Whether the provider can be used (API key configured, breaker closed, ...)
   */
  isAvailable(): boolean;
}

/**
 * Normalized query handed to every backend
 */
export interface LookupRequest {
  title: string;
  year: number | null;
  mediaType: MediaType;
  /** IMDB id, already validated */
  externalId: string | null;
}

/**
 * Unconfirmed match proposal from any backend
 *
 * Never persisted directly; promoted to a cache record after acceptance.
 */
export interface Candidate {
  title: string;
  year: number | null;
  mediaType: MediaType;
  description: string | null;
  url: string | null;
  /** Backend-native id (cinema database id) */
  internalId: string | null;
  /** IMDB id, when the backend exposes one */
  externalId: string | null;
  contentRating: string | null;
  director: string | null;
  genres: string[];
  /** Critic appreciation on a 1-10 scale */
  appreciation: number | null;
  /** Title similarity to the query, 0-1; filled in by the matcher */
  confidenceSignal: number;
}

export type MatchType = 'exact' | 'title' | 'fuzzy' | 'imdb';

export interface AcceptedCandidate {
  candidate: Candidate;
  matchType: MatchType;
}

export type PrimarySearchResult =
  | { status: 'matched'; match: AcceptedCandidate }
  | { status: 'no_match'; candidatesSeen: number }
  | { status: 'auth_rejected'; error: AuthRejectedError }
  | { status: 'unavailable'; reason: string };

/**
 * Authenticated search against the primary film database
 */
export interface IPrimarySearchProvider extends IServiceProvider {
  /**
   * Search and apply the acceptance policy
   *
   * Authentication rejections are reported, not retried here: the caller
   * owns the refresh-and-retry decision.
   */
  search(request: LookupRequest, context: ServiceContext): Promise<PrimarySearchResult>;

  /**
   * Every parsed candidate with a usable description, unfiltered by the policy
   */
  searchMany(request: LookupRequest, context: ServiceContext): Promise<Candidate[]>;
}

/**
 * Alternate-language titles from a secondary metadata service
 *
 * Supplies titles only; acceptance stays with the primary provider's policy.
 */
export interface IAlternateTitleProvider extends IServiceProvider {
  alternateTitles(externalId: string, mediaType: MediaType, context: ServiceContext): Promise<string[]>;

  findExternalId(
    title: string,
    year: number | null,
    mediaType: MediaType,
    context: ServiceContext
  ): Promise<string | null>;
}

/**
 * Search-engine-mediated discovery plus page scrape
 */
export interface IWebFallbackProvider extends IServiceProvider {
  /**
   * @param alternateTitles - titles already known for the work, accepted as matches too
   * @returns an accepted candidate, or null on a hard miss
   */
  searchWeb(
    request: LookupRequest,
    alternateTitles: string[],
    context: ServiceContext
  ): Promise<AcceptedCandidate | null>;
}
