/**
 * Web Fallback Provider
 *
 * Last resort when the API stages miss: ask search engines for cinema
 * database pages, scrape them, and accept the first page that matches.
 *
 * Implements:
 * - IWebFallbackProvider
 *
 * Engines are tried in order. An engine that answers with a bot challenge
 * is dropped for the rest of the lookup. Challenge pages are recognized by
 * DOM signatures only (captcha widgets, challenge forms), never by a
 * keyword in the text, since ordinary result pages mention "captcha" too.
 *
 * @module lib/external-services/providers/web-fallback-provider
 */

import { load } from 'cheerio';
import type { AcceptedCandidate, IWebFallbackProvider, LookupRequest } from '../capabilities.js';
import { ServiceCapability } from '../capabilities.js';
import type { ServiceContext } from '../service-context.js';
import type { ServiceHttpClient } from '../http-client.js';
import { CircuitBreaker } from '../circuit-breaker.js';
import { acceptScrapedCandidate } from '../candidate-matcher.js';
import { BotProtectionDetectedError, errorMessage } from '../errors.js';
import { YEAR_TOLERANCE, normalize } from '../../utils/string-similarity.js';
import { CINEMA_BASE_URL, toCinemaPageUrl, type CinemaPageScraper } from './cinema-page-scraper.js';

// =================================================================================
// Search engines
// =================================================================================

export interface SearchEngine {
  readonly name: string;
  searchUrl(title: string, year: number | null): string;
}

export const DEFAULT_ENGINES: readonly SearchEngine[] = [
  {
    name: 'cinema.nl',
    searchUrl: (title, year) =>
      `${CINEMA_BASE_URL}/zoeken?q=${encodeURIComponent(year ? `${title} ${year}` : title)}&model=cinema`,
  },
  {
    name: 'duckduckgo',
    searchUrl: (title, year) =>
      `https://html.duckduckgo.com/html/?q=${encodeURIComponent(`site:cinema.nl/db "${title}"${year ? ` ${year}` : ''}`)}`,
  },
  {
    name: 'startpage',
    searchUrl: (title, year) =>
      `https://www.startpage.com/sp/search?query=${encodeURIComponent(`site:cinema.nl "${title}"${year ? ` ${year}` : ''}`)}&cat=web&language=dutch`,
  },
];

/**
 * Markup that only appears on challenge pages
 */
export const BOT_PROTECTION_SELECTORS = [
  '.g-recaptcha',
  '.h-captcha',
  '#captcha-form',
  'form[action*="captcha"]',
  '.anomaly-modal',
  '#challenge-form',
  'iframe[src*="recaptcha"]',
  'iframe[src*="hcaptcha"]',
] as const;

export const MAX_PAGES_SCRAPED = 5;
/** The query title plus this many alternate titles are searched */
const MAX_ALTERNATE_SEARCHES = 2;

/**
 * First bot-protection selector present in the page, or null
 */
export function detectBotProtection(html: string): string | null {
  const $ = load(html);
  return BOT_PROTECTION_SELECTORS.find(selector => $(selector).length > 0) ?? null;
}

/**
 * Cinema database page URLs linked from a result page, in page order
 *
 * Relative links resolve against the engine URL; DuckDuckGo's `/l/?uddg=`
 * redirect links are unwrapped.
 */
export function extractTargetUrls(html: string, baseUrl: string): string[] {
  const $ = load(html);
  const urls: string[] = [];

  for (const link of $('a[href]').toArray()) {
    const href = $(link).attr('href');
    if (!href || !URL.canParse(href, baseUrl)) continue;

    const resolved = new URL(href, baseUrl);
    const target = toCinemaPageUrl(resolved.searchParams.get('uddg') ?? resolved.toString());
    if (target && !urls.includes(target)) urls.push(target);
  }
  return urls;
}

// =================================================================================
// Web Fallback Provider
// =================================================================================

export interface WebFallbackProviderOptions {
  client: ServiceHttpClient;
  scraper: CinemaPageScraper;
  breaker?: CircuitBreaker;
  engines?: readonly SearchEngine[];
  yearTolerance?: number;
  enabled?: boolean;
}

export class WebFallbackProvider implements IWebFallbackProvider {
  readonly name = 'web-fallback';
  readonly capabilities = [ServiceCapability.WEB_FALLBACK];

  private readonly client: ServiceHttpClient;
  private readonly scraper: CinemaPageScraper;
  private readonly breaker: CircuitBreaker;
  private readonly engines: readonly SearchEngine[];
  private readonly yearTolerance: number;
  private readonly enabled: boolean;

  constructor(options: WebFallbackProviderOptions) {
    this.client = options.client;
    this.scraper = options.scraper;
    this.breaker = options.breaker ?? new CircuitBreaker({ name: 'web-fallback' });
    this.engines = options.engines ?? DEFAULT_ENGINES;
    this.yearTolerance = options.yearTolerance ?? YEAR_TOLERANCE;
    this.enabled = options.enabled ?? true;
  }

  isAvailable(): boolean {
    return this.enabled && !this.breaker.isOpen();
  }

  get breakerState(): CircuitBreaker['state'] {
    return this.breaker.state;
  }

  async searchWeb(
    request: LookupRequest,
    alternateTitles: string[],
    context: ServiceContext
  ): Promise<AcceptedCandidate | null> {
    const { logger } = context;

    if (!this.isAvailable()) {
      logger.info('Web fallback unavailable, skipping', { enabled: this.enabled, breaker: this.breaker.state });
      return null;
    }

    const blocked = new Set<string>();
    const scraped = new Set<string>();

    try {
      for (const searchTitle of this.searchTitles(request.title, alternateTitles)) {
        for (const engine of this.engines) {
          if (blocked.has(engine.name)) continue;
          if (scraped.size >= MAX_PAGES_SCRAPED) break;

          let urls: string[];
          try {
            urls = await this.searchEngine(engine, searchTitle, request.year, context);
          } catch (error) {
            if (!(error instanceof BotProtectionDetectedError)) throw error;
            blocked.add(engine.name);
            logger.warn('Search engine served a bot challenge, dropping it for this lookup', {
              engine: error.engine,
              signature: error.signature,
            });
            continue;
          }

          for (const url of urls) {
            if (scraped.has(url)) continue;
            if (scraped.size >= MAX_PAGES_SCRAPED) break;
            scraped.add(url);

            const accepted = await this.tryPage(url, request, alternateTitles, context);
            if (accepted) {
              this.breaker.recordSuccess();
              logger.info('Web fallback match', {
                engine: engine.name,
                title: accepted.candidate.title,
                year: accepted.candidate.year,
                matchType: accepted.matchType,
              });
              return accepted;
            }
          }
        }
      }

      logger.info('Web fallback found no match', {
        title: request.title,
        pagesScraped: scraped.size,
        blockedEngines: [...blocked],
      });
      this.breaker.recordFailure();
      return null;
    } catch (error) {
      logger.error('Web fallback failed', { title: request.title, error: errorMessage(error) });
      this.breaker.recordFailure();
      return null;
    }
  }

  // =================================================================================
  // Internals
  // =================================================================================

  private searchTitles(title: string, alternateTitles: string[]): string[] {
    const titles = [title];
    const seen = new Set([normalize(title)]);
    for (const alternate of alternateTitles) {
      if (titles.length > MAX_ALTERNATE_SEARCHES) break;
      const key = normalize(alternate);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      titles.push(alternate);
    }
    return titles;
  }

  /**
   * @throws {BotProtectionDetectedError} when the result page is a challenge
   */
  private async searchEngine(
    engine: SearchEngine,
    title: string,
    year: number | null,
    context: ServiceContext
  ): Promise<string[]> {
    const url = engine.searchUrl(title, year);
    const html = await this.client.fetchText(url, {}, context);
    if (html === null) return [];

    const signature = detectBotProtection(html);
    if (signature) throw new BotProtectionDetectedError(engine.name, signature);

    const urls = extractTargetUrls(html, url);
    context.logger.debug('Search engine results', { engine: engine.name, title, urls: urls.length });
    return urls;
  }

  private async tryPage(
    url: string,
    request: LookupRequest,
    alternateTitles: string[],
    context: ServiceContext
  ): Promise<AcceptedCandidate | null> {
    const candidate = await this.scraper.scrape(url, context);
    if (!candidate) return null;

    if (!candidate.description) {
      context.logger.debug('Scraped page has no usable description', { url });
      return null;
    }
    if (candidate.mediaType !== request.mediaType) {
      context.logger.debug('Scraped page is a different media type', { url, found: candidate.mediaType });
      return null;
    }

    return acceptScrapedCandidate(request, alternateTitles, candidate, this.yearTolerance, context.logger);
  }
}
