/**
 * Cinema database page scraper
 *
 * Turns a cinema.nl film/series page into a {@link Candidate}. Shared by the
 * primary provider (description fill-in) and the web fallback.
 *
 * Page URLs come in two shapes:
 * - current:  https://www.cinema.nl/db/16092390-the-penguin-lessons
 * - legacy:   https://www.vprogids.nl/cinema/films/film~16092390~the-penguin-lessons~.html
 *
 * @module lib/external-services/providers/cinema-page-scraper
 */

import { load, type CheerioAPI } from 'cheerio';
import type { Candidate } from '../capabilities.js';
import type { ServiceContext } from '../service-context.js';
import type { ServiceHttpClient } from '../http-client.js';
import type { MediaType } from '../../utils/lookup-key.js';
import { cleanDescription } from '../../utils/description.js';
import { extractYear } from '../../utils/string-similarity.js';

// =================================================================================
// URL helpers
// =================================================================================

export const CINEMA_BASE_URL = 'https://www.cinema.nl';

const CINEMA_PAGE = /^https?:\/\/(?:www\.)?cinema\.nl\/db\/(\d+)-[\w-]+/i;
const LEGACY_PAGE = /(?:film|serie)~(\d+)~([^~]+)~/;
const INTERNAL_ID_PATTERNS = [/(?:film|serie)~(\d+)~/, /\/db\/(\d+)-/];

/**
 * Numeric database id from either URL shape
 */
export function extractInternalId(url: string | null | undefined): string | null {
  if (!url) return null;
  for (const pattern of INTERNAL_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match) return match[1];
  }
  return null;
}

/**
 * Canonical scrapeable page URL, or null when the URL is not a film/series page
 */
export function toCinemaPageUrl(url: string | null | undefined): string | null {
  if (!url) return null;

  const current = url.match(CINEMA_PAGE);
  if (current) return current[0].replace(/^http:/, 'https:');

  if (/vprogids\.nl/i.test(url)) {
    const legacy = url.match(LEGACY_PAGE);
    if (legacy) return `${CINEMA_BASE_URL}/db/${legacy[1]}-${legacy[2]}`;
  }
  return null;
}

// =================================================================================
// Page parsing
// =================================================================================

const IMDB_LINK = /https?:\/\/(?:www\.)?imdb\.com\/title\/(tt\d{7,10})/i;
const KIJKWIJZER = /\b(AL|6|9|12|14|16|18)\+?(?:\s|$)/;
const DIRECTOR = /(?:[Rr]egie|[Rr]egisseur|[Dd]irector)[:\s]+(\p{Lu}\p{Ll}+(?:[ \t]+\p{Lu}\p{Ll}+)+)/u;
const MIN_ARTICLE_PARAGRAPH = 100;
const MAX_GENRES = 5;

const KNOWN_GENRES = [
  'actie', 'avontuur', 'animatie', 'biografie', 'comedy', 'misdaad',
  'documentaire', 'drama', 'familie', 'fantasy', 'film-noir',
  'geschiedenis', 'horror', 'muziek', 'musical', 'mysterie',
  'romantiek', 'sciencefiction', 'sport', 'thriller',
  'oorlog', 'western', 'komedie', 'tragikomedie',
];

const SERIES_INDICATORS = [
  /\bserie\b/,
  /\bseizoen\s*\d/,
  /\baflevering/,
  /\bepisode\s*\d/,
  /\bseason\s*\d/,
];

/**
 * Parse a fetched page. Returns null when the page has no title heading.
 */
export function parseCinemaPage(html: string, url: string): Candidate | null {
  const $ = load(html);
  const title = $('h1').first().text().trim();
  if (!title) return null;

  const pageText = $('body').length ? $('body').text() : $.root().text();

  return {
    title,
    year: extractPageYear($, pageText),
    mediaType: detectMediaType(pageText),
    description: extractDescription($),
    url,
    internalId: extractInternalId(url),
    externalId: extractImdbLink($, html),
    contentRating: extractContentRating($, pageText),
    director: extractDirector($, pageText),
    genres: extractGenres($, pageText),
    appreciation: extractAppreciation(pageText),
    confidenceSignal: 0,
  };
}

function extractDescription($: CheerioAPI): string | null {
  const blockquote = cleanDescription($('blockquote').first().text());
  if (blockquote) return blockquote;

  for (const paragraph of $('article p').toArray()) {
    const text = $(paragraph).text().trim();
    if (text.length <= MIN_ARTICLE_PARAGRAPH) continue;
    const cleaned = cleanDescription(text);
    if (cleaned) return cleaned;
  }

  const intro = $('[class*="intro"], [class*="description"], [class*="body"], [class*="review"]').first();
  const introText = cleanDescription(intro.text());
  if (introText) return introText;

  return (
    cleanDescription($('meta[name="description"]').attr('content')) ??
    cleanDescription($('meta[property="og:description"]').attr('content'))
  );
}

function extractPageYear($: CheerioAPI, pageText: string): number | null {
  const structured = pageText.toLowerCase().match(/(?:film|serie)\s*[•·]\s*(\d{4})/);
  if (structured) return Number(structured[1]);

  const meta = $('[class*="meta"], [class*="credits"], [class*="info"]').first();
  if (meta.length) {
    const year = extractYear(meta.text());
    if (year) return year;
  }

  return extractYear(pageText);
}

/** "4 van 5 sterren" → 8 */
function extractAppreciation(pageText: string): number | null {
  const match = pageText.toLowerCase().match(/(\d+)\s*van\s*5\s*sterren/);
  return match ? Number(match[1]) * 2 : null;
}

function extractContentRating($: CheerioAPI, pageText: string): string | null {
  const badge = $('[class*="kijkwijzer"], [class*="Kijkwijzer"], [class*="age-rating"]').first().text();
  return badge.match(KIJKWIJZER)?.[1] ?? pageText.match(KIJKWIJZER)?.[1] ?? null;
}

function extractImdbLink($: CheerioAPI, html: string): string | null {
  for (const link of $('a[href]').toArray()) {
    const match = ($(link).attr('href') ?? '').match(IMDB_LINK);
    if (match) return match[1].toLowerCase();
  }
  return html.match(IMDB_LINK)?.[1].toLowerCase() ?? null;
}

function detectMediaType(pageText: string): MediaType {
  const text = pageText.toLowerCase();
  if (/\bfilm\s*[•·]/.test(text)) return 'film';
  if (/\bserie\s*[•·]/.test(text)) return 'series';
  return SERIES_INDICATORS.some(pattern => pattern.test(text)) ? 'series' : 'film';
}

function extractDirector($: CheerioAPI, pageText: string): string | null {
  const credits = $('[class*="credits"], [class*="crew"]').first();
  if (credits.length) {
    const match = credits.text().match(DIRECTOR);
    if (match) return match[1];
  }
  return pageText.match(DIRECTOR)?.[1] ?? null;
}

function extractGenres($: CheerioAPI, pageText: string): string[] {
  const meta = $('[class*="credits"], [class*="meta"], [class*="genre"], [class*="info"], [class*="details"]').first();
  const text = (meta.length ? meta.text() : pageText).toLowerCase();

  const genres = new Set<string>();

  // "film • 1979 • drama, oorlog • 153 min"
  for (const segment of text.split(/[•·]/).slice(1, -1)) {
    for (const part of segment.split(',')) {
      const genre = part.trim();
      if (KNOWN_GENRES.includes(genre)) genres.add(genre);
    }
  }

  if (genres.size === 0) {
    for (const genre of KNOWN_GENRES) {
      if (new RegExp(`\\b${genre}\\b`).test(text)) genres.add(genre);
    }
  }

  return [...genres].slice(0, MAX_GENRES).map(genre => genre.charAt(0).toUpperCase() + genre.slice(1));
}

// =================================================================================
// Scraper
// =================================================================================

export class CinemaPageScraper {
  constructor(private readonly client: ServiceHttpClient) {}

  /**
   * Fetch and parse a page; null when the URL is not a page we can scrape,
   * the fetch fails, or the page has no title
   */
  async scrape(url: string, context: ServiceContext): Promise<Candidate | null> {
    const pageUrl = toCinemaPageUrl(url);
    if (!pageUrl) {
      context.logger.debug('Not a cinema page URL, skipping scrape', { url });
      return null;
    }

    const html = await this.client.fetchText(pageUrl, {}, context);
    if (html === null) return null;

    const candidate = parseCinemaPage(html, pageUrl);
    if (!candidate) {
      context.logger.debug('No title found on page', { url: pageUrl });
    }
    return candidate;
  }
}
