/**
 * Lookup keys and external identifier helpers
 *
 * A lookup key identifies a query deterministically, so identical queries
 * land on the same cache record:
 *
 *   vpro-{title-slug}-{year|0}-{imdb|none}-{m|s}
 *
 * e.g. ("Apocalypse Now", 1979, film, tt0078788) → "vpro-apocalypse-now-1979-tt0078788-m"
 */

import { createHash } from 'node:crypto';
import { normalize } from './string-similarity.js';

export type MediaType = 'film' | 'series';

export interface LookupQuery {
  title: string;
  year?: number | null;
  mediaType: MediaType;
  externalId?: string | null;
}

export const LOOKUP_KEY_PREFIX = 'vpro-';
export const MAX_SLUG_LENGTH = 50;
const SLUG_HASH_LENGTH = 8;

const IMDB_ID = /^tt\d{7,8}$/;
const IMDB_IN_TEXT = [
  /imdb\.com\/title\/(tt\d{7,8})/i,
  /\{imdb-(tt\d{7,8})\}/i,
  /\[imdb-(tt\d{7,8})\]/i,
  /imdb:\/\/(tt\d{7,8})/i,
  /\b(tt\d{7,8})\b/,
];

export function isValidImdbId(id: string | null | undefined): id is string {
  return !!id && IMDB_ID.test(id.toLowerCase());
}

/**
 * Find an IMDB id in a URL, file name, or agent guid
 */
export function extractImdbId(text: string | null | undefined): string | null {
  if (!text) return null;
  for (const pattern of IMDB_IN_TEXT) {
    const match = text.match(pattern);
    if (match) return match[1].toLowerCase();
  }
  return null;
}

/**
 * Normalized title as a filesystem-safe slug: [a-z0-9-], at most 50 chars.
 *
 * A slug that had to be truncated, or that kept no ASCII letters or digits,
 * ends in the first 8 hex chars of the normalized title's sha256, so long
 * titles sharing a prefix and titles in other scripts stay distinct.
 */
export function titleSlug(title: string): string {
  const normalized = normalize(title);
  const slug = normalized
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');

  if (slug && slug.length <= MAX_SLUG_LENGTH) return slug;

  const suffix = createHash('sha256').update(normalized).digest('hex').slice(0, SLUG_HASH_LENGTH);
  const head = slug
    ? slug.slice(0, MAX_SLUG_LENGTH - SLUG_HASH_LENGTH - 1).replace(/-$/, '')
    : 'unknown';
  return `${head}-${suffix}`;
}

/**
 * Whether two lookup keys name the same title, year and media type,
 * whatever external id either carries
 */
export function sameTitleYearType(a: string, b: string): boolean {
  const left = parseLookupKey(a);
  const right = parseLookupKey(b);
  if (!left || !right) return false;
  return left.title === right.title && left.year === right.year && left.mediaType === right.mediaType;
}

export function buildLookupKey(query: LookupQuery): string {
  const year = query.year ?? 0;
  const imdb = isValidImdbId(query.externalId) ? query.externalId.toLowerCase() : 'none';
  const type = query.mediaType === 'series' ? 's' : 'm';
  return `${LOOKUP_KEY_PREFIX}${titleSlug(query.title)}-${year}-${imdb}-${type}`;
}

/**
 * Rejects anything that could escape the cache directory or was not built by {@link buildLookupKey}
 */
export function isValidLookupKey(key: string): boolean {
  return key.length <= 200 && /^vpro-[a-z0-9-]+$/.test(key) && !key.includes('..');
}

/**
 * Inverse of {@link buildLookupKey}; the title comes back as its slug with spaces
 */
export function parseLookupKey(key: string): LookupQuery | null {
  if (!isValidLookupKey(key)) return null;

  const match = key.match(/^vpro-(.+)-(\d{1,4})-(tt\d{7,8}|none)-([ms])$/);
  if (!match) return null;

  const [, slug, yearPart, imdb, type] = match;
  const year = Number(yearPart);

  return {
    title: slug.replace(/-/g, ' '),
    year: year > 0 ? year : null,
    externalId: imdb === 'none' ? null : imdb,
    mediaType: type === 's' ? 'series' : 'film',
  };
}

/**
 * Key prefix shared by every external-id variant of the same title/year/type
 */
export function titleYearPrefix(key: string): string | null {
  const parsed = parseLookupKey(key);
  if (!parsed) return null;
  return `${LOOKUP_KEY_PREFIX}${titleSlug(parsed.title)}-${parsed.year ?? 0}-`;
}
