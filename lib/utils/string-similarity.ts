/**
 * String Similarity Utilities
 *
 * Title normalization and matching used to accept or reject candidates
 * coming back from every lookup backend.
 *
 * @module lib/utils/string-similarity
 */

// =================================================================================
// Constants
// =================================================================================

/**
 * Minimum Jaccard similarity for a fuzzy title match
 *
 * Word-set Jaccard is coarse: titles that share a franchise word score high.
 * "The Matrix" vs "The Matrix Reloaded" shares {the, matrix} out of
 * {the, matrix, reloaded} = 0.667, and must stay below this value.
 * Tunable through TITLE_SIMILARITY_THRESHOLD.
 */
export const TITLE_SIMILARITY_THRESHOLD = 0.7;

/**
 * Stricter threshold for scraped pages, which carry no structured year
 */
export const SCRAPED_SIMILARITY_THRESHOLD = 0.8;

/**
 * Maximum absolute release-year difference between regions/sources
 */
export const YEAR_TOLERANCE = 2;

const EARLIEST_FILM_YEAR = 1888;
const LATEST_PLAUSIBLE_YEAR = 2100;

// =================================================================================
// Normalization
// =================================================================================

const DASHES = /[‐-―−﹘﹣－]/g;
const DOUBLE_QUOTES = /[“”„«»]/g;
const SINGLE_QUOTES = /[‘’‚]/g;

/**
 * Unify dash and quote variants after NFKC (full-width → half-width, ligatures)
 */
export function normalizeUnicode(text: string): string {
  if (!text) return '';

  return text
    .normalize('NFKC')
    .replace(DASHES, '-')
    .replace(DOUBLE_QUOTES, '"')
    .replace(SINGLE_QUOTES, "'");
}

/**
 * Normalize a title for comparison
 *
 * Transformations:
 * - NFKC, dash and quote unification
 * - Lowercase
 * - Diacritics folded (NFD, combining marks dropped)
 * - Punctuation removed, Unicode letters and digits kept
 * - Whitespace collapsed
 *
 * Examples:
 * - "Le Dernier Métro" → "le dernier metro"
 * - "Amélie!" → "amelie"
 * - "Ｍｅｔｒｏｐｏｌｉｓ" → "metropolis"
 */
export function normalize(text: string): string {
  if (!text) return '';

  return normalizeUnicode(text)
    .toLowerCase()
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// =================================================================================
// Comparison
// =================================================================================

/**
 * Exact match after normalization
 */
export function titlesMatch(a: string, b: string): boolean {
  const left = normalize(a);
  return left !== '' && left === normalize(b);
}

/**
 * Jaccard index over the normalized word sets, 0 when either side is empty
 */
export function similarity(a: string, b: string): number {
  const words1 = new Set(normalize(a).split(' ').filter(Boolean));
  const words2 = new Set(normalize(b).split(' ').filter(Boolean));

  if (words1.size === 0 || words2.size === 0) return 0;

  let intersection = 0;
  for (const word of words1) {
    if (words2.has(word)) intersection++;
  }
  const union = words1.size + words2.size - intersection;

  return intersection / union;
}

/**
 * Years are compatible when either is unknown or they differ by at most `tolerance`
 */
export function yearsCompatible(
  a: number | null | undefined,
  b: number | null | undefined,
  tolerance: number = YEAR_TOLERANCE
): boolean {
  if (a == null || b == null) return true;
  return Math.abs(a - b) <= tolerance;
}

/**
 * Absolute year distance, 0 when either side is unknown
 */
export function yearDistance(a: number | null | undefined, b: number | null | undefined): number {
  if (a == null || b == null) return 0;
  return Math.abs(a - b);
}

// =================================================================================
// Year extraction
// =================================================================================

/**
 * Extract a release year from free text
 *
 * A parenthesized year wins over any bare four-digit number, so
 * "2001: A Space Odyssey (1968)" yields 1968.
 */
export function extractYear(text: string): number | null {
  if (!text) return null;

  for (const match of text.matchAll(/\((\d{4})\)/g)) {
    const year = Number(match[1]);
    if (year >= EARLIEST_FILM_YEAR && year <= LATEST_PLAUSIBLE_YEAR) {
      return year;
    }
  }

  const bare = text.match(/\b(19\d{2}|20\d{2})\b/);
  return bare ? Number(bare[1]) : null;
}
