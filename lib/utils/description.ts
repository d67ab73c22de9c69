/**
 * Synopsis cleanup and validation
 *
 * Scraped and API descriptions sometimes turn out to be login walls or
 * error pages; those must never be cached as a synopsis.
 */

import { load } from 'cheerio';

export const MIN_DESCRIPTION_LENGTH = 50;
export const MIN_DESCRIPTION_WORDS = 10;

const INVALID_PHRASES = [
  // Dutch
  'log in met',
  'inloggen',
  'gebruikersnaam en wachtwoord',
  'u moet ingelogd zijn',
  'toegang geweigerd',
  'geen toegang',
  'pagina niet gevonden',
  'sessie verlopen',
  'deze pagina is niet beschikbaar',
  // English
  'please log in',
  'sign in to',
  'login required',
  'access denied',
  'page not found',
  'session expired',
  'unauthorized',
  '403 forbidden',
  '401 unauthorized',
  '404 not found',
];

/**
 * Decode entities, strip tags and control characters, and collapse whitespace.
 * Paragraph breaks survive as single newlines.
 */
export function sanitizeDescription(text: string | null | undefined): string {
  if (!text) return '';

  // Parsing as a fragment drops markup and decodes entities; escaped markup
  // only becomes a tag after decoding, hence the second pass.
  const stripped = load(text, null, false).root().text()
    .replace(/<[^>]+>/g, '')
    .replace(/[\p{Cc}\p{Cf}\p{Co}\p{Cn}]/gu, (ch) => (ch === '\n' || ch === '\t' ? ch : ''));

  return stripped
    .split('\n')
    .map(line => line.split(/\s+/).filter(Boolean).join(' '))
    .filter(Boolean)
    .join('\n')
    .trim();
}

export function isValidDescription(description: string | null | undefined, minLength = MIN_DESCRIPTION_LENGTH): boolean {
  if (!description || description.trim().length < minLength) return false;

  const lower = description.toLowerCase();
  if (INVALID_PHRASES.some(phrase => lower.includes(phrase))) return false;

  return description.split(/\s+/).filter(Boolean).length >= MIN_DESCRIPTION_WORDS;
}

/**
 * Sanitize then validate; returns null for anything unusable
 */
export function cleanDescription(text: string | null | undefined): string | null {
  const sanitized = sanitizeDescription(text);
  return isValidDescription(sanitized) ? sanitized : null;
}
