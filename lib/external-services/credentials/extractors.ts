/**
 * Credential extractors
 *
 * The primary API's key and secret are embedded in the public site's
 * frontend. Each extractor knows one way they have been written; the
 * manager tries them in order, most specific first.
 */

export interface TokenPair {
  key: string;
  secret: string;
}

export interface CredentialExtractor {
  readonly name: string;
  tryExtract(text: string): TokenPair | null;
}

/**
 * Matches a key pattern and a secret pattern independently in the same text
 */
export class PatternPairExtractor implements CredentialExtractor {
  constructor(
    readonly name: string,
    private readonly keyPattern: RegExp,
    private readonly secretPattern: RegExp
  ) {}

  tryExtract(text: string): TokenPair | null {
    const key = text.match(this.keyPattern)?.[1];
    const secret = text.match(this.secretPattern)?.[1];
    if (!key || !secret) return null;
    return { key, secret };
  }
}

const TOKEN = '([a-z0-9]{8,15})';

export const DEFAULT_EXTRACTORS: readonly CredentialExtractor[] = [
  new PatternPairExtractor(
    'site-config-vars',
    new RegExp(`vpronlApiKey\\s*[=:]\\s*["']${TOKEN}["']`, 'i'),
    new RegExp(`vpronlSecret\\s*[=:]\\s*["']${TOKEN}["']`, 'i')
  ),
  new PatternPairExtractor(
    'json-properties',
    new RegExp(`"apiKey"\\s*:\\s*"${TOKEN}"`, 'i'),
    new RegExp(`"(?:apiSecret|secret)"\\s*:\\s*"${TOKEN}"`, 'i')
  ),
  new PatternPairExtractor(
    'generic-assignments',
    new RegExp(`apiKey\\s*[=:]\\s*["']${TOKEN}["']`, 'i'),
    new RegExp(`(?:apiSecret|secret)\\s*[=:]\\s*["']${TOKEN}["']`, 'i')
  ),
];

export function extractTokens(
  text: string,
  extractors: readonly CredentialExtractor[] = DEFAULT_EXTRACTORS
): { pair: TokenPair; extractor: string } | null {
  for (const extractor of extractors) {
    const pair = extractor.tryExtract(text);
    if (pair) return { pair, extractor: extractor.name };
  }
  return null;
}
