import { describe, it, expect } from 'vitest';
import { sanitizeDescription, isValidDescription, cleanDescription } from '../description.js';

const VALID = 'Een jonge vrouw reist naar Parijs om daar haar verdwenen broer te zoeken, en vindt meer dan ze verwacht.';

describe('sanitizeDescription', () => {
  it('strips tags and decodes entities', () => {
    expect(sanitizeDescription('<p>Tom &amp; Jerry <b>rennen</b></p>')).toBe('Tom & Jerry rennen');
  });

  it('strips markup that only appears after entity decoding', () => {
    expect(sanitizeDescription('&lt;script&gt;x&lt;/script&gt;Tekst')).toBe('xTekst');
  });

  it('removes control characters and collapses whitespace', () => {
    expect(sanitizeDescription('Eerste\u0007   regel\u200B  hier')).toBe('Eerste regel hier');
  });

  it('keeps paragraph breaks as single newlines', () => {
    expect(sanitizeDescription('Een\n\n\n  twee  ')).toBe('Een\ntwee');
  });

  it('returns an empty string for missing input', () => {
    expect(sanitizeDescription(null)).toBe('');
    expect(sanitizeDescription(undefined)).toBe('');
  });
});

describe('isValidDescription', () => {
  it('accepts a normal synopsis', () => {
    expect(isValidDescription(VALID)).toBe(true);
  });

  it('rejects short text', () => {
    expect(isValidDescription('Te kort.')).toBe(false);
  });

  it('rejects long text with too few words', () => {
    expect(isValidDescription('Supercalifragilisticexpialidocious '.repeat(3))).toBe(false);
  });

  it('rejects login walls in Dutch and English', () => {
    expect(isValidDescription(`U moet ingelogd zijn om deze pagina te bekijken. ${VALID}`)).toBe(false);
    expect(isValidDescription(`Please log in to continue reading this review. ${VALID}`)).toBe(false);
  });

  it('rejects error pages', () => {
    expect(isValidDescription(`404 Not Found. The requested page could not be located on this server at all.`)).toBe(false);
  });
});

describe('cleanDescription', () => {
  it('returns the sanitized text when valid', () => {
    expect(cleanDescription(`<p>${VALID}</p>`)).toBe(VALID);
  });

  it('returns null when nothing usable remains', () => {
    expect(cleanDescription('<p>Pagina niet gevonden</p>')).toBeNull();
    expect(cleanDescription('')).toBeNull();
  });
});
