import { describe, it, expect } from 'vitest';
import {
  normalize,
  titlesMatch,
  similarity,
  yearsCompatible,
  yearDistance,
  extractYear,
  TITLE_SIMILARITY_THRESHOLD,
} from '../string-similarity.js';

describe('normalize', () => {
  it('folds diacritics and drops punctuation', () => {
    expect(normalize('Le Dernier Métro')).toBe('le dernier metro');
    expect(normalize('Amélie!')).toBe('amelie');
  });

  it('maps full-width characters to ASCII', () => {
    expect(normalize('Ｍｅｔｒｏｐｏｌｉｓ')).toBe('metropolis');
  });

  it('collapses whitespace and trims', () => {
    expect(normalize('  The   Matrix\t')).toBe('the matrix');
  });

  it('keeps non-Latin letters', () => {
    expect(normalize('Сталкер')).toBe('сталкер');
  });

  it('returns an empty string for empty input', () => {
    expect(normalize('')).toBe('');
  });
});

describe('titlesMatch', () => {
  it('matches titles that differ only in case, accents and punctuation', () => {
    expect(titlesMatch('Der Untergang', 'der untergang')).toBe(true);
    expect(titlesMatch('Amélie', 'Amelie!')).toBe(true);
  });

  it('never matches an empty title', () => {
    expect(titlesMatch('', '')).toBe(false);
    expect(titlesMatch('!!!', '???')).toBe(false);
  });

  it('does not match different titles', () => {
    expect(titlesMatch('The Matrix', 'The Matrix Reloaded')).toBe(false);
  });
});

describe('similarity', () => {
  it('scores a sequel title below the acceptance threshold', () => {
    const score = similarity('The Matrix', 'The Matrix Reloaded');
    expect(score).toBeCloseTo(2 / 3, 5);
    expect(score).toBeLessThan(TITLE_SIMILARITY_THRESHOLD);
  });

  it('is 1 for normalized-equal titles', () => {
    expect(similarity('Downfall', 'downfall')).toBe(1);
  });

  it('is 0 when either side is empty', () => {
    expect(similarity('', 'Downfall')).toBe(0);
  });

  it('ignores word order and repetition', () => {
    expect(similarity('now apocalypse now', 'Apocalypse Now')).toBe(1);
  });
});

describe('yearsCompatible', () => {
  it('accepts differences within the tolerance', () => {
    expect(yearsCompatible(1979, 1981)).toBe(true);
    expect(yearsCompatible(1979, 1982)).toBe(false);
  });

  it('treats an unknown year as compatible', () => {
    expect(yearsCompatible(null, 1979)).toBe(true);
    expect(yearsCompatible(1979, undefined)).toBe(true);
  });

  it('honours a custom tolerance', () => {
    expect(yearsCompatible(2004, 2004, 0)).toBe(true);
    expect(yearsCompatible(2004, 2005, 0)).toBe(false);
  });
});

describe('yearDistance', () => {
  it('is the absolute difference, or 0 when unknown', () => {
    expect(yearDistance(2004, 2001)).toBe(3);
    expect(yearDistance(null, 2001)).toBe(0);
  });
});

describe('extractYear', () => {
  it('prefers a parenthesized year over a number in the title', () => {
    expect(extractYear('2001: A Space Odyssey (1968)')).toBe(1968);
  });

  it('falls back to a bare year', () => {
    expect(extractYear('Released in 1979 by United Artists')).toBe(1979);
  });

  it('skips implausible parenthesized numbers', () => {
    expect(extractYear('Runtime (1234) released 2004')).toBe(2004);
  });

  it('returns null without a year', () => {
    expect(extractYear('No year here')).toBeNull();
  });
});
