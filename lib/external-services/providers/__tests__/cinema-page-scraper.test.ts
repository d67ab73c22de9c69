import { describe, it, expect } from 'vitest';
import { http, HttpResponse } from 'msw';
import { server } from '../../../../src/__tests__/mocks/server.js';
import {
  APOCALYPSE_SYNOPSIS,
  DOWNFALL_SYNOPSIS,
  cinemaPageHtml,
  testClient,
  testContext,
} from '../../../../src/__tests__/mocks/fixtures.js';
import {
  CinemaPageScraper,
  extractInternalId,
  parseCinemaPage,
  toCinemaPageUrl,
} from '../cinema-page-scraper.js';

const PAGE_URL = 'https://www.cinema.nl/db/8290-apocalypse-now';

// =================================================================================
// URL helpers
// =================================================================================

describe('extractInternalId', () => {
  it('reads both URL shapes', () => {
    expect(extractInternalId(PAGE_URL)).toBe('8290');
    expect(extractInternalId('https://www.vprogids.nl/cinema/films/film~16092390~the-penguin-lessons~.html')).toBe('16092390');
  });

  it('returns null for other URLs', () => {
    expect(extractInternalId('https://www.cinema.nl/nieuws')).toBeNull();
    expect(extractInternalId(null)).toBeNull();
  });
});

describe('toCinemaPageUrl', () => {
  it('trims current URLs to the page itself and upgrades to https', () => {
    expect(toCinemaPageUrl('http://www.cinema.nl/db/8290-apocalypse-now/recensie')).toBe(PAGE_URL);
  });

  it('rewrites legacy guide URLs', () => {
    expect(toCinemaPageUrl('https://www.vprogids.nl/cinema/series/serie~555~borgen~.html'))
      .toBe('https://www.cinema.nl/db/555-borgen');
  });

  it('rejects non-page URLs', () => {
    expect(toCinemaPageUrl('https://www.cinema.nl/nieuws/123')).toBeNull();
    expect(toCinemaPageUrl('https://example.org/film~1~x~')).toBeNull();
  });
});

// =================================================================================
// Parsing
// =================================================================================

describe('parseCinemaPage', () => {
  it('extracts every field from a film page', () => {
    const html = cinemaPageHtml({ title: 'Apocalypse Now', year: 1979, imdbId: 'TT0078788', stars: 4 });

    expect(parseCinemaPage(html, PAGE_URL)).toEqual({
      title: 'Apocalypse Now',
      year: 1979,
      mediaType: 'film',
      description: APOCALYPSE_SYNOPSIS,
      url: PAGE_URL,
      internalId: '8290',
      externalId: 'tt0078788',
      contentRating: '16',
      director: 'Francis Ford Coppola',
      genres: ['Drama', 'Oorlog'],
      appreciation: 8,
      confidenceSignal: 0,
    });
  });

  it('recognizes series pages', () => {
    const html = cinemaPageHtml({ title: 'Borgen', year: 2010, kind: 'serie', synopsis: DOWNFALL_SYNOPSIS });
    const page = parseCinemaPage(html, 'https://www.cinema.nl/db/555-borgen');

    expect(page?.mediaType).toBe('series');
    expect(page?.year).toBe(2010);
    expect(page?.externalId).toBeNull();
  });

  it('falls back to the meta description', () => {
    const html = `<html><head><meta name="description" content="${DOWNFALL_SYNOPSIS}"></head>
<body><h1>Der Untergang</h1></body></html>`;
    const page = parseCinemaPage(html, 'https://www.cinema.nl/db/777-der-untergang');

    expect(page?.description).toBe(DOWNFALL_SYNOPSIS);
    expect(page?.year).toBeNull();
  });

  it('returns null without a title heading', () => {
    expect(parseCinemaPage('<html><body><p>Niets</p></body></html>', PAGE_URL)).toBeNull();
  });
});

// =================================================================================
// Scraper
// =================================================================================

describe('CinemaPageScraper', () => {
  it('fetches the canonical page URL', async () => {
    server.use(
      http.get(PAGE_URL, () => HttpResponse.html(cinemaPageHtml({ title: 'Apocalypse Now', year: 1979 })))
    );
    const scraper = new CinemaPageScraper(testClient('cinema'));
    const { context } = testContext();

    const page = await scraper.scrape(`${PAGE_URL}/recensie`, context);
    expect(page?.title).toBe('Apocalypse Now');
    expect(page?.url).toBe(PAGE_URL);
  });

  it('skips URLs that are not film pages without a request', async () => {
    const scraper = new CinemaPageScraper(testClient('cinema'));
    const { context } = testContext();

    expect(await scraper.scrape('https://www.cinema.nl/agenda', context)).toBeNull();
  });

  it('returns null when the page is missing', async () => {
    server.use(http.get(PAGE_URL, () => new HttpResponse('Not found', { status: 404 })));
    const scraper = new CinemaPageScraper(testClient('cinema'));
    const { context } = testContext();

    expect(await scraper.scrape(PAGE_URL, context)).toBeNull();
  });
});
