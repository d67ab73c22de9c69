/**
 * Candidate acceptance policy
 *
 * The only place that decides whether a backend's proposal is the work the
 * caller asked for. Every rejection is logged with its reason, since false
 * negatives are otherwise invisible.
 */

import type { LogSink } from '../logger.js';
import {
  SCRAPED_SIMILARITY_THRESHOLD,
  TITLE_SIMILARITY_THRESHOLD,
  YEAR_TOLERANCE,
  similarity,
  titlesMatch,
  yearDistance,
  yearsCompatible,
} from '../utils/string-similarity.js';
import type { AcceptedCandidate, Candidate } from './capabilities.js';

export interface MatchPolicy {
  similarityThreshold: number;
  yearTolerance: number;
  /**
   * Allow accepting the best non-exact candidate. Disabled when the caller
   * supplied an external id: it names one specific work, so a merely
   * similar title is more likely a different film.
   */
  allowFuzzy: boolean;
}

export const DEFAULT_MATCH_POLICY: MatchPolicy = {
  similarityThreshold: TITLE_SIMILARITY_THRESHOLD,
  yearTolerance: YEAR_TOLERANCE,
  allowFuzzy: true,
};

export type RejectionReason = 'title_mismatch' | 'year_mismatch';

interface QueryShape {
  title: string;
  year: number | null;
}

/**
 * Pick the candidate to accept, or null
 *
 * 1. Normalized-title matches with a compatible year, closest year first.
 * 2. Otherwise (when fuzzy is allowed) rank by similarity then year closeness;
 *    the best is accepted only if it clears both the threshold and the tolerance.
 */
export function selectCandidate(
  query: QueryShape,
  candidates: Candidate[],
  policy: MatchPolicy,
  logger: LogSink
): AcceptedCandidate | null {
  const scored = candidates.map(candidate => ({
    ...candidate,
    confidenceSignal: similarity(query.title, candidate.title),
  }));

  const exact = scored
    .filter(candidate => titlesMatch(candidate.title, query.title))
    .sort((a, b) => yearDistance(a.year, query.year) - yearDistance(b.year, query.year));

  for (const candidate of exact) {
    if (yearsCompatible(candidate.year, query.year, policy.yearTolerance)) {
      const matchType = candidate.year === query.year ? 'exact' : 'title';
      logger.info('Accepted candidate', { title: candidate.title, year: candidate.year, matchType });
      return { candidate, matchType };
    }
    logRejection(logger, query, candidate, 'year_mismatch');
  }

  if (!policy.allowFuzzy) {
    logger.debug('Fuzzy fallback skipped, external id supplied', { title: query.title, candidates: scored.length });
    return null;
  }

  const ranked = scored
    .filter(candidate => !titlesMatch(candidate.title, query.title))
    .sort((a, b) =>
      b.confidenceSignal - a.confidenceSignal ||
      yearDistance(a.year, query.year) - yearDistance(b.year, query.year)
    );

  const [best, ...rest] = ranked;
  if (!best) return null;

  for (const other of rest) {
    logRejection(logger, query, other, rejectionReason(query, other, policy) ?? 'title_mismatch');
  }

  const reason = rejectionReason(query, best, policy);
  if (reason) {
    logRejection(logger, query, best, reason);
    return null;
  }

  logger.info('Accepted candidate', {
    title: best.title,
    year: best.year,
    matchType: 'fuzzy',
    similarity: Number(best.confidenceSignal.toFixed(3)),
  });
  return { candidate: best, matchType: 'fuzzy' };
}

function rejectionReason(query: QueryShape, candidate: Candidate, policy: MatchPolicy): RejectionReason | null {
  if (candidate.confidenceSignal < policy.similarityThreshold) return 'title_mismatch';
  if (!yearsCompatible(candidate.year, query.year, policy.yearTolerance)) return 'year_mismatch';
  return null;
}

function logRejection(logger: LogSink, query: QueryShape, candidate: Candidate, reason: RejectionReason): void {
  logger.debug('Rejected candidate', {
    reason,
    query: query.title,
    queryYear: query.year,
    candidate: candidate.title,
    candidateYear: candidate.year,
    similarity: Number(candidate.confidenceSignal.toFixed(3)),
  });
}

/**
 * Acceptance for a scraped page, which may carry an IMDB id
 *
 * - Both sides have an IMDB id: equality decides, nothing else.
 * - Normalized title match against the query or any alternate title, year-compatible.
 * - Otherwise a high-similarity title, only when both years are known and compatible.
 */
export function acceptScrapedCandidate(
  query: QueryShape & { externalId: string | null },
  alternateTitles: string[],
  candidate: Candidate,
  yearTolerance: number,
  logger: LogSink
): AcceptedCandidate | null {
  if (query.externalId && candidate.externalId) {
    if (query.externalId.toLowerCase() === candidate.externalId.toLowerCase()) {
      return { candidate: { ...candidate, confidenceSignal: 1 }, matchType: 'imdb' };
    }
    logger.debug('Rejected scraped page, IMDB id differs', {
      expected: query.externalId,
      found: candidate.externalId,
    });
    return null;
  }

  const titles = [query.title, ...alternateTitles];

  for (const title of titles) {
    if (titlesMatch(candidate.title, title) && yearsCompatible(candidate.year, query.year, yearTolerance)) {
      return { candidate: { ...candidate, confidenceSignal: 1 }, matchType: 'title' };
    }
  }

  if (candidate.year != null && query.year != null && yearsCompatible(candidate.year, query.year, yearTolerance)) {
    for (const title of titles) {
      const score = similarity(candidate.title, title);
      if (score >= SCRAPED_SIMILARITY_THRESHOLD) {
        return { candidate: { ...candidate, confidenceSignal: score }, matchType: 'fuzzy' };
      }
    }
  }

  logger.debug('Rejected scraped page', {
    query: query.title,
    queryYear: query.year,
    candidate: candidate.title,
    candidateYear: candidate.year,
    reason: yearsCompatible(candidate.year, query.year, yearTolerance) ? 'title_mismatch' : 'year_mismatch',
  });
  return null;
}
