import { z } from '@hono/zod-openapi';
import { CacheRecordSchema, MediaTypeSchema } from '../../lib/cache/cache-record.js';

// =================================================================================
// Shared resolver schemas
// =================================================================================

export const CacheRecordDataSchema = CacheRecordSchema.openapi('CacheRecord');

export const MediaTypeParamSchema = MediaTypeSchema.default('film').openapi({
  param: { name: 'type', in: 'query' },
  description: 'Kind of work to resolve',
  example: 'film',
});

export const TitleParamSchema = z.string().trim().min(1).max(300).openapi({
  param: { name: 'title', in: 'query' },
  description: 'Title as known to the caller (any language)',
  example: 'Apocalypse Now',
});

export const YearParamSchema = z.coerce.number().int().min(1870).max(2100).optional().openapi({
  param: { name: 'year', in: 'query' },
  description: 'Release year; matches within a small tolerance',
  example: 1979,
});

export const CandidateSchema = z.object({
  title: z.string(),
  year: z.number().int().nullable(),
  mediaType: MediaTypeSchema,
  description: z.string().nullable(),
  url: z.string().nullable(),
  internalId: z.string().nullable(),
  externalId: z.string().nullable(),
  contentRating: z.string().nullable(),
  director: z.string().nullable(),
  genres: z.array(z.string()),
  appreciation: z.number().nullable(),
  confidenceSignal: z.number().min(0).max(1),
}).openapi('Candidate');
