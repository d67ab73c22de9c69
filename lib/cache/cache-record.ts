import { z } from 'zod';

export const MediaTypeSchema = z.enum(['film', 'series']);
export const LookupStatusSchema = z.enum(['found', 'not_found']);
export const LookupMethodSchema = z.enum(['poms', 'tmdb_alt', 'web']);

export type LookupStatus = z.infer<typeof LookupStatusSchema>;
export type LookupMethod = z.infer<typeof LookupMethodSchema>;

/**
 * One resolved (or unresolved) lookup as persisted on disk
 *
 * Records are replaced whole, never patched.
 */
export const CacheRecordSchema = z.object({
  lookup_key: z.string().min(1),
  title: z.string(),
  year: z.number().int().nullable(),
  description: z.string().nullable(),
  source_url: z.string().nullable(),
  external_id: z.string().nullable(),
  internal_id: z.string().nullable(),
  media_type: MediaTypeSchema,
  status: LookupStatusSchema,
  fetched_at: z.string().datetime(),
  last_accessed_at: z.string().datetime(),
  content_rating: z.string().nullable(),
  director: z.string().nullable(),
  genres: z.array(z.string()),
  appreciation: z.number().nullable(),
  lookup_method: LookupMethodSchema.nullable(),
  discovered_external_id: z.string().nullable(),
  matched_title: z.string().nullable(),
}).refine(record => record.status === 'found' || record.description === null, {
  message: 'not_found records carry no description',
  path: ['description'],
});

export type CacheRecord = z.infer<typeof CacheRecordSchema>;
