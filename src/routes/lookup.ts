import { createRoute, z } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import { createLookupContext, type Container } from '../services/container.js';
import {
  createSuccessSchema,
  ErrorResponseSchema,
  createSuccessResponse,
} from '../schemas/response.js';
import {
  CacheRecordDataSchema,
  CandidateSchema,
  MediaTypeParamSchema,
  TitleParamSchema,
  YearParamSchema,
} from '../schemas/resolver.js';

// =================================================================================
// Schemas
// =================================================================================

const LookupQuerySchema = z.object({
  title: TitleParamSchema,
  year: YearParamSchema,
  imdb: z.string().trim().optional().openapi({
    param: { name: 'imdb', in: 'query' },
    description: 'IMDB id (tt + 7-8 digits); a malformed id is ignored',
    example: 'tt0078788',
  }),
  type: MediaTypeParamSchema,
});

const SearchQuerySchema = z.object({
  title: TitleParamSchema,
  year: YearParamSchema,
  type: MediaTypeParamSchema,
});

const SearchDataSchema = z.object({
  count: z.number().int().nonnegative(),
  candidates: z.array(CandidateSchema),
}).openapi('SearchData');

const errorResponses = {
  400: {
    description: 'Invalid query parameters',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
  429: {
    description: 'Rate limit exceeded',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
  503: {
    description: 'Lookup abandoned by the client',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
};

// =================================================================================
// Route Definitions
// =================================================================================

const lookupRoute = createRoute({
  method: 'get',
  path: '/api/lookup',
  tags: ['Lookup'],
  summary: 'Resolve a synopsis',
  description: `Runs the resolution chain (cache, POMS, alternate titles, web fallback) and returns the cached record.

An unresolvable title is a successful response with \`status: "not_found"\`; it is cached too.`,
  request: {
    query: LookupQuerySchema,
  },
  responses: {
    200: {
      description: 'Resolved or not_found record',
      content: {
        'application/json': {
          schema: createSuccessSchema(CacheRecordDataSchema, 'LookupSuccess'),
        },
      },
    },
    ...errorResponses,
  },
});

const searchRoute = createRoute({
  method: 'get',
  path: '/api/search',
  tags: ['Lookup'],
  summary: 'List primary search candidates',
  description: 'Every usable POMS candidate for a title, unfiltered by the matcher, for manual match selection. Nothing is cached.',
  request: {
    query: SearchQuerySchema,
  },
  responses: {
    200: {
      description: 'Candidates, possibly none',
      content: {
        'application/json': {
          schema: createSuccessSchema(SearchDataSchema, 'SearchSuccess'),
        },
      },
    },
    ...errorResponses,
  },
});

// =================================================================================
// Route Handlers
// =================================================================================

export function createLookupRoutes(container: Container) {
  const app = createOpenAPIApp();

  app.openapi(lookupRoute, async (c) => {
    const { title, year, imdb, type } = c.req.valid('query');
    const context = createLookupContext(container, c.get('logger'), c.req.raw.signal);

    const record = await container.orchestrator.resolve(
      { title, year: year ?? null, mediaType: type, externalId: imdb || null },
      context
    );

    return createSuccessResponse(c, record);
  });

  app.openapi(searchRoute, async (c) => {
    const { title, year, type } = c.req.valid('query');
    const context = createLookupContext(container, c.get('logger'), c.req.raw.signal);

    const candidates = await container.poms.searchMany(
      { title, year: year ?? null, mediaType: type, externalId: null },
      context
    );

    return createSuccessResponse(c, { count: candidates.length, candidates });
  });

  return app;
}
