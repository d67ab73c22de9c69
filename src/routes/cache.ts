import { createRoute, z } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import type { Container } from '../services/container.js';
import { preserveCredentials } from '../../lib/cache/disk-cache.js';
import { isValidLookupKey } from '../../lib/utils/lookup-key.js';
import {
  APIError,
  ErrorCode,
  createSuccessSchema,
  ErrorResponseSchema,
  createSuccessResponse,
} from '../schemas/response.js';
import { CacheRecordDataSchema } from '../schemas/resolver.js';

// =================================================================================
// Schemas
// =================================================================================

const CacheStatsDataSchema = z.object({
  entryCounts: z.object({
    total: z.number().int().nonnegative(),
    found: z.number().int().nonnegative(),
    notFound: z.number().int().nonnegative(),
    expired: z.number().int().nonnegative(),
    corrupt: z.number().int().nonnegative(),
  }),
  sizeBytes: z.number().int().nonnegative(),
  maxEntries: z.number().int().positive(),
  maxSizeBytes: z.number().positive(),
}).openapi('CacheStats');

const CacheKeysDataSchema = z.object({
  count: z.number().int().nonnegative(),
  keys: z.array(z.string()),
}).openapi('CacheKeys');

const KeyParamSchema = z.object({
  key: z.string().min(1).openapi({
    param: { name: 'key', in: 'path' },
    example: 'vpro-apocalypse-now-1979-tt0078788-m',
  }),
});

const ClearQuerySchema = z.object({
  preserve_credentials: z.enum(['true', 'false']).default('true').openapi({
    param: { name: 'preserve_credentials', in: 'query' },
    description: 'Keep credentials.json (default true)',
  }),
});

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: ErrorResponseSchema } },
});

// =================================================================================
// Route Definitions
// =================================================================================

const statsRoute = createRoute({
  method: 'get',
  path: '/api/cache/stats',
  tags: ['Cache'],
  summary: 'Cache statistics',
  description: 'Entry counts by state (found, not_found, expired, corrupt) and total size. Read-only.',
  responses: {
    200: {
      description: 'Cache statistics',
      content: { 'application/json': { schema: createSuccessSchema(CacheStatsDataSchema, 'CacheStatsSuccess') } },
    },
    503: errorResponse('Cache directory unreadable'),
  },
});

const keysRoute = createRoute({
  method: 'get',
  path: '/api/cache/keys',
  tags: ['Cache'],
  summary: 'List cached lookup keys',
  responses: {
    200: {
      description: 'Sorted lookup keys of every readable record',
      content: { 'application/json': { schema: createSuccessSchema(CacheKeysDataSchema, 'CacheKeysSuccess') } },
    },
    503: errorResponse('Cache directory unreadable'),
  },
});

const getEntryRoute = createRoute({
  method: 'get',
  path: '/api/cache/{key}',
  tags: ['Cache'],
  summary: 'Read one cache entry',
  description: 'Expired and corrupt entries are removed on read and reported as missing.',
  request: { params: KeyParamSchema },
  responses: {
    200: {
      description: 'Cached record',
      content: { 'application/json': { schema: createSuccessSchema(CacheRecordDataSchema, 'CacheEntrySuccess') } },
    },
    400: errorResponse('Malformed lookup key'),
    404: errorResponse('No live entry for the key'),
  },
});

const deleteEntryRoute = createRoute({
  method: 'delete',
  path: '/api/cache/{key}',
  tags: ['Cache'],
  summary: 'Delete one cache entry',
  request: { params: KeyParamSchema },
  responses: {
    200: {
      description: 'Whether a file was removed',
      content: {
        'application/json': {
          schema: createSuccessSchema(
            z.object({ key: z.string(), deleted: z.boolean() }).openapi('CacheDeleteData'),
            'CacheDeleteSuccess'
          ),
        },
      },
    },
    400: errorResponse('Malformed lookup key'),
  },
});

const clearRoute = createRoute({
  method: 'post',
  path: '/api/cache/clear',
  tags: ['Cache'],
  summary: 'Clear the cache',
  request: { query: ClearQuerySchema },
  responses: {
    200: {
      description: 'Number of files deleted',
      content: {
        'application/json': {
          schema: createSuccessSchema(
            z.object({ deleted: z.number().int().nonnegative() }).openapi('CacheClearData'),
            'CacheClearSuccess'
          ),
        },
      },
    },
    503: errorResponse('Cache directory unwritable'),
  },
});

// =================================================================================
// Route Handlers
// =================================================================================

function requireLookupKey(key: string): string {
  if (!isValidLookupKey(key)) {
    throw new APIError(ErrorCode.INVALID_REQUEST, 'Malformed lookup key', { key });
  }
  return key;
}

export function createCacheRoutes(container: Container) {
  const app = createOpenAPIApp();
  const { cache } = container;

  // Static paths first: /api/cache/{key} would otherwise capture them
  app.openapi(statsRoute, async (c) => {
    return createSuccessResponse(c, await cache.stats());
  });

  app.openapi(keysRoute, async (c) => {
    const keys = await cache.keys();
    return createSuccessResponse(c, { count: keys.length, keys });
  });

  app.openapi(clearRoute, async (c) => {
    const { preserve_credentials } = c.req.valid('query');
    const deleted = await cache.clear(preserve_credentials === 'true' ? preserveCredentials : () => false);
    c.get('logger').info('Cache cleared via API', { deleted, preserveCredentials: preserve_credentials });
    return createSuccessResponse(c, { deleted });
  });

  app.openapi(getEntryRoute, async (c) => {
    const key = requireLookupKey(c.req.valid('param').key);
    const record = await cache.read(key);
    if (!record) {
      throw new APIError(ErrorCode.NOT_FOUND, 'No cache entry for key', { key });
    }
    return createSuccessResponse(c, record);
  });

  app.openapi(deleteEntryRoute, async (c) => {
    const key = requireLookupKey(c.req.valid('param').key);
    const deleted = await cache.delete(key);
    return createSuccessResponse(c, { key, deleted });
  });

  return app;
}
