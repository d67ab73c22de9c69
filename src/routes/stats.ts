import { createRoute, z } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import type { Container } from '../services/container.js';
import { createSuccessSchema, createSuccessResponse } from '../schemas/response.js';

// =================================================================================
// Stats Data Schemas
// =================================================================================

const count = () => z.number().int().nonnegative();

const ProviderStatsSchema = z.object({
  requests: count(),
  errors: count(),
  totalLatencyMs: z.number().nonnegative(),
  avgLatencyMs: z.number().nonnegative(),
}).openapi('ProviderStats');

const StatsDataSchema = z.object({
  lookups: z.object({
    cache_hit: count(),
    found: count(),
    not_found: count(),
    aborted: count(),
  }),
  methods: z.object({
    poms: count(),
    tmdb_alt: count(),
    web: count(),
  }),
  providers: z.record(z.string(), ProviderStatsSchema),
  since: z.string().datetime(),
}).openapi('StatsData');

// =================================================================================
// Stats Route Definition
// =================================================================================

const statsRoute = createRoute({
  method: 'get',
  path: '/api/stats',
  tags: ['System'],
  summary: 'Pipeline counters',
  description: 'Lookup outcomes, winning stages and per-provider request counts since process start.',
  responses: {
    200: {
      description: 'Counters',
      content: {
        'application/json': {
          schema: createSuccessSchema(StatsDataSchema, 'StatsSuccess'),
        },
      },
      headers: z.object({
        'cache-control': z.string().openapi({
          example: 'no-store',
        }),
      }),
    },
  },
});

export function createStatsRoutes(container: Container) {
  const app = createOpenAPIApp();

  app.openapi(statsRoute, (c) => {
    return createSuccessResponse(c, container.metrics.snapshot(), {
      'cache-control': 'no-store',
    });
  });

  return app;
}
