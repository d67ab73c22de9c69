import { createRoute, z } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import type { Container } from '../services/container.js';
import {
  createSuccessSchema,
  ErrorResponseSchema,
  createSuccessResponse,
} from '../schemas/response.js';

// =================================================================================
// Health Data Schema
// =================================================================================

const HealthDataSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  cache_writable: z.boolean(),
  credential_source: z.enum(['default', 'persisted', 'fetched']),
  credential_state: z.enum(['uninitialized', 'loaded', 'refreshing', 'cooling_down']),
  alternate_titles: z.enum(['configured', 'not_configured']),
  web_fallback: z.enum(['closed', 'open', 'disabled']),
  uptime_seconds: z.number().int().nonnegative(),
}).openapi('HealthData');

// Success response with envelope
const HealthSuccessSchema = createSuccessSchema(HealthDataSchema, 'HealthSuccess');

// =================================================================================
// Health Route Definition
// =================================================================================

const healthRoute = createRoute({
  method: 'get',
  path: '/health',
  tags: ['System'],
  summary: 'System health check',
  description: 'Reports whether the cache directory accepts writes and where the active API credentials came from.',
  responses: {
    200: {
      description: 'Health status (degraded when the cache directory is read-only)',
      content: {
        'application/json': {
          schema: HealthSuccessSchema,
        },
      },
    },
    500: {
      description: 'Internal server error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

// =================================================================================
// Route Handler
// =================================================================================

export function createHealthRoutes(container: Container) {
  const app = createOpenAPIApp();

  app.openapi(healthRoute, async (c) => {
    const cacheWritable = await container.cache.isWritable();

    return createSuccessResponse(c, {
      status: cacheWritable ? 'ok' as const : 'degraded' as const,
      cache_writable: cacheWritable,
      credential_source: container.credentials.credentialOrigin,
      credential_state: container.credentials.state,
      alternate_titles: container.tmdb.isAvailable() ? 'configured' as const : 'not_configured' as const,
      web_fallback: container.config.WEB_FALLBACK_ENABLED ? container.webFallback.breakerState : 'disabled' as const,
      uptime_seconds: Math.floor((Date.now() - container.startedAt) / 1000),
    });
  });

  return app;
}
