import { createRoute, z } from '@hono/zod-openapi';
import { createOpenAPIApp } from '../openapi.js';
import { createLookupContext, type Container } from '../services/container.js';
import {
  createSuccessSchema,
  ErrorResponseSchema,
  createSuccessResponse,
} from '../schemas/response.js';

const RefreshDataSchema = z.object({
  refreshed: z.boolean().describe('Fresh credentials are active'),
  source: z.enum(['default', 'persisted', 'fetched']),
  state: z.enum(['uninitialized', 'loaded', 'refreshing', 'cooling_down']),
}).openapi('CredentialRefreshData');

const refreshRoute = createRoute({
  method: 'post',
  path: '/api/credentials/refresh',
  tags: ['Credentials'],
  summary: 'Force a credential refresh',
  description: 'Scrapes the public site for a new key/secret pair. Inside the cooldown the previous outcome is returned without a network call.',
  responses: {
    200: {
      description: 'Refresh outcome',
      content: { 'application/json': { schema: createSuccessSchema(RefreshDataSchema, 'CredentialRefreshSuccess') } },
    },
    429: {
      description: 'Rate limit exceeded',
      content: { 'application/json': { schema: ErrorResponseSchema } },
    },
  },
});

export function createCredentialRoutes(container: Container) {
  const app = createOpenAPIApp();

  app.openapi(refreshRoute, async (c) => {
    const { credentials } = container;
    const refreshed = await credentials.forceRefresh(createLookupContext(container, c.get('logger')));

    return createSuccessResponse(c, {
      refreshed,
      source: credentials.credentialOrigin,
      state: credentials.state,
    });
  });

  return app;
}
