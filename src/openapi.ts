import { OpenAPIHono } from '@hono/zod-openapi';
import type { AppBindings } from './env.js';
import type { LogSink } from '../lib/logger.js';
import { APIError, ErrorCode } from './schemas/response.js';

type OpenAPIDocument = ReturnType<OpenAPIHono<AppBindings>['getOpenAPI31Document']>;

// =================================================================================
// OpenAPI Configuration
// =================================================================================

/**
 * OpenAPI document configuration
 */
export const openAPIConfig = {
  openapi: '3.1.0' as const,
  info: {
    title: 'Film Synopsis Resolver API',
    version: '1.0.0',
    description: `Resolve a film or series (title, year, optional IMDB id) to a Dutch synopsis,
Kijkwijzer rating and auxiliary identifiers.

## Resolution chain
- **Primary**: NPO POMS search (signed requests)
- **Alternate titles**: TMDB original and foreign titles retried against POMS
- **Web fallback**: site search and cinema.nl page scraping

Every outcome, including "not found", is cached on disk.
`,
  },
  servers: [
    {
      url: 'http://localhost:5100',
      description: 'Local Development',
    },
  ],
  tags: [
    { name: 'System', description: 'Health checks and pipeline counters' },
    { name: 'Lookup', description: 'Synopsis resolution and candidate search' },
    { name: 'Cache', description: 'Disk cache inspection and maintenance' },
    { name: 'Credentials', description: 'Primary API credential management' },
  ],
};

/**
 * Creates the OpenAPI-enabled Hono app
 *
 * Request validation failures are thrown as VALIDATION_ERROR so they reach
 * the error handler and come back in the standard envelope.
 */
export const createOpenAPIApp = () => {
  return new OpenAPIHono<AppBindings>({
    defaultHook: (result) => {
      if (!result.success) {
        throw new APIError(ErrorCode.VALIDATION_ERROR, 'Invalid request parameters', {
          issues: result.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
      }
    },
  });
};

/**
 * Registers the OpenAPI documentation endpoint
 * Call this AFTER all routes are mounted
 *
 * Sub-routers don't share OpenAPI registries, so their documents are merged.
 */
export const registerOpenAPIDoc = (
  app: OpenAPIHono<AppBindings>,
  subRouters: OpenAPIHono<AppBindings>[],
  logger: LogSink
) => {
  app.get('/openapi.json', (c) => {
    const mergedDoc: OpenAPIDocument = {
      ...openAPIConfig,
      paths: {},
      components: {
        schemas: {},
      },
    };
    const paths = mergedDoc.paths ?? {};
    const schemas = mergedDoc.components?.schemas ?? {};

    subRouters.forEach((router, i) => {
      try {
        const subDoc = router.getOpenAPI31Document(openAPIConfig);
        Object.assign(paths, subDoc.paths);
        Object.assign(schemas, subDoc.components?.schemas);
      } catch (error) {
        logger.warn('OpenAPI router skipped', {
          router: i,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    return c.json(mergedDoc);
  });
};
