import { randomUUID } from 'node:crypto';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import { createOpenAPIApp, registerOpenAPIDoc } from './openapi.js';
import type { Container } from './services/container.js';
import { errorHandler } from '../middleware/error-handler.js';
import { rateLimiter, RateLimitStore } from '../middleware/rate-limiter.js';
import { Logger } from '../lib/logger.js';

// Route imports
import { createHealthRoutes } from './routes/health.js';
import { createLookupRoutes } from './routes/lookup.js';
import { createCacheRoutes } from './routes/cache.js';
import { createCredentialRoutes } from './routes/credentials.js';
import { createStatsRoutes } from './routes/stats.js';

export interface AppOptions {
  /** Inbound rate-limit state; injectable so tests control the clock */
  rateLimitStore?: RateLimitStore;
}

// =================================================================================
// Application Setup
// =================================================================================

export function createApp(container: Container, options: AppOptions = {}) {
  const app = createOpenAPIApp();

  // =================================================================================
  // Global Middleware
  // =================================================================================

  // CORS
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
    exposeHeaders: ['X-Request-ID', 'X-Response-Time'],
    maxAge: 86400,
  }));

  // Security headers
  app.use('*', secureHeaders());

  // Error handler
  app.onError(errorHandler);

  // Request ID middleware
  app.use('*', async (c, next) => {
    const requestId = c.req.header('x-request-id') || randomUUID();
    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);
    await next();
  });

  // Logger middleware
  app.use('*', async (c, next) => {
    const logger = Logger.forRequest(container.loggerOptions, c.get('requestId'));
    c.set('logger', logger);
    c.set('startTime', Date.now());
    logger.debug('Request received', { method: c.req.method, path: c.req.path });
    await next();
  });

  // Response timing middleware
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    c.header('X-Response-Time', `${Date.now() - start}ms`);
  });

  // Per-client limit on everything that can reach an upstream
  app.use('/api/*', rateLimiter(
    { maxRequests: container.config.API_RATE_LIMIT_PER_MINUTE, windowSeconds: 60 },
    options.rateLimitStore
  ));

  // =================================================================================
  // Routes
  // =================================================================================

  // Collect sub-routers for OpenAPI document merging
  const subRouters = [
    createHealthRoutes(container),
    createLookupRoutes(container),
    createCacheRoutes(container),
    createCredentialRoutes(container),
    createStatsRoutes(container),
  ];

  // Register route modules
  for (const router of subRouters) {
    app.route('/', router);
  }

  // Register OpenAPI documentation endpoint AFTER all routes are mounted
  registerOpenAPIDoc(app, subRouters, container.logger);

  return app;
}

export type ResolverApp = ReturnType<typeof createApp>;
