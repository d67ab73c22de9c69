/**
 * Node entry point: configuration, component graph, HTTP listener
 */

import { serve } from '@hono/node-server';
import { ConfigError, loadConfig } from './env.js';
import { createApp } from './index.js';
import { buildContainer } from './services/container.js';
import { Logger } from '../lib/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const container = await buildContainer(config);
  const app = createApp(container);
  const { logger } = container;

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    logger.info('Listening', { port: info.port, cacheDir: config.CACHE_DIR });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        logger.error('Server close failed', { error: error.message });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  const logger = new Logger({ level: 'error' });
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: error.issues });
  } else {
    logger.error('Startup failed', { error: error instanceof Error ? error.message : String(error) });
  }
  process.exitCode = 1;
});
