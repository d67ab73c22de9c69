/**
 * Component graph
 *
 * One explicitly constructed set of long-lived components per process:
 * the shared per-host limiter, the disk cache, the credential manager,
 * the providers and the orchestrator that sequences them.
 */

import type { AppConfig } from '../env.js';
import { Logger, type LoggerOptions, type LogSink } from '../../lib/logger.js';
import { DiskCache } from '../../lib/cache/disk-cache.js';
import { CredentialManager } from '../../lib/external-services/credentials/credential-manager.js';
import { HostRateLimiter, DEFAULT_HOST_LIMITS } from '../../lib/external-services/rate-limiter.js';
import { ServiceHttpClient } from '../../lib/external-services/http-client.js';
import { CircuitBreaker } from '../../lib/external-services/circuit-breaker.js';
import { LookupMetrics } from '../../lib/external-services/analytics.js';
import { createServiceContext, type ServiceContext } from '../../lib/external-services/service-context.js';
import { CinemaPageScraper } from '../../lib/external-services/providers/cinema-page-scraper.js';
import { PomsProvider } from '../../lib/external-services/providers/poms-provider.js';
import { TmdbProvider } from '../../lib/external-services/providers/tmdb-provider.js';
import { WebFallbackProvider } from '../../lib/external-services/providers/web-fallback-provider.js';
import { ResolutionOrchestrator } from '../../lib/external-services/orchestrators/resolution-orchestrator.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface Container {
  config: AppConfig;
  loggerOptions: LoggerOptions;
  logger: Logger;
  cache: DiskCache;
  credentials: CredentialManager;
  poms: PomsProvider;
  tmdb: TmdbProvider;
  webFallback: WebFallbackProvider;
  orchestrator: ResolutionOrchestrator;
  metrics: LookupMetrics;
  startedAt: number;
}

/**
 * Context for one pipeline call, reporting into the process metrics
 */
export function createLookupContext(
  container: Container,
  logger: LogSink,
  signal?: AbortSignal
): ServiceContext {
  return createServiceContext(logger, {
    timeoutMs: container.config.HTTP_TIMEOUT_MS,
    signal,
    onEvent: container.metrics.record,
  });
}

export async function buildContainer(config: AppConfig): Promise<Container> {
  const loggerOptions: LoggerOptions = {
    level: config.LOG_LEVEL,
    structured: config.STRUCTURED_LOGGING,
  };
  const logger = new Logger(loggerOptions);

  const rateLimiter = new HostRateLimiter(DEFAULT_HOST_LIMITS, config.RATE_LIMIT_MAX_WAIT_SECONDS * 1000);
  const httpClient = (providerName: string) => new ServiceHttpClient({
    providerName,
    rateLimiter,
    maxRetries: config.HTTP_MAX_RETRIES,
    defaultTimeout: config.HTTP_TIMEOUT_MS,
  });

  const cache = await DiskCache.open({
    rootDir: config.CACHE_DIR,
    ttlFoundMs: config.CACHE_TTL_FOUND_DAYS * DAY_MS,
    ttlNotFoundMs: config.CACHE_TTL_NOT_FOUND_DAYS * DAY_MS,
    maxEntries: config.CACHE_MAX_ENTRIES,
    maxSizeBytes: config.CACHE_MAX_SIZE_MB * 1024 * 1024,
    logger: logger.child({ component: 'cache' }),
  });

  const credentials = await CredentialManager.load({
    filePath: cache.credentialsPath,
    httpClient: httpClient('credentials'),
    defaults: { key: config.POMS_API_KEY, secret: config.POMS_API_SECRET },
    cooldownMs: config.CREDENTIAL_COOLDOWN_SECONDS * 1000,
    logger: logger.child({ component: 'credentials' }),
  });

  const scraper = new CinemaPageScraper(httpClient('cinema'));

  const poms = new PomsProvider({
    client: httpClient('poms'),
    credentials,
    pageScraper: scraper,
    matchPolicy: {
      similarityThreshold: config.TITLE_SIMILARITY_THRESHOLD,
      yearTolerance: config.YEAR_TOLERANCE,
    },
  });

  const tmdb = new TmdbProvider({
    client: httpClient('tmdb'),
    apiKey: config.TMDB_API_KEY,
  });

  const webFallback = new WebFallbackProvider({
    client: httpClient('web-fallback'),
    scraper,
    breaker: new CircuitBreaker({ name: 'web-fallback', logger: logger.child({ component: 'breaker' }) }),
    yearTolerance: config.YEAR_TOLERANCE,
    enabled: config.WEB_FALLBACK_ENABLED,
  });

  const orchestrator = new ResolutionOrchestrator({
    cache,
    credentials,
    primary: poms,
    alternateTitles: tmdb,
    webFallback,
  });

  logger.info('Components ready', {
    cacheDir: cache.rootDir,
    credentialSource: credentials.credentialOrigin,
    alternateTitles: tmdb.isAvailable(),
    webFallback: config.WEB_FALLBACK_ENABLED,
  });

  return {
    config,
    loggerOptions,
    logger,
    cache,
    credentials,
    poms,
    tmdb,
    webFallback,
    orchestrator,
    metrics: new LookupMetrics(),
    startedAt: Date.now(),
  };
}
