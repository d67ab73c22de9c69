/**
 * Credential Manager
 *
 * Owns the primary API's key/secret pair:
 *
 *   uninitialized → loaded ⇄ refreshing → cooling_down → loaded
 *
 * - `currentCredentials()` never blocks and never fails; before anything
 *   was fetched it returns the configured defaults.
 * - `forceRefresh()` runs at most one refresh at a time; concurrent callers
 *   share the in-flight promise.
 * - Every attempt, successful or not, starts a cooldown during which
 *   further calls return the last outcome without touching the network.
 * - New credentials replace the old object and are persisted with
 *   write-then-rename.
 */

import { z } from 'zod';
import { load } from 'cheerio';
import type { LogSink } from '../../logger.js';
import { silentLogger } from '../../logger.js';
import { readJsonFile, writeJsonAtomic } from '../../cache/atomic-file.js';
import { CorruptStateError, errorMessage } from '../errors.js';
import type { ServiceHttpClient } from '../http-client.js';
import type { ServiceContext } from '../service-context.js';
import { DEFAULT_EXTRACTORS, extractTokens, type CredentialExtractor } from './extractors.js';

export const CREDENTIAL_PAGE_URL = 'https://www.vprogids.nl/cinema/zoek.html';
export const DEFAULT_COOLDOWN_MS = 60_000;
const MAX_SCRIPTS_FOLLOWED = 10;

export type CredentialState = 'uninitialized' | 'loaded' | 'refreshing' | 'cooling_down';
export type CredentialOrigin = 'default' | 'persisted' | 'fetched';

export interface Credentials {
  readonly key: string;
  readonly secret: string;
  /** ISO timestamp; null for built-in defaults */
  readonly fetchedAt: string | null;
  /** URL the pair was extracted from, or 'default' */
  readonly source: string;
}

export interface CredentialManagerOptions {
  filePath: string;
  httpClient: ServiceHttpClient;
  defaults: { key: string; secret: string };
  pageUrl?: string;
  cooldownMs?: number;
  extractors?: readonly CredentialExtractor[];
  logger?: LogSink;
  now?: () => number;
}

const CredentialFileSchema = z.object({
  api_key: z.string().min(1),
  api_secret: z.string().min(1),
  fetched_at: z.string().datetime(),
  source: z.string(),
});

export class CredentialManager {
  private credentials: Credentials;
  private origin: CredentialOrigin = 'default';
  private initialized = false;
  private inFlight: Promise<boolean> | null = null;
  private lastAttemptAt: number | null = null;
  private lastAttemptSucceeded = false;

  private readonly filePath: string;
  private readonly httpClient: ServiceHttpClient;
  private readonly pageUrl: string;
  private readonly cooldownMs: number;
  private readonly extractors: readonly CredentialExtractor[];
  private readonly logger: LogSink;
  private readonly now: () => number;

  constructor(options: CredentialManagerOptions) {
    if (!options.defaults.key || !options.defaults.secret) {
      throw new Error('Default credentials must be non-empty');
    }
    this.filePath = options.filePath;
    this.httpClient = options.httpClient;
    this.pageUrl = options.pageUrl ?? CREDENTIAL_PAGE_URL;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.extractors = options.extractors ?? DEFAULT_EXTRACTORS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.credentials = Object.freeze({
      key: options.defaults.key,
      secret: options.defaults.secret,
      fetchedAt: null,
      source: 'default',
    });
  }

  /**
   * Construct and load persisted credentials (absent or corrupt state keeps the defaults)
   */
  static async load(options: CredentialManagerOptions): Promise<CredentialManager> {
    const manager = new CredentialManager(options);
    await manager.loadPersisted();
    return manager;
  }

  currentCredentials(): Credentials {
    return this.credentials;
  }

  get credentialOrigin(): CredentialOrigin {
    return this.origin;
  }

  get state(): CredentialState {
    if (this.inFlight) return 'refreshing';
    if (!this.initialized) return 'uninitialized';
    if (this.inCooldown()) return 'cooling_down';
    return 'loaded';
  }

  /**
   * Fetch fresh credentials from the public site
   *
   * @returns true when fresh credentials are active: this call (or the
   *          in-flight one it joined) succeeded, or it fell inside the
   *          cooldown of an attempt that succeeded
   */
  forceRefresh(context: ServiceContext): Promise<boolean> {
    if (this.inFlight) {
      context.logger.debug('Joining in-flight credential refresh');
      return this.inFlight;
    }

    if (this.inCooldown()) {
      context.logger.info('Credential refresh skipped during cooldown', {
        lastAttemptSucceeded: this.lastAttemptSucceeded,
      });
      return Promise.resolve(this.lastAttemptSucceeded);
    }

    this.lastAttemptAt = this.now();
    const refresh = this.fetchFresh(context).then(success => {
      this.lastAttemptSucceeded = success;
      this.lastAttemptAt = this.now();
      return success;
    }).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = refresh;
    return refresh;
  }

  private inCooldown(): boolean {
    return this.lastAttemptAt !== null && this.now() - this.lastAttemptAt < this.cooldownMs;
  }

  private async loadPersisted(): Promise<void> {
    try {
      const payload = await readJsonFile(this.filePath);
      if (payload === null) {
        this.logger.debug('No persisted credentials, using defaults');
        return;
      }

      const parsed = CredentialFileSchema.safeParse(payload);
      if (!parsed.success) {
        throw new CorruptStateError(this.filePath, parsed.error);
      }

      this.credentials = Object.freeze({
        key: parsed.data.api_key,
        secret: parsed.data.api_secret,
        fetchedAt: parsed.data.fetched_at,
        source: parsed.data.source,
      });
      this.origin = 'persisted';
      this.logger.info('Loaded persisted credentials', {
        keyPrefix: parsed.data.api_key.slice(0, 4),
        fetchedAt: parsed.data.fetched_at,
      });
    } catch (error) {
      this.logger.warn('Ignoring unreadable credential file', { path: this.filePath, error: errorMessage(error) });
    } finally {
      this.initialized = true;
    }
  }

  private async fetchFresh(context: ServiceContext): Promise<boolean> {
    const { logger } = context;
    logger.info('Fetching fresh API credentials', { url: this.pageUrl });

    try {
      const html = await this.httpClient.fetchText(this.pageUrl, {}, context);
      if (html === null) {
        logger.warn('Credential page unavailable', { url: this.pageUrl });
        return false;
      }

      let found = extractTokens(html, this.extractors);
      let source = this.pageUrl;

      if (!found) {
        for (const scriptUrl of this.scriptUrls(html).slice(0, MAX_SCRIPTS_FOLLOWED)) {
          const script = await this.httpClient.fetchText(scriptUrl, {}, context);
          if (script === null) continue;
          found = extractTokens(script, this.extractors);
          if (found) {
            source = scriptUrl;
            break;
          }
        }
      }

      if (!found) {
        logger.warn('Could not extract credentials from credential page or its scripts');
        return false;
      }

      const fresh: Credentials = Object.freeze({
        key: found.pair.key,
        secret: found.pair.secret,
        fetchedAt: new Date(this.now()).toISOString(),
        source,
      });
      this.credentials = fresh;
      this.origin = 'fetched';
      logger.info('Extracted fresh credentials', {
        extractor: found.extractor,
        keyPrefix: fresh.key.slice(0, 4),
        source,
      });

      await this.persist(fresh, logger);
      return true;
    } catch (error) {
      logger.error('Credential refresh failed', { error: errorMessage(error) });
      return false;
    }
  }

  private async persist(credentials: Credentials, logger: LogSink): Promise<void> {
    try {
      await writeJsonAtomic(this.filePath, {
        api_key: credentials.key,
        api_secret: credentials.secret,
        fetched_at: credentials.fetchedAt,
        source: credentials.source,
      });
    } catch (error) {
      // In-memory credentials stay active until restart
      logger.warn('Could not persist credentials', { path: this.filePath, error: errorMessage(error) });
    }
  }

  /**
   * Absolute http(s) URLs of the page's external scripts
   */
  private scriptUrls(html: string): string[] {
    const $ = load(html);
    const urls: string[] = [];
    $('script[src]').each((_, element) => {
      const src = $(element).attr('src');
      if (!src || !URL.canParse(src, this.pageUrl)) return;
      const url = new URL(src, this.pageUrl);
      if (url.protocol === 'https:' || url.protocol === 'http:') urls.push(url.toString());
    });
    return urls;
  }
}
