/**
 * Disk Cache
 *
 * Sharded JSON-file persistence of resolved and unresolved lookups.
 *
 * Layout: `{root}/{sha256(key)[0:2]}/{safeKey[0:80]}_{sha256(key)[0:12]}.json`
 *
 * - Writes go to a temp file and are renamed into place.
 * - Every read/write holds a per-file lock (shared for read, exclusive for write).
 * - TTL depends on status: found records live longer than not_found ones.
 * - Capacity is bounded by entry count and total bytes; the least recently
 *   accessed ~10% are evicted before a write that finds either ceiling reached.
 *   Reads never evict.
 *
 * Access times live in an in-memory index, seeded from file mtimes at open
 * and mirrored to mtime on each hit so the order survives restarts.
 */

import { createHash } from 'node:crypto';
import { access, constants, mkdir, readdir, stat, utimes } from 'node:fs/promises';
import { join } from 'node:path';
import type { LogSink } from '../logger.js';
import { silentLogger } from '../logger.js';
import { CorruptStateError, errorMessage } from '../external-services/errors.js';
import { parseLookupKey, sameTitleYearType, titleYearPrefix } from '../utils/lookup-key.js';
import { isNotFound, jsonByteLength, readJsonFile, removeFile, writeJsonAtomic } from './atomic-file.js';
import { CacheRecordSchema, type CacheRecord, type LookupStatus } from './cache-record.js';
import { KeyedLock } from './key-lock.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_TTL_FOUND_MS = 30 * DAY_MS;
export const DEFAULT_TTL_NOT_FOUND_MS = 7 * DAY_MS;
export const DEFAULT_MAX_ENTRIES = 10_000;
export const DEFAULT_MAX_SIZE_BYTES = 500 * 1024 * 1024;
export const EVICTION_FRACTION = 0.1;

export const CREDENTIALS_FILE_NAME = 'credentials.json';

export interface DiskCacheOptions {
  rootDir: string;
  ttlFoundMs?: number;
  ttlNotFoundMs?: number;
  maxEntries?: number;
  maxSizeBytes?: number;
  logger?: LogSink;
  /** Epoch milliseconds; injectable for TTL tests */
  now?: () => number;
}

/**
 * A file under the cache root, as offered to a `clear` predicate
 */
export interface CacheFileInfo {
  path: string;
  fileName: string;
  /** false for files at the root (credentials and other state) */
  sharded: boolean;
}

export type PreservePredicate = (file: CacheFileInfo) => boolean;

/**
 * Default `clear` policy: keep credential state
 */
export const preserveCredentials: PreservePredicate = (file) => file.fileName.includes('credentials');

export interface CacheStats {
  entryCounts: {
    total: number;
    found: number;
    notFound: number;
    expired: number;
    corrupt: number;
  };
  sizeBytes: number;
  maxEntries: number;
  maxSizeBytes: number;
}

interface IndexEntry {
  accessedAt: number;
  sizeBytes: number;
}

type CacheSettings = Required<Omit<DiskCacheOptions, 'logger' | 'now'>>;

export function hashKey(key: string): string {
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

export class DiskCache {
  private readonly settings: CacheSettings;
  private readonly logger: LogSink;
  private readonly now: () => number;
  private readonly locks = new KeyedLock();
  private readonly index = new Map<string, IndexEntry>();

  private constructor(options: DiskCacheOptions) {
    this.settings = {
      rootDir: options.rootDir,
      ttlFoundMs: options.ttlFoundMs ?? DEFAULT_TTL_FOUND_MS,
      ttlNotFoundMs: options.ttlNotFoundMs ?? DEFAULT_TTL_NOT_FOUND_MS,
      maxEntries: options.maxEntries ?? DEFAULT_MAX_ENTRIES,
      maxSizeBytes: options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES,
    };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Create the root directory and index what is already on disk
   */
  static async open(options: DiskCacheOptions): Promise<DiskCache> {
    const cache = new DiskCache(options);
    await mkdir(cache.settings.rootDir, { recursive: true });
    await cache.loadIndex();
    return cache;
  }

  get rootDir(): string {
    return this.settings.rootDir;
  }

  /** Path of the durable credential file kept beside the shards */
  get credentialsPath(): string {
    return join(this.settings.rootDir, CREDENTIALS_FILE_NAME);
  }

  pathFor(key: string): string {
    const hash = hashKey(key);
    const safeKey = key.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 80);
    return join(this.settings.rootDir, hash.slice(0, 2), `${safeKey}_${hash.slice(0, 12)}.json`);
  }

  ttlFor(status: LookupStatus): number {
    return status === 'found' ? this.settings.ttlFoundMs : this.settings.ttlNotFoundMs;
  }

  expiresAt(record: CacheRecord): number {
    return Date.parse(record.fetched_at) + this.ttlFor(record.status);
  }

  isExpired(record: CacheRecord): boolean {
    return this.now() >= this.expiresAt(record);
  }

  /**
   * Read a record; invalid or expired records are deleted and reported as a miss
   */
  async read(key: string): Promise<CacheRecord | null> {
    const path = this.pathFor(key);

    const outcome = await this.locks.withShared(path, async () => {
      const loaded = await this.load(path);
      if (loaded.kind !== 'ok') return loaded;
      if (loaded.record.lookup_key !== key) {
        return { kind: 'corrupt' as const, reason: 'lookup key mismatch' };
      }
      if (this.isExpired(loaded.record)) {
        return { kind: 'expired' as const, record: loaded.record };
      }
      await this.touch(path);
      return loaded;
    });

    switch (outcome.kind) {
      case 'ok':
        this.logger.debug('Cache hit', { key });
        return outcome.record;
      case 'missing':
        return null;
      case 'expired':
        this.logger.debug('Cache entry expired', { key, status: outcome.record.status });
        await this.discardStale(key, path);
        return null;
      case 'corrupt': {
        const error = new CorruptStateError(path, outcome.reason);
        this.logger.warn('Discarding corrupt cache entry', { key, error: error.message, reason: outcome.reason });
        await this.discardStale(key, path);
        return null;
      }
    }
  }

  /**
   * Persist a record, evicting first when a capacity ceiling is reached
   *
   * @returns false when the record is invalid or the write failed
   */
  async write(key: string, record: CacheRecord): Promise<boolean> {
    const parsed = CacheRecordSchema.safeParse({ ...record, lookup_key: key });
    if (!parsed.success) {
      this.logger.error('Refusing to cache invalid record', {
        key,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return false;
    }

    const path = this.pathFor(key);

    try {
      await this.evictIfNeeded(path, jsonByteLength(parsed.data));
      const sizeBytes = await this.locks.withExclusive(path, () => writeJsonAtomic(path, parsed.data));
      this.index.set(path, { accessedAt: this.now(), sizeBytes });
      this.logger.debug('Cache write', { key, status: record.status, sizeBytes });
      return true;
    } catch (error) {
      this.logger.error('Cache write failed', { key, error: errorMessage(error) });
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    const removed = await this.locks.withExclusive(path, () => removeFile(path));
    this.index.delete(path);
    return removed;
  }

  /**
   * Delete every file under the root except those the predicate keeps
   *
   * @returns number of files deleted
   */
  async clear(preserve: PreservePredicate = preserveCredentials): Promise<number> {
    let count = 0;
    for (const file of await this.listFiles(true)) {
      if (preserve(file)) continue;
      const removed = await this.locks.withExclusive(file.path, () => removeFile(file.path));
      this.index.delete(file.path);
      if (removed) count++;
    }
    this.logger.info('Cache cleared', { deleted: count });
    return count;
  }

  /**
   * Count entries by state; read-only, nothing is deleted
   */
  async stats(): Promise<CacheStats> {
    const counts = { total: 0, found: 0, notFound: 0, expired: 0, corrupt: 0 };
    let sizeBytes = 0;

    for (const file of await this.listFiles(false)) {
      const loaded = await this.locks.withShared(file.path, () => this.load(file.path));
      if (loaded.kind === 'missing') continue;

      counts.total++;
      sizeBytes += loaded.sizeBytes;
      if (loaded.kind === 'corrupt') {
        counts.corrupt++;
      } else if (this.isExpired(loaded.record)) {
        counts.expired++;
      } else if (loaded.record.status === 'found') {
        counts.found++;
      } else {
        counts.notFound++;
      }
    }

    return {
      entryCounts: counts,
      sizeBytes,
      maxEntries: this.settings.maxEntries,
      maxSizeBytes: this.settings.maxSizeBytes,
    };
  }

  /**
   * Lookup keys of every readable record, sorted
   */
  async keys(): Promise<string[]> {
    const keys: string[] = [];
    for (const file of await this.listFiles(false)) {
      const loaded = await this.locks.withShared(file.path, () => this.load(file.path));
      if (loaded.kind === 'ok') keys.push(loaded.record.lookup_key);
    }
    return keys.sort();
  }

  /**
   * Fallback for keys without an external id: any live record for the same
   * title, year and media type, whatever external id it was stored under
   */
  async findByTitleYear(key: string): Promise<CacheRecord | null> {
    const prefix = titleYearPrefix(key);
    if (!prefix || parseLookupKey(key)?.externalId !== null) return null;

    for (const file of await this.listFiles(false)) {
      // File names start with the key, so the prefix only narrows the scan
      if (!file.fileName.startsWith(prefix)) continue;
      const loaded = await this.locks.withShared(file.path, () => this.load(file.path));
      if (loaded.kind !== 'ok') continue;

      const { record } = loaded;
      if (sameTitleYearType(record.lookup_key, key) && !this.isExpired(record)) {
        this.logger.debug('Cache hit via title/year fallback', { key, storedKey: record.lookup_key });
        return record;
      }
    }
    return null;
  }

  /**
   * Whether the cache root accepts writes (health check)
   */
  async isWritable(): Promise<boolean> {
    try {
      await access(this.settings.rootDir, constants.W_OK);
      return true;
    } catch (error) {
      this.logger.warn('Cache directory not writable', { rootDir: this.settings.rootDir, error: errorMessage(error) });
      return false;
    }
  }

  // =================================================================================
  // Internals
  // =================================================================================

  private async load(path: string): Promise<
    | { kind: 'ok'; record: CacheRecord; sizeBytes: number }
    | { kind: 'missing' }
    | { kind: 'corrupt'; reason: string; sizeBytes: number }
  > {
    let sizeBytes: number;
    try {
      sizeBytes = (await stat(path)).size;
    } catch (error) {
      if (isNotFound(error)) return { kind: 'missing' };
      throw error;
    }

    let payload: unknown;
    try {
      payload = await readJsonFile(path);
    } catch (error) {
      return { kind: 'corrupt', reason: errorMessage(error), sizeBytes };
    }
    if (payload === null) return { kind: 'missing' };

    const parsed = CacheRecordSchema.safeParse(payload);
    if (!parsed.success) {
      return { kind: 'corrupt', reason: parsed.error.issues[0]?.message ?? 'invalid record', sizeBytes };
    }
    return { kind: 'ok', record: parsed.data, sizeBytes };
  }

  private async touch(path: string): Promise<void> {
    const now = this.now();
    const entry = this.index.get(path);
    if (entry) {
      entry.accessedAt = now;
    }
    try {
      const seconds = now / 1000;
      await utimes(path, seconds, seconds);
    } catch (error) {
      this.logger.debug('Could not update access time', { path, error: errorMessage(error) });
    }
  }

  /**
   * Delete an entry found expired or corrupt under the shared lock. It is
   * checked again under the exclusive lock, since a writer may have
   * replaced it in between.
   */
  private async discardStale(key: string, path: string): Promise<void> {
    try {
      await this.locks.withExclusive(path, async () => {
        const loaded = await this.load(path);
        if (loaded.kind === 'missing') return;
        if (loaded.kind === 'ok' && loaded.record.lookup_key === key && !this.isExpired(loaded.record)) return;
        await removeFile(path);
        this.index.delete(path);
      });
    } catch (error) {
      this.logger.warn('Could not delete cache entry', { path, error: errorMessage(error) });
    }
  }

  /**
   * Make room for an incoming file. Ceilings are checked against the cache
   * as it will be after the write, so replacing an existing entry only
   * counts its change in size.
   */
  private async evictIfNeeded(incomingPath: string, incomingBytes: number): Promise<void> {
    const existing = this.index.get(incomingPath);
    let entries = this.index.size + (existing ? 0 : 1);
    let totalBytes = incomingBytes - (existing?.sizeBytes ?? 0);
    for (const entry of this.index.values()) totalBytes += entry.sizeBytes;

    const overCount = entries > this.settings.maxEntries;
    const overSize = totalBytes > this.settings.maxSizeBytes;
    if (!overCount && !overSize) return;

    const candidates = [...this.index.entries()]
      .filter(([path]) => path !== incomingPath)
      .sort(([, a], [, b]) => a.accessedAt - b.accessedAt);
    const batch = Math.max(1, Math.floor(this.index.size * EVICTION_FRACTION));

    const victims: string[] = [];
    for (const [path, entry] of candidates) {
      const withinCeilings = entries <= this.settings.maxEntries && totalBytes <= this.settings.maxSizeBytes;
      if (victims.length >= batch && withinCeilings) break;
      victims.push(path);
      entries--;
      totalBytes -= entry.sizeBytes;
    }

    for (const path of victims) {
      await this.locks.withExclusive(path, () => removeFile(path));
      this.index.delete(path);
    }

    this.logger.info('Cache eviction', {
      evicted: victims.length,
      reason: overCount ? 'entries' : 'size',
      remaining: this.index.size,
    });
  }

  private async loadIndex(): Promise<void> {
    for (const file of await this.listFiles(false)) {
      try {
        const info = await stat(file.path);
        this.index.set(file.path, { accessedAt: info.mtimeMs, sizeBytes: info.size });
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
  }

  /**
   * Cache record files in shard directories, plus root-level files when asked
   */
  private async listFiles(includeRoot: boolean): Promise<CacheFileInfo[]> {
    const files: CacheFileInfo[] = [];
    const rootEntries = await readdir(this.settings.rootDir, { withFileTypes: true });

    for (const entry of rootEntries) {
      if (entry.isFile()) {
        if (includeRoot && !entry.name.endsWith('.tmp')) {
          files.push({ path: join(this.settings.rootDir, entry.name), fileName: entry.name, sharded: false });
        }
        continue;
      }
      if (!entry.isDirectory() || !/^[0-9a-f]{2}$/.test(entry.name)) continue;

      const shardDir = join(this.settings.rootDir, entry.name);
      let names: string[];
      try {
        names = await readdir(shardDir);
      } catch (error) {
        if (isNotFound(error)) continue;
        throw error;
      }
      for (const name of names) {
        if (name.endsWith('.json')) {
          files.push({ path: join(shardDir, name), fileName: name, sharded: true });
        }
      }
    }

    return files;
  }
}
