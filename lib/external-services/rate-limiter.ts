/**
 * Per-host token buckets
 *
 * Buckets refill lazily on each acquire; nothing runs in the background.
 * Token accounting is synchronous, so a waiter never holds anything across
 * its sleep or across the network call that follows.
 */

import { RateLimitTimeoutError } from './errors.js';

export interface RateLimitRule {
  /** Sustained requests per second */
  ratePerSecond: number;
  /** Bucket capacity (maximum burst) */
  burst: number;
}

/**
 * Upstream hosts and their politeness limits
 */
export const DEFAULT_HOST_LIMITS: Record<string, RateLimitRule> = {
  'rs.poms.omroep.nl': { ratePerSecond: 5, burst: 3 },
  'api.themoviedb.org': { ratePerSecond: 4, burst: 5 },
  'html.duckduckgo.com': { ratePerSecond: 0.5, burst: 2 },
  'www.startpage.com': { ratePerSecond: 0.5, burst: 1 },
  'www.vprogids.nl': { ratePerSecond: 2, burst: 3 },
  'www.cinema.nl': { ratePerSecond: 2, burst: 3 },
};

export const DEFAULT_MAX_WAIT_MS = 60_000;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise<void>(resolve => setTimeout(resolve, ms)),
};

export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;
  readonly capacity: number;
  readonly refillPerMs: number;

  constructor(rule: RateLimitRule, private readonly clock: Clock = systemClock) {
    if (rule.ratePerSecond <= 0 || rule.burst < 1) {
      throw new Error('Token bucket needs a positive rate and a burst of at least 1');
    }
    this.capacity = rule.burst;
    this.refillPerMs = rule.ratePerSecond / 1000;
    this.tokens = rule.burst;
    this.lastRefillAt = clock.now();
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefillAt;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefillAt = now;
    }
  }

  /**
   * Take one token if available, without waiting
   */
  tryTake(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Milliseconds until one full token is available
   */
  msUntilToken(): number {
    this.refill();
    return this.tokens >= 1 ? 0 : Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }
}

export class HostRateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly rules: Record<string, RateLimitRule> = DEFAULT_HOST_LIMITS,
    private readonly maxWaitMs: number = DEFAULT_MAX_WAIT_MS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Wait for a token for the URL's host
   *
   * Hosts without a rule pass straight through.
   *
   * @returns milliseconds spent waiting
   * @throws {RateLimitTimeoutError} when no token frees up within the wait bound
   */
  async acquire(url: string): Promise<number> {
    const host = new URL(url).hostname;
    const bucket = this.bucketFor(host);
    if (!bucket) return 0;

    const startedAt = this.clock.now();
    const deadline = startedAt + this.maxWaitMs;

    while (!bucket.tryTake()) {
      const wait = bucket.msUntilToken();
      const now = this.clock.now();
      if (now + wait > deadline) {
        throw new RateLimitTimeoutError(host, now - startedAt);
      }
      await this.clock.sleep(wait);
    }

    return this.clock.now() - startedAt;
  }

  private bucketFor(host: string): TokenBucket | null {
    const existing = this.buckets.get(host);
    if (existing) return existing;

    if (!Object.hasOwn(this.rules, host)) return null;

    const bucket = new TokenBucket(this.rules[host], this.clock);
    this.buckets.set(host, bucket);
    return bucket;
  }
}
