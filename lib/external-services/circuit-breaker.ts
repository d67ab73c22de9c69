/**
 * Circuit breaker for the web fallback
 *
 * Opens after `failureThreshold` failures inside `failureWindowMs` and stays
 * open for `recoveryMs`. Evaluated lazily on each check; no timers.
 */

import type { LogSink } from '../logger.js';
import { silentLogger } from '../logger.js';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold?: number;
  failureWindowMs?: number;
  recoveryMs?: number;
  logger?: LogSink;
  now?: () => number;
}

export type CircuitState = 'closed' | 'open';

export class CircuitBreaker {
  private failures: number[] = [];
  private openedAt: number | null = null;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly failureWindowMs: number;
  private readonly recoveryMs: number;
  private readonly logger: LogSink;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.failureWindowMs = options.failureWindowMs ?? 60_000;
    this.recoveryMs = options.recoveryMs ?? 300_000;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get state(): CircuitState {
    return this.isOpen() ? 'open' : 'closed';
  }

  isOpen(): boolean {
    if (this.openedAt === null) return false;

    if (this.now() - this.openedAt >= this.recoveryMs) {
      this.openedAt = null;
      this.failures = [];
      this.logger.info('Circuit breaker closed (recovered)', { breaker: this.name });
      return false;
    }
    return true;
  }

  recordSuccess(): void {
    this.failures = [];
    if (this.openedAt !== null) {
      this.openedAt = null;
      this.logger.info('Circuit breaker closed (success)', { breaker: this.name });
    }
  }

  recordFailure(): void {
    const now = this.now();
    this.failures = this.failures.filter(at => now - at < this.failureWindowMs);
    this.failures.push(now);

    if (this.openedAt === null && this.failures.length >= this.failureThreshold) {
      this.openedAt = now;
      this.logger.warn('Circuit breaker opened', { breaker: this.name, failures: this.failures.length });
    }
  }
}
