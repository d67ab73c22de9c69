import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker } from '../circuit-breaker.js';

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker({ name: 'test', now: () => now });
  });

  it('opens after three failures inside the window', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.state).toBe('closed');

    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(true);
    expect(breaker.state).toBe('open');
  });

  it('forgets failures older than the window', () => {
    breaker.recordFailure();
    now = 30_000;
    breaker.recordFailure();
    now = 70_000;
    breaker.recordFailure();

    expect(breaker.state).toBe('closed');
  });

  it('closes again after the recovery period', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();

    now = 299_999;
    expect(breaker.isOpen()).toBe(true);
    now = 300_000;
    expect(breaker.isOpen()).toBe(false);
  });

  it('resets the failure count on success', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.state).toBe('closed');
  });
});
