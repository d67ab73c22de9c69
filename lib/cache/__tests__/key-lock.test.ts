import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../key-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise(resolve => setTimeout(resolve, 5));

describe('KeyedLock', () => {
  it('lets shared holders overlap', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.withShared('k', async () => {
      order.push('first-start');
      await gate.promise;
      order.push('first-end');
    });
    await lock.withShared('k', async () => {
      order.push('second');
    });

    expect(order).toEqual(['first-start', 'second']);
    gate.resolve();
    await first;
    expect(order).toEqual(['first-start', 'second', 'first-end']);
  });

  it('serves waiters in order, with a queued writer ahead of later readers', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const reader = lock.withShared('k', async () => {
      await gate.promise;
      order.push('reader');
    });
    const writer = lock.withExclusive('k', async () => {
      order.push('writer');
    });
    const lateReader = lock.withShared('k', async () => {
      order.push('late-reader');
    });

    await tick();
    expect(order).toEqual([]);

    gate.resolve();
    await Promise.all([reader, writer, lateReader]);
    expect(order).toEqual(['reader', 'writer', 'late-reader']);
    expect(lock.activeKeys).toBe(0);
  });

  it('never blocks across keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const held = lock.withExclusive('a', () => gate.promise);
    await expect(lock.withExclusive('b', async () => 'done')).resolves.toBe('done');
    expect(lock.activeKeys).toBe(1);

    gate.resolve();
    await held;
    expect(lock.activeKeys).toBe(0);
  });

  it('releases the lock when the holder throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.withExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.withExclusive('k', async () => 42)).resolves.toBe(42);
    expect(lock.activeKeys).toBe(0);
  });
});
