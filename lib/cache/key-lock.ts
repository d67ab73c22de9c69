/**
 * Per-key shared/exclusive locks
 *
 * One lock per cache file, never a global one, so unrelated keys never
 * contend. Waiters are served FIFO; a queued writer blocks later readers.
 */

type LockMode = 'shared' | 'exclusive';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

interface LockState {
  readers: number;
  writer: boolean;
  queue: Waiter[];
}

export class KeyedLock {
  private readonly states = new Map<string, LockState>();

  async withShared<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.run(key, 'shared', fn);
  }

  async withExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.run(key, 'exclusive', fn);
  }

  /** Keys with a holder or a waiter */
  get activeKeys(): number {
    return this.states.size;
  }

  private async run<T>(key: string, mode: LockMode, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key, mode);
    try {
      return await fn();
    } finally {
      this.release(key, mode);
    }
  }

  private acquire(key: string, mode: LockMode): Promise<void> {
    let state = this.states.get(key);
    if (!state) {
      state = { readers: 0, writer: false, queue: [] };
      this.states.set(key, state);
    }

    if (state.queue.length === 0 && this.compatible(state, mode)) {
      this.take(state, mode);
      return Promise.resolve();
    }

    const waiting = state;
    return new Promise<void>(resolve => {
      waiting.queue.push({ mode, grant: resolve });
    });
  }

  private release(key: string, mode: LockMode): void {
    const state = this.states.get(key);
    if (!state) return;

    if (mode === 'exclusive') {
      state.writer = false;
    } else {
      state.readers--;
    }

    while (state.queue.length > 0 && this.compatible(state, state.queue[0].mode)) {
      const next = state.queue.shift();
      if (!next) break;
      this.take(state, next.mode);
      next.grant();
      if (next.mode === 'exclusive') break;
    }

    if (state.readers === 0 && !state.writer && state.queue.length === 0) {
      this.states.delete(key);
    }
  }

  private compatible(state: LockState, mode: LockMode): boolean {
    if (state.writer) return false;
    return mode === 'shared' || state.readers === 0;
  }

  private take(state: LockState, mode: LockMode): void {
    if (mode === 'exclusive') {
      state.writer = true;
    } else {
      state.readers++;
    }
  }
}
