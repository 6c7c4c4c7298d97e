type LockMode = 'read' | 'write';

interface Waiter {
  readonly mode: LockMode;
  readonly wake: () => void;
}

/**
 * Async read/write lock for in-memory stores.
 *
 * Writers are exclusive; readers share access while no writer holds the lock.
 * Waiters are admitted in FIFO order, so a queued writer is never starved by
 * readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  /** Run `fn` with shared access. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  /** Run `fn` with exclusive access. */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  /** Number of callers waiting to enter. */
  get pending(): number {
    return this.queue.length;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode, wake: resolve });
    });
  }

  private canEnter(mode: LockMode): boolean {
    if (this.writing) return false;
    return mode === 'read' || this.readers === 0;
  }

  private enter(mode: LockMode): void {
    if (mode === 'write') {
      this.writing = true;
    } else {
      this.readers += 1;
    }
  }

  private release(mode: LockMode): void {
    if (mode === 'write') {
      this.writing = false;
    } else {
      this.readers -= 1;
    }
    this.drain();
  }

  private drain(): void {
    for (let next = this.queue[0]; next !== undefined; next = this.queue[0]) {
      if (!this.canEnter(next.mode)) return;
      this.queue.shift();
      this.enter(next.mode);
      next.wake();
      if (next.mode === 'write') return;
    }
  }
}
