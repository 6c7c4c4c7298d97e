import { describe, it, expect } from 'vitest';
import { ReadWriteLock } from './rw-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ReadWriteLock', () => {
  it('should return the value produced by the callback', async () => {
    const lock = new ReadWriteLock();

    await expect(lock.read(() => 42)).resolves.toBe(42);
    await expect(lock.write(async () => 'done')).resolves.toBe('done');
  });

  it('should run writers one at a time', async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.write(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.write(() => {
      events.push('second');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(lock.pending).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let readers share access', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    let active = 0;
    let maxActive = 0;

    const reader = (): Promise<void> =>
      lock.read(async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await gate.promise;
        active -= 1;
      });

    const readers = [reader(), reader(), reader()];
    await Promise.resolve();
    gate.resolve();
    await Promise.all(readers);

    expect(maxActive).toBe(3);
  });

  it('should make a writer wait for active readers', async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const reading = lock.read(async () => {
      events.push('read:start');
      await gate.promise;
      events.push('read:end');
    });
    const writing = lock.write(() => {
      events.push('write');
    });

    await Promise.resolve();
    expect(events).toEqual(['read:start']);

    gate.resolve();
    await Promise.all([reading, writing]);

    expect(events).toEqual(['read:start', 'read:end', 'write']);
  });

  it('should not let later readers overtake a queued writer', async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const firstRead = lock.read(async () => {
      await gate.promise;
      events.push('read-1');
    });
    const write = lock.write(() => {
      events.push('write');
    });
    const secondRead = lock.read(() => {
      events.push('read-2');
    });

    gate.resolve();
    await Promise.all([firstRead, write, secondRead]);

    expect(events).toEqual(['read-1', 'write', 'read-2']);
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.write(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.write(() => 'after')).resolves.toBe('after');
    expect(lock.pending).toBe(0);
  });
});
