import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs work for the same key one at a time, in order', async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run(1, async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.run(1, async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex<number>();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run(1, async () => {
      await gate.promise;
      order.push('key1');
    });
    await mutex.run(2, async () => {
      order.push('key2');
    });

    expect(order).toEqual(['key2']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['key2', 'key1']);
  });

  it('releases the lock when work throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.run('a', async () => 42)).resolves.toBe(42);
  });

  it('forgets idle keys', async () => {
    const mutex = new KeyedMutex<number>();
    await mutex.run(7, async () => undefined);
    expect(mutex.isLocked(7)).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
