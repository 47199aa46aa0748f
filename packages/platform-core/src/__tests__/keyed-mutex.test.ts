import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../resilience/keyed-mutex';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in call order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('a', () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block tasks on different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.runExclusive('a', () => gate.promise);

    const result = await mutex.runExclusive('b', () => 42);

    expect(result).toBe(42);
    gate.resolve();
    await blocked;
  });

  it('should release the lock when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('a', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('a', () => 'next')).resolves.toBe('next');
  });

  it('should drop a key once no caller holds it', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const pending = mutex.runExclusive('a', () => gate.promise);

    expect(mutex.isLocked('a')).toBe(true);
    expect(mutex.size).toBe(1);

    gate.resolve();
    await pending;

    expect(mutex.isLocked('a')).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
