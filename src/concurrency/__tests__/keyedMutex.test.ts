import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../keyedMutex.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('serializes operations on the same key', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const first = mutex.runExclusive('campaign-1', async () => {
      order.push('first:start');
      await tick();
      order.push('first:end');
    });
    const second = mutex.runExclusive('campaign-1', async () => {
      order.push('second:start');
      order.push('second:end');
    });

    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('does not block different keys', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const slow = mutex.runExclusive('a', async () => {
      await tick();
      order.push('a');
    });
    const fast = mutex.runExclusive('b', async () => {
      order.push('b');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['b', 'a']);
  });

  it('releases the lock when the operation throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('k')).toBe(false);
    await expect(mutex.runExclusive('k', async () => 42)).resolves.toBe(42);
  });

  it('rejects tryRunExclusive while the key is held', async () => {
    const mutex = new KeyedMutex();
    const held = mutex.runExclusive('run-1', async () => {
      await tick();
    });

    const attempt = await mutex.tryRunExclusive('run-1', async () => 'ran');
    expect(attempt).toEqual({ status: 'rejected', reason: 'busy' });

    await held;
    const retry = await mutex.tryRunExclusive('run-1', async () => 'ran');
    expect(retry).toEqual({ status: 'accepted', result: 'ran' });
  });
});
