import { describe, expect, it } from 'vitest';

import { KeyedLock } from '../keyed-lock';
import { createDeferred } from './helpers';

describe('KeyedLock', () => {
  it('runs tasks for the same key one after another', async () => {
    const lock = new KeyedLock();
    const gate = createDeferred();
    const order: string[] = [];

    const first = lock.run('1.0.0', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('1.0.0', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different keys proceed independently', async () => {
    const lock = new KeyedLock();
    const gate = createDeferred();
    const order: string[] = [];

    const slow = lock.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps serving a key after a task fails', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('a', async () => 42)).resolves.toBe(42);
  });
});
