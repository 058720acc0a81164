import { describe, it, expect } from 'vitest';
import { UserLocks } from './locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('UserLocks', () => {
  it('runs sections for the same user one at a time in arrival order', async () => {
    const locks = new UserLocks();
    const order: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('alice', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = locks.runExclusive('alice', async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('alice')).toBe(false);
  });

  it('does not block other users', async () => {
    const locks = new UserLocks();
    const gate = deferred();
    const slow = locks.runExclusive('alice', () => gate.promise);

    await expect(locks.runExclusive('bob', async () => 'done')).resolves.toBe('done');
    gate.resolve();
    await slow;
  });

  it('releases the lock when the section throws', async () => {
    const locks = new UserLocks();
    await expect(
      locks.runExclusive('alice', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(locks.runExclusive('alice', async () => 42)).resolves.toBe(42);
  });
});
