import { describe, expect, it } from 'vitest';
import { UserRequestLock } from '../../src/services/concurrency/UserRequestLock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('UserRequestLock', () => {
  it('runs operations for one key in arrival order', async () => {
    const lock = new UserRequestLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.runExclusive('alice', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.runExclusive('alice', async () => {
      order.push('second');
    });

    expect(lock.isBusy('alice')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(lock.isBusy('alice')).toBe(false);
  });

  it('does not make different keys wait on each other', async () => {
    const lock = new UserRequestLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.runExclusive('alice', async () => {
      await gate.promise;
      order.push('alice');
    });
    await lock.runExclusive('bob', async () => {
      order.push('bob');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['bob', 'alice']);
  });

  it('keeps the queue moving after a failure', async () => {
    const lock = new UserRequestLock();

    const failed = lock.runExclusive('alice', async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive('alice', async () => 'done');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });
});
