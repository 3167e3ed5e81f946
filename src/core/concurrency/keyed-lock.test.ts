import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyed-lock';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('KeyedLock', () => {
  it('runs work for the same key one at a time, in arrival order', async () => {
    const locks = new KeyedLock();
    const order: string[] = [];
    let finishFirst: () => void = () => {};

    const first = locks.runExclusive(
      'user_1',
      () =>
        new Promise<void>((resolve) => {
          order.push('first:start');
          finishFirst = () => {
            order.push('first:end');
            resolve();
          };
        })
    );
    const second = locks.runExclusive('user_1', () => {
      order.push('second');
    });
    const third = locks.runExclusive('user_1', () => {
      order.push('third');
    });

    await tick();
    expect(order).toEqual(['first:start']);
    expect(locks.isLocked('user_1')).toBe(true);
    expect(locks.pendingCount('user_1')).toBe(2);

    finishFirst();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(locks.isLocked('user_1')).toBe(false);
    expect(locks.pendingCount('user_1')).toBe(0);
  });

  it('does not make other keys wait', async () => {
    const locks = new KeyedLock();
    let finish: () => void = () => {};
    const held = locks.runExclusive('user_1', () => new Promise<void>((resolve) => (finish = resolve)));

    await expect(locks.runExclusive('user_2', () => 'done')).resolves.toBe('done');
    expect(locks.isLocked('user_1')).toBe(true);

    finish();
    await held;
  });

  it('releases the key when the work throws', async () => {
    const locks = new KeyedLock();

    await expect(
      locks.runExclusive('user_1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('user_1')).toBe(false);
    await expect(locks.runExclusive('user_1', async () => 42)).resolves.toBe(42);
  });
});
