import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../src/services/keyed-lock';

describe('keyed lock', () => {
  it('runs sections for the same key one after another', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run('a', async () => {
      order.push('first:start');
      await firstGate;
      order.push('first:end');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run('a', async () => {
      await firstGate;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });

    releaseFirst();
    await first;

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the queue moving after a failing section', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'done');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });
});
