import { describe, it, expect } from 'vitest';
import { NodeLock } from '../src/core/node-lock';

describe('NodeLock', () => {
  it('should run held sections one at a time in arrival order', async () => {
    const lock = new NodeLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
    });
    const second = lock.runExclusive(() => {
      events.push('second');
    });
    const third = lock.runExclusive(() => {
      events.push('third');
    });

    await Promise.resolve();
    expect(lock.isLocked()).toBe(true);
    expect(lock.pending()).toBe(2);

    releaseFirst();
    await Promise.all([first, second, third]);

    expect(events).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(lock.isLocked()).toBe(false);
  });

  it('should release the lock when a held section throws', async () => {
    const lock = new NodeLock();

    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
