import { describe, expect, it } from '@jest/globals';

import { Mutex } from '../mutex.js';

describe('Mutex', () => {
  it('should run callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.withLock(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
      return 1;
    });
    const second = mutex.withLock(() => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    release();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should release the lock after a rejection', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.withLock(() => Promise.reject(new Error('boom')))
    ).rejects.toThrow('boom');
    await expect(mutex.withLock(() => 'next')).resolves.toBe('next');
  });
});
