import { describe, it, expect } from 'vitest';
import { AsyncMutex } from './AsyncMutex.js';

describe('AsyncMutex', () => {
  it('should run sections one at a time in arrival order', async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    const section = (name: string, delay: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delay));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a', 20), section('b', 5), section('c', 1)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release the lock when the section throws', async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should ignore a second release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();
    expect(mutex.waitingCount).toBe(1);

    release();
    release();
    const releaseSecond = await waiting;

    expect(mutex.isLocked).toBe(true);
    releaseSecond();
    expect(mutex.isLocked).toBe(false);
  });
});
