import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../negotiation/keyed-mutex';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('runs tasks for one key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('a', task('first')),
      mutex.runExclusive('a', task('second')),
      mutex.runExclusive('a', task('third'))
    ]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(log).toEqual(['first:start', 'first:end', 'second:start', 'second:end', 'third:start', 'third:end']);
    expect(mutex.size).toBe(0);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    await Promise.all(
      ['a', 'b'].map((key) =>
        mutex.runExclusive(key, async () => {
          log.push(`${key}:start`);
          await tick();
          log.push(`${key}:end`);
        })
      )
    );

    expect(log).toEqual(['a:start', 'b:start', 'a:end', 'b:end']);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('a', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(mutex.runExclusive('a', async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('holds several keys without deadlocking opposite orderings', async () => {
    const mutex = new KeyedMutex();
    const results = await Promise.all([
      mutex.runExclusiveAll(['x', 'y'], async () => { await tick(); return 1; }),
      mutex.runExclusiveAll(['y', 'x'], async () => { await tick(); return 2; })
    ]);

    expect(results).toEqual([1, 2]);
    expect(mutex.size).toBe(0);
  });
});
