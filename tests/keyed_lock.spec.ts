import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../src/alerts/keyed_lock.js';

const tick = () => new Promise<void>(res => setImmediate(res));

describe('keyed lock', () => {
  it('runs sections on one key strictly in order', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    const section = (name: string) => lock.run('free:dai', async () => {
      log.push(`${name}:in`);
      await tick();
      log.push(`${name}:out`);
      return name;
    });
    const results = await Promise.all([section('a'), section('b'), section('c')]);
    expect(results).toEqual(['a', 'b', 'c']);
    expect(log).toEqual(['a:in', 'a:out', 'b:in', 'b:out', 'c:in', 'c:out']);
    expect(lock.held()).toBe(0);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>(res => { release = res; });
    const slow = lock.run('free:dai', async () => { await gate; log.push('dai'); });
    await lock.run('free:usds', async () => { log.push('usds'); });
    release();
    await slow;
    expect(log).toEqual(['usds', 'dai']);
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('k', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(await lock.run('k', async () => 1)).toBe(1);
  });
});
