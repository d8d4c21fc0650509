import { describe, it, expect } from 'vitest';
import { MemorySampleWindow, RedisSampleWindow, trimWindow } from '../src/risk/sample_window.js';
import { FakeRedis, T0, sample } from './helpers/fakes.js';

const HOUR = 3_600_000;
const bounds = { size: 3, maxAgeMs: 24 * HOUR };

describe('sample windows', () => {
  it('keeps the newest samples within count and age bounds', () => {
    const xs = [sample('dai', 1, T0 - 25 * HOUR), ...[4, 3, 2, 1].map(h => sample('dai', 1 - h / 1000, T0 - h * HOUR))];
    expect(trimWindow(xs, bounds, T0).map(s => s.price)).toEqual([0.997, 0.998, 0.999]);
  });

  it('bounds the in-memory window', async () => {
    let now = T0;
    const w = new MemorySampleWindow(bounds, () => now);
    for (let i = 0; i < 5; i++) {
      now = T0 + i * HOUR;
      await w.append(sample('dai', 1 + i / 1000, now));
    }
    expect((await w.window('dai')).map(s => s.timestamp)).toEqual([T0 + 2 * HOUR, T0 + 3 * HOUR, T0 + 4 * HOUR]);
    expect(await w.window('tether')).toEqual([]);
  });

  it('stores the window as one JSON value per asset in redis', async () => {
    const redis = new FakeRedis();
    const w = new RedisSampleWindow(redis, bounds, () => T0);
    await w.append(sample('dai', 0.999, T0 - HOUR));
    await w.append(sample('dai', 1.001, T0));
    const stored = await w.window('dai');
    expect(stored.map(s => s.price)).toEqual([0.999, 1.001]);
    expect(redis.calls.filter(c => c.startsWith('set')).at(-1)).toMatch(/^set pegwatch:samples:dai \[.*\] PX 86400000$/);
  });

  it('ignores corrupt stored entries', async () => {
    const redis = new FakeRedis();
    await redis.set('pegwatch:samples:dai', JSON.stringify([{ price: 'x' }, sample('dai', 1, T0)]), 'PX', 1000);
    const w = new RedisSampleWindow(redis, bounds, () => T0);
    expect(await w.window('dai')).toHaveLength(1);
    await redis.set('pegwatch:samples:dai', '{not json', 'PX', 1000);
    expect(await w.window('dai')).toEqual([]);
  });
});
