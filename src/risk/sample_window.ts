import { z } from 'zod';
import type { RedisLike } from '../alerts/cooldown.js';
import type { PriceSample } from '../schemas.js';

export interface SampleWindowStore {
  append(sample: PriceSample): Promise<void>;
  window(assetId: string, now?: number): Promise<PriceSample[]>;
}

export type WindowBounds = { size: number; maxAgeMs: number };

// Keeps the newest `size` samples no older than `maxAgeMs`, ordered by time
export function trimWindow(xs: readonly PriceSample[], bounds: WindowBounds, now: number): PriceSample[] {
  const kept = xs.filter(s => now - s.timestamp <= bounds.maxAgeMs).sort((a, b) => a.timestamp - b.timestamp);
  return kept.slice(Math.max(0, kept.length - bounds.size));
}

export class MemorySampleWindow implements SampleWindowStore {
  private byAsset = new Map<string, PriceSample[]>();
  constructor(private readonly bounds: WindowBounds, private readonly now: () => number = Date.now) {}

  async append(sample: PriceSample) {
    const xs = this.byAsset.get(sample.assetId) ?? [];
    xs.push(sample);
    this.byAsset.set(sample.assetId, trimWindow(xs, this.bounds, this.now()));
  }

  async window(assetId: string, now = this.now()) {
    return trimWindow(this.byAsset.get(assetId) ?? [], this.bounds, now);
  }
}

const StoredSample = z.object({
  assetId: z.string(),
  price: z.number(),
  volume24h: z.number(),
  marketCap: z.number().nullable(),
  timestamp: z.number(),
  provenance: z.object({ provider: z.string(), batchId: z.string() }),
});

export class RedisSampleWindow implements SampleWindowStore {
  constructor(
    private readonly client: RedisLike,
    private readonly bounds: WindowBounds,
    private readonly now: () => number = Date.now,
  ) {}

  key(assetId: string) { return `pegwatch:samples:${assetId}`; }

  async append(sample: PriceSample) {
    const at = this.now();
    const xs = trimWindow([...(await this.window(sample.assetId, at)), sample], this.bounds, at);
    await this.client.set(this.key(sample.assetId), JSON.stringify(xs), 'PX', Math.max(1, this.bounds.maxAgeMs));
  }

  async window(assetId: string, now = this.now()) {
    const raw = await this.client.get(this.key(assetId));
    if (!raw) return [];
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return [];
    }
    if (!Array.isArray(data)) return [];
    const xs: PriceSample[] = [];
    for (const item of data) {
      const p = StoredSample.safeParse(item);
      if (p.success) xs.push(p.data);
    }
    return trimWindow(xs, this.bounds, now);
  }
}
