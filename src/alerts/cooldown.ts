import { CooldownStoreUnavailableError } from '../errors.js';
import { errMessage } from '../observability/log.js';

export interface CooldownStore {
  readonly namespace: string;
  readonly windowMs: number;
  isEligible(assetId: string, now: number): Promise<boolean>;
  recordAlert(assetId: string, now: number): Promise<void>;
  lastAlertAt(assetId: string): Promise<number | null>;
}

/** The subset of an ioredis client the stores rely on. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ms: number): Promise<unknown>;
}

export class MemoryCooldownStore implements CooldownStore {
  private last = new Map<string, number>();
  constructor(readonly namespace: string, readonly windowMs: number) {}

  async isEligible(assetId: string, now: number) {
    const ts = this.last.get(assetId);
    return ts === undefined || now - ts >= this.windowMs;
  }

  async recordAlert(assetId: string, now: number) {
    this.last.set(assetId, now);
  }

  async lastAlertAt(assetId: string) {
    return this.last.get(assetId) ?? null;
  }
}

export class RedisCooldownStore implements CooldownStore {
  constructor(private readonly client: RedisLike, readonly namespace: string, readonly windowMs: number) {}

  key(assetId: string) { return `pegwatch:cooldown:${this.namespace}:${assetId}`; }

  async isEligible(assetId: string, now: number) {
    const ts = await this.lastAlertAt(assetId);
    return ts === null || now - ts >= this.windowMs;
  }

  async recordAlert(assetId: string, now: number) {
    // PX must be positive; a zero window never blocks so there is nothing to keep
    if (this.windowMs <= 0) return;
    try {
      await this.client.set(this.key(assetId), String(now), 'PX', this.windowMs);
    } catch (e) {
      throw new CooldownStoreUnavailableError(`cooldown write failed: ${errMessage(e)}`, e);
    }
  }

  async lastAlertAt(assetId: string) {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(assetId));
    } catch (e) {
      throw new CooldownStoreUnavailableError(`cooldown read failed: ${errMessage(e)}`, e);
    }
    if (raw === null) return null;
    const ts = Number(raw);
    return Number.isFinite(ts) ? ts : null;
  }
}
