import type { NotificationChannel } from '../channels/types.js';
import type { TierSettings } from '../config/settings.js';
import { logEvent } from '../observability/log.js';
import { recordAlert } from '../observability/metrics.js';
import type { Asset, PegReading, PegStatus, PriceSample, RiskAssessment, Tier, TierReading } from '../schemas.js';
import type { CooldownStore } from './cooldown.js';
import { formatAlert, formatRecovery } from './format.js';
import { KeyedLock } from './keyed_lock.js';

export type SkipReason = 'stable' | 'cooldown' | 'no_channel';

type DecisionBase = { tier: Tier; assetId: string; symbol: string; status: PegStatus };

export type DispatchDecision = DecisionBase & (
  | { result: 'sent' }
  | { result: 'skipped'; reason: SkipReason }
  | { result: 'failed'; reason: 'delivery'; error: string }
  | { result: 'recovered' }
);

export type DispatchInput = {
  asset: Asset;
  sample: PriceSample;
  reading: PegReading;
  risk?: RiskAssessment | null;
  tier: Tier;
  now: number;
  overview?: readonly TierReading[];
};

export type DispatcherDeps = {
  tiers: Record<Tier, TierSettings>;
  stores: Record<Tier, CooldownStore>;
  channels: Partial<Record<Tier, NotificationChannel>>;
  recoveryNotices?: boolean;
  lock?: KeyedLock;
};

export class AlertDispatcher {
  private readonly lock: KeyedLock;
  // tier:assetId pairs alerted since start, for opt-in recovery notices
  private readonly alerted = new Set<string>();

  constructor(private readonly deps: DispatcherDeps) {
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * Sends at most one alert per tier and asset per cooldown window.
   * Throws CooldownStoreUnavailableError when the store cannot be read or written.
   */
  async evaluate(input: DispatchInput): Promise<DispatchDecision> {
    const decision = await this.decide(input);
    recordAlert(input.tier, decision.result === 'skipped' ? `skipped_${decision.reason}` : decision.result);
    if (decision.result !== 'skipped' || decision.reason === 'no_channel') {
      logEvent(decision.result === 'failed' ? 'warn' : 'info', `alert.${decision.result}`, decision);
    }
    return decision;
  }

  private async decide(input: DispatchInput): Promise<DispatchDecision> {
    const { asset, tier, reading } = input;
    const base: DecisionBase = { tier, assetId: asset.id, symbol: asset.symbol, status: reading.status };
    const key = `${tier}:${asset.id}`;
    const channel = this.deps.channels[tier];

    if (reading.status === 'STABLE') {
      if (!this.deps.recoveryNotices || !this.alerted.has(key)) return { ...base, result: 'skipped', reason: 'stable' };
      if (!channel) return { ...base, result: 'skipped', reason: 'no_channel' };
      const text = formatRecovery({
        tier, symbol: asset.symbol, name: asset.name, price: input.sample.price, deviation: reading.deviation, timestamp: input.now,
      });
      const res = await channel.send({ tier, text, meta: { assetId: asset.id, kind: 'recovery' } });
      if (!res.ok) return { ...base, result: 'failed', reason: 'delivery', error: res.error };
      this.alerted.delete(key);
      return { ...base, result: 'recovered' };
    }

    if (!channel) return { ...base, result: 'skipped', reason: 'no_channel' };
    const store = this.deps.stores[tier];

    return this.lock.run(key, async (): Promise<DispatchDecision> => {
      if (!(await store.isEligible(asset.id, input.now))) return { ...base, result: 'skipped', reason: 'cooldown' };
      const text = formatAlert({
        tier,
        threshold: this.deps.tiers[tier].threshold,
        symbol: asset.symbol,
        name: asset.name,
        price: input.sample.price,
        deviation: reading.deviation,
        status: reading.status,
        risk: input.risk ?? null,
        timestamp: input.now,
      }, input.overview ?? []);
      const res = await channel.send({ tier, text, meta: { assetId: asset.id, kind: 'alert' } });
      if (!res.ok) return { ...base, result: 'failed', reason: 'delivery', error: res.error };
      await store.recordAlert(asset.id, input.now);
      this.alerted.add(key);
      return { ...base, result: 'sent' };
    });
  }
}
