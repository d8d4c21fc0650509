import { describe, it, expect } from 'vitest';
import { AssetCatalog } from '../src/assets.js';
import { checkReply, clearFlagsReply, flagsReply, isAdmin, statusReply } from '../src/bot.js';
import type { TickReport } from '../src/monitor/scheduler.js';
import { classifyPrice } from '../src/peg/classifier.js';
import type { RiskAssessment, Tier, TierReading } from '../src/schemas.js';
import { Breaker } from '../src/circuit.js';
import { MarketDataGateway } from '../src/market/gateway.js';
import { RateLedger } from '../src/market/rate_ledger.js';
import { FakeProvider, T0, pricesFor } from './helpers/fakes.js';

const catalog = AssetCatalog.fromJson([
  { id: 'usd-coin', symbol: 'USDC', name: 'USD Coin', kind: 'fiat', audience: 'both' },
  { id: 'dai', symbol: 'DAI', name: 'Dai', kind: 'crypto', audience: 'premium' },
]);

const risk: RiskAssessment = {
  assetId: 'usd-coin', score: 12.5, confidence: 30, level: 'low',
  contributions: [{ signal: 'deviation', contribution: 12.5 }], horizon: '24h', sampleCount: 3,
};

const usdc = (tier: Tier, threshold: number, withRisk: boolean): TierReading => ({
  tier, assetId: 'usd-coin', symbol: 'USDC', price: 0.997, reading: classifyPrice(0.997, threshold), risk: withRisk ? risk : null,
});

const report: TickReport = {
  seq: 3, outcome: 'ok', startedAt: T0, durationMs: 40, requested: 2, fetched: 1, failures: [],
  readings: { free: [usdc('free', 0.005, false)], premium: [usdc('premium', 0.002, true)], enterprise: [] },
  decisions: [], dispatchHalted: false, error: null,
};

describe('chat commands', () => {
  it('answers /status for the free tier by default', () => {
    expect(statusReply('', report).split('\n').slice(0, 2)).toEqual(['📊 Peg status (FREE)', 'All pegs holding']);
    expect(statusReply(' Premium ', report).split('\n').slice(0, 2)).toEqual(['📊 Peg status (PREMIUM)', '1 of 1 off peg']);
  });

  it('rejects unknown tiers and explains missing data', () => {
    expect(statusReply('gold', report)).toBe('Unknown tier "gold". Use free, premium or enterprise.');
    expect(statusReply('free', null)).toBe('No readings yet, the first check is still running.');
  });

  it('answers /check with the scored reading when one exists', () => {
    expect(checkReply('usdc', report, catalog)).toBe([
      '🟡 USDC (USD Coin) WARNING',
      'Price: $0.9970 (-0.30%)',
      'Risk: 12.5/100 low (confidence 30%, 24h)',
      'Updated: 2026-01-15 12:00 UTC',
    ].join('\n'));
  });

  it('handles bad or missing symbols', () => {
    expect(checkReply('', report, catalog)).toBe('Usage: /check <SYMBOL>, e.g. /check USDC');
    expect(checkReply('XYZ', report, catalog)).toBe('Unknown asset "XYZ".');
    expect(checkReply('dai', report, catalog)).toBe('DAI: no price in the latest check.');
  });
});

describe('admin flag commands', () => {
  async function flaggedGateway() {
    const provider = new FakeProvider(pricesFor({ 'usd-coin': 1 }));
    const gw = new MarketDataGateway(provider, {
      batchSize: 50,
      maxAttempts: 1,
      backoff: { baseMs: 1000, maxMs: 10_000, jitterPct: 15 },
      ledger: new RateLedger({ ratePerMinute: 6000, maxWaitMs: 1000, now: () => T0, sleep: async () => {} }),
      breaker: new Breaker({ threshold: 3, now: () => T0 }),
      now: () => T0,
    });
    await gw.fetch(['usd-coin', 'dai', 'ghost-coin']);
    return gw;
  }

  it('only lets the configured admin in', () => {
    expect(isAdmin(424242, 424242)).toBe(true);
    expect(isAdmin(1, 424242)).toBe(false);
    expect(isAdmin(undefined, 424242)).toBe(false);
    expect(isAdmin(424242, null)).toBe(false);
  });

  it('lists flagged ids', async () => {
    const gw = await flaggedGateway();
    expect(flagsReply(gw)).toBe('Flagged (not fetched): dai, ghost-coin');
  });

  it('clears one asset by symbol or id', async () => {
    const gw = await flaggedGateway();
    expect(clearFlagsReply('dai', gw, catalog)).toBe('Cleared dai, it is fetched again on the next tick.');
    expect(clearFlagsReply('usdc', gw, catalog)).toBe('usd-coin is not flagged.');
    expect(gw.flaggedIds()).toEqual(['ghost-coin']);
  });

  it('clears everything without an argument', async () => {
    const gw = await flaggedGateway();
    expect(clearFlagsReply('', gw, catalog)).toBe('Cleared 2 flagged assets.');
    expect(clearFlagsReply(' ', gw, catalog)).toBe('Nothing flagged.');
    expect(flagsReply(gw)).toBe('Nothing flagged.');
  });
});
