import { describe, it, expect } from 'vitest';
import { SettingsError, readSettings } from '../src/config/settings.js';

function issuesOf(env: Record<string, string>): string[] {
  try {
    readSettings(env);
  } catch (e) {
    if (e instanceof SettingsError) return e.issues;
    throw e;
  }
  return [];
}

describe('settings', () => {
  it('applies defaults for an empty environment', () => {
    const s = readSettings({});
    expect(s.pollIntervalMs).toBe(60_000);
    expect(s.tickTimeoutMs).toBe(120_000);
    expect(s.workerConcurrency).toBe(4);
    expect(s.tiers.free).toEqual({ threshold: 0.005, cooldownMs: 1_800_000, chatId: null, riskScoring: false });
    expect(s.tiers.premium.threshold).toBeCloseTo(0.002, 12);
    expect(s.tiers.enterprise.threshold).toBeCloseTo(0.001, 12);
    expect(s.tiers.enterprise.riskScoring).toBe(true);
    expect(s.provider.baseUrl).toBe('https://api.coingecko.com/api/v3');
    expect(s.provider.batchSize).toBe(50);
    expect(s.provider.backoff).toEqual({ baseMs: 1000, maxMs: 10_000, jitterPct: 15 });
    expect(s.samples).toEqual({ size: 60, maxAgeMs: 86_400_000 });
    expect(s.risk.missingSignal).toBe('redistribute');
    expect(s.recoveryNotices).toBe(false);
    expect(s.redisUrl).toBeNull();
    expect(s.allowMemoryStore).toBe(false);
    expect(s.adminChatId).toBeNull();
    expect(Object.isFrozen(s)).toBe(true);
  });

  it('reads the memory store opt-in and the admin id', () => {
    const s = readSettings({ ALLOW_MEMORY_STORE: 'true', ADMIN_CHAT_ID: '424242' });
    expect(s.allowMemoryStore).toBe(true);
    expect(s.adminChatId).toBe(424242);
    expect(issuesOf({ ALLOW_MEMORY_STORE: 'yes' })).toHaveLength(1);
    expect(issuesOf({ ADMIN_CHAT_ID: 'someone' })).toHaveLength(1);
  });

  it('lets paid tiers override the shared cooldown', () => {
    const s = readSettings({ COOLDOWN_MINUTES: '10', PREMIUM_COOLDOWN_MINUTES: '5' });
    expect(s.tiers.free.cooldownMs).toBe(600_000);
    expect(s.tiers.premium.cooldownMs).toBe(300_000);
    expect(s.tiers.enterprise.cooldownMs).toBe(600_000);
  });

  it('treats blank values as unset and trims urls', () => {
    const s = readSettings({ COOLDOWN_MINUTES: '  ', COINGECKO_BASE_URL: 'https://prices.example.test/api/' });
    expect(s.tiers.free.cooldownMs).toBe(1_800_000);
    expect(s.provider.baseUrl).toBe('https://prices.example.test/api');
  });

  it('turns risk scoring off for every tier when disabled', () => {
    const s = readSettings({ RISK_ENABLED: 'false' });
    expect(s.tiers.premium.riskScoring).toBe(false);
    expect(s.tiers.enterprise.riskScoring).toBe(false);
  });

  it('accepts numeric and @name chat ids', () => {
    const s = readSettings({ ALERT_CHANNEL_ID: '-1001234567', PREMIUM_CHANNEL_ID: '@peg_feed' });
    expect(s.tiers.free.chatId).toBe('-1001234567');
    expect(s.tiers.premium.chatId).toBe('@peg_feed');
  });

  it('lists every invalid variable', () => {
    const issues = issuesOf({ ALERT_CHANNEL_ID: 'not a chat', RISK_HORIZON: '2h' });
    expect(issues).toHaveLength(2);
    expect(issues.some(i => i.startsWith('ALERT_CHANNEL_ID'))).toBe(true);
    expect(issues.some(i => i.startsWith('RISK_HORIZON'))).toBe(true);
  });

  it('rejects out-of-range numbers', () => {
    expect(issuesOf({ FREE_THRESHOLD_PCT: 'abc' })[0]).toMatch(/^FREE_THRESHOLD_PCT/);
    expect(issuesOf({ WORKER_CONCURRENCY: '0' })[0]).toMatch(/^WORKER_CONCURRENCY/);
  });

  it('checks cross-field constraints', () => {
    expect(issuesOf({ BACKOFF_BASE_MS: '2000', BACKOFF_MAX_MS: '500' })).toEqual(['BACKOFF_MAX_MS: must be >= BACKOFF_BASE_MS']);
    expect(issuesOf({ RISK_WEIGHT_DEVIATION: '0', RISK_WEIGHT_VOLATILITY: '0', RISK_WEIGHT_TREND: '0' })).toHaveLength(1);
  });

  it('validates the bot token shape', () => {
    expect(issuesOf({ TELEGRAM_BOT_TOKEN: 'test-secret' })[0]).toMatch(/^TELEGRAM_BOT_TOKEN/);
    expect(readSettings({ TELEGRAM_BOT_TOKEN: '123:test-secret' }).telegramToken).toBe('123:test-secret');
  });
});
