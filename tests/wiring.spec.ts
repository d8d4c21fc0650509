import { describe, it, expect, vi } from 'vitest';
import { MemoryCooldownStore, RedisCooldownStore } from '../src/alerts/cooldown.js';
import { AssetCatalog } from '../src/assets.js';
import { LogChannel } from '../src/channels/log_channel.js';
import { TelegramChannel } from '../src/channels/telegram.js';
import { SettingsError, readSettings } from '../src/config/settings.js';
import { buildChannels, buildServices } from '../src/wiring.js';
import { FakeProvider, FakeRedis, T0, pricesFor } from './helpers/fakes.js';

const catalog = AssetCatalog.load();
const atPeg = Object.fromEntries(catalog.all().map(a => [a.id, 1]));

describe('service wiring', () => {
  it('falls back to a dry-run channel without a bot token', () => {
    const channels = buildChannels(readSettings({}));
    expect(channels.free).toBeInstanceOf(LogChannel);
    expect(channels.enterprise).toBe(channels.free);
  });

  it('creates telegram channels only for tiers with a chat id', () => {
    const channels = buildChannels(readSettings({ TELEGRAM_BOT_TOKEN: '123:test-secret', PREMIUM_CHANNEL_ID: '@peg_feed' }));
    expect(channels.premium).toBeInstanceOf(TelegramChannel);
    expect(channels.free).toBeUndefined();
  });

  it('refuses to build without redis unless memory stores are allowed', () => {
    const provider = new FakeProvider(pricesFor(atPeg));
    expect(() => buildServices(readSettings({}), catalog, { provider })).toThrow(SettingsError);
    expect(() => buildServices(readSettings({}), catalog, { provider }))
      .toThrow('Invalid configuration: REDIS_URL: required so cooldowns survive a restart; set ALLOW_MEMORY_STORE=true to run without it');
  });

  it('uses in-memory stores without redis when allowed', () => {
    const { stores } = buildServices(readSettings({ ALLOW_MEMORY_STORE: 'true' }), catalog, { provider: new FakeProvider(pricesFor(atPeg)) });
    expect(stores.free).toBeInstanceOf(MemoryCooldownStore);
  });

  it('keeps cooldowns across a restart when both processes share redis', async () => {
    const redis = new FakeRedis();
    const settings = readSettings({ TELEGRAM_BOT_TOKEN: '123:test-secret', ALERT_CHANNEL_ID: '-100123456' });
    const sendMessage = vi.fn(async (_chat: string, _text: string) => ({}));
    const boot = () => buildServices(settings, catalog, {
      redis,
      provider: new FakeProvider(pricesFor({ ...atPeg, 'usd-coin': 0.98 })),
      sender: { sendMessage },
      now: () => T0,
    });
    await boot().scheduler.runTick();
    const again = await boot().scheduler.runTick();
    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(again.decisions.find(d => d.tier === 'free' && d.assetId === 'usd-coin'))
      .toMatchObject({ result: 'skipped', reason: 'cooldown' });
  });

  it('runs a tick end to end on redis-backed stores', async () => {
    const redis = new FakeRedis();
    const sendMessage = vi.fn(async (_chat: string, _text: string) => ({}));
    const settings = readSettings({ ALERT_CHANNEL_ID: '-100123456' });
    const { scheduler, stores } = buildServices(settings, catalog, {
      redis,
      provider: new FakeProvider(pricesFor({ ...atPeg, 'usd-coin': 0.98 })),
      sender: { sendMessage },
      now: () => T0,
    });
    expect(stores.premium).toBeInstanceOf(RedisCooldownStore);

    const report = await scheduler.runTick();
    expect(report.outcome).toBe('ok');
    expect(report.fetched).toBe(29);
    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage.mock.calls[0]?.[0]).toBe('-100123456');
    expect(String(sendMessage.mock.calls[0]?.[1]).split('\n')[0]).toBe('🚨 DEPEG ALERT (FREE)');
    expect(await stores.free.lastAlertAt('usd-coin')).toBe(T0);
    expect(report.decisions.filter(d => d.result === 'skipped' && d.reason === 'no_channel').map(d => d.tier).sort())
      .toEqual(['enterprise', 'premium']);
  });
});
