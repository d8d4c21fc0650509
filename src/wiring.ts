import { AlertDispatcher } from './alerts/dispatcher.js';
import { MemoryCooldownStore, RedisCooldownStore, type CooldownStore, type RedisLike } from './alerts/cooldown.js';
import type { AssetCatalog } from './assets.js';
import { LogChannel } from './channels/log_channel.js';
import { TelegramChannel, type MessageSender } from './channels/telegram.js';
import type { NotificationChannel } from './channels/types.js';
import { Breaker } from './circuit.js';
import { SettingsError, type Settings } from './config/settings.js';
import { CoinGeckoProvider, type MarketDataProvider } from './market/coingecko.js';
import { MarketDataGateway } from './market/gateway.js';
import { RateLedger } from './market/rate_ledger.js';
import { MonitorScheduler, type SentimentSource } from './monitor/scheduler.js';
import { logEvent } from './observability/log.js';
import { HeuristicRiskModel } from './risk/aggregator.js';
import { MemorySampleWindow, RedisSampleWindow, type SampleWindowStore } from './risk/sample_window.js';
import { maybeMask } from './security/log_mask.js';
import { TIERS, type Tier } from './schemas.js';

export type ServiceOverrides = {
  redis?: RedisLike | null;
  provider?: MarketDataProvider;
  sender?: MessageSender;
  sentiment?: SentimentSource | null;
  now?: () => number;
};

export type Services = {
  gateway: MarketDataGateway;
  dispatcher: AlertDispatcher;
  scheduler: MonitorScheduler;
  stores: Record<Tier, CooldownStore>;
  windows: SampleWindowStore;
  channels: Partial<Record<Tier, NotificationChannel>>;
};

export function buildChannels(settings: Settings, sender?: MessageSender): Partial<Record<Tier, NotificationChannel>> {
  const out: Partial<Record<Tier, NotificationChannel>> = {};
  const token = settings.telegramToken;
  if (!token && !sender) {
    const dry = new LogChannel();
    for (const t of TIERS) out[t] = dry;
    logEvent('warn', 'channels.dry_run', { reason: 'TELEGRAM_BOT_TOKEN not set' });
    return out;
  }
  for (const t of TIERS) {
    const chat = settings.tiers[t].chatId;
    if (!chat) continue;
    out[t] = new TelegramChannel(chat, sender ?? token ?? '');
    logEvent('info', 'channels.telegram', { tier: t, chat: maybeMask(chat) });
  }
  return out;
}

export function buildServices(settings: Settings, catalog: AssetCatalog, o: ServiceOverrides = {}): Services {
  const now = o.now ?? Date.now;
  const p = settings.provider;
  const provider = o.provider ?? new CoinGeckoProvider({ baseUrl: p.baseUrl, apiKey: p.apiKey, timeoutMs: p.timeoutMs });
  const gateway = new MarketDataGateway(provider, {
    batchSize: p.batchSize,
    maxAttempts: p.maxAttempts,
    backoff: p.backoff,
    ledger: new RateLedger({ ratePerMinute: p.ratePerMinute, maxWaitMs: p.maxWaitMs, now }),
    breaker: new Breaker({ ...p.breaker, now }),
    now,
  });

  const redis = o.redis ?? null;
  if (!redis) {
    if (!settings.allowMemoryStore) {
      throw new SettingsError(['REDIS_URL: required so cooldowns survive a restart; set ALLOW_MEMORY_STORE=true to run without it']);
    }
    logEvent('warn', 'cooldown.memory', { note: 'ALLOW_MEMORY_STORE set; cooldowns and sample windows will not survive a restart' });
  }
  const store = (t: Tier): CooldownStore => redis
    ? new RedisCooldownStore(redis, t, settings.tiers[t].cooldownMs)
    : new MemoryCooldownStore(t, settings.tiers[t].cooldownMs);
  const stores: Record<Tier, CooldownStore> = { free: store('free'), premium: store('premium'), enterprise: store('enterprise') };
  const windows: SampleWindowStore = redis
    ? new RedisSampleWindow(redis, settings.samples, now)
    : new MemorySampleWindow(settings.samples, now);

  const channels = buildChannels(settings, o.sender);
  const dispatcher = new AlertDispatcher({ tiers: settings.tiers, stores, channels, recoveryNotices: settings.recoveryNotices });
  const scheduler = new MonitorScheduler({
    settings,
    catalog,
    gateway,
    windows,
    dispatcher,
    risk: settings.risk.enabled ? new HeuristicRiskModel(settings.risk) : null,
    sentiment: o.sentiment ?? null,
    now,
  });
  return { gateway, dispatcher, scheduler, stores, windows, channels };
}
