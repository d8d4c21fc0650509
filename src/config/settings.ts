import { z } from 'zod';
import type { RiskHorizon, Tier } from '../schemas.js';

export type TierSettings = {
  threshold: number; // fraction, 0.005 = 0.5%
  cooldownMs: number;
  chatId: string | null;
  riskScoring: boolean;
};

export type RiskWeights = { deviation: number; volatility: number; trend: number; sentiment: number };

export type RiskSettings = {
  enabled: boolean;
  horizon: RiskHorizon;
  minSamples: number;
  weights: RiskWeights;
  missingSignal: 'redistribute' | 'drop';
  scales: { deviation: number; volatility: number; trend: number };
  partialConfidenceCap: number;
  lowConfidenceCap: number;
};

export type ProviderSettings = {
  baseUrl: string;
  apiKey: string | null;
  batchSize: number;
  timeoutMs: number;
  maxAttempts: number;
  maxWaitMs: number;
  ratePerMinute: number;
  backoff: { baseMs: number; maxMs: number; jitterPct: number };
  breaker: { threshold: number; cooldownMs: number; closeAfter: number };
};

export type Settings = {
  pollIntervalMs: number;
  tickTimeoutMs: number;
  workerConcurrency: number;
  tiers: Record<Tier, TierSettings>;
  provider: ProviderSettings;
  samples: { size: number; maxAgeMs: number };
  risk: RiskSettings;
  recoveryNotices: boolean;
  redisUrl: string | null;
  allowMemoryStore: boolean;
  telegramToken: string | null;
  adminChatId: number | null;
  health: { port: number; host: string };
  piiMask: boolean;
};

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'SettingsError';
  }
}

const int = (d: number, min = 0) => z.coerce.number().int().min(min).default(d);
const num = (d: number, min = 0) => z.coerce.number().finite().min(min).default(d);
const pct = (d: number) => z.coerce.number().finite().gt(0).lt(100).default(d);
const bool = (d: boolean) => z.enum(['true', 'false']).default(d ? 'true' : 'false').transform(v => v === 'true');
const chatId = z.string().regex(/^(-?\d+|@\w{3,})$/, 'expected a numeric chat id or @channel').optional();

const EnvSchema = z.object({
  POLL_INTERVAL_MS: int(60_000, 1000),
  TICK_TIMEOUT_MS: int(120_000, 1000),
  WORKER_CONCURRENCY: int(4, 1),

  FREE_THRESHOLD_PCT: pct(0.5),
  PREMIUM_THRESHOLD_PCT: pct(0.2),
  ENTERPRISE_THRESHOLD_PCT: pct(0.1),
  COOLDOWN_MINUTES: num(30),
  PREMIUM_COOLDOWN_MINUTES: z.coerce.number().finite().min(0).optional(),
  ENTERPRISE_COOLDOWN_MINUTES: z.coerce.number().finite().min(0).optional(),
  ALERT_CHANNEL_ID: chatId,
  PREMIUM_CHANNEL_ID: chatId,
  ENTERPRISE_CHANNEL_ID: chatId,

  COINGECKO_BASE_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  COINGECKO_API_KEY: z.string().optional(),
  PROVIDER_BATCH_SIZE: int(50, 1),
  PROVIDER_TIMEOUT_MS: int(30_000, 100),
  PROVIDER_MAX_ATTEMPTS: int(3, 1),
  PROVIDER_MAX_WAIT_MS: int(5_000),
  RATE_LIMIT_PER_MINUTE: int(50, 1),
  BACKOFF_BASE_MS: int(1_000),
  BACKOFF_MAX_MS: int(10_000),
  JITTER_PCT: num(15).pipe(z.number().max(100)),
  BREAKER_THRESHOLD: int(3, 1),
  BREAKER_COOLDOWN_MS: int(60_000),
  BREAKER_CLOSE_AFTER: int(3, 1),

  SAMPLE_WINDOW_SIZE: int(60, 2),
  SAMPLE_WINDOW_HOURS: num(24).pipe(z.number().gt(0)),

  RISK_ENABLED: bool(true),
  RISK_HORIZON: z.enum(['1h', '6h', '24h']).default('24h'),
  RISK_MIN_SAMPLES: int(10, 2),
  RISK_WEIGHT_DEVIATION: num(0.4),
  RISK_WEIGHT_VOLATILITY: num(0.25),
  RISK_WEIGHT_TREND: num(0.15),
  RISK_WEIGHT_SENTIMENT: num(0.2),
  RISK_MISSING_SIGNAL: z.enum(['redistribute', 'drop']).default('redistribute'),
  RISK_DEVIATION_SCALE: num(0.02).pipe(z.number().gt(0)),
  RISK_VOLATILITY_SCALE: num(0.005).pipe(z.number().gt(0)),
  RISK_TREND_SCALE: num(0.01).pipe(z.number().gt(0)),
  RISK_PARTIAL_CONFIDENCE_CAP: num(70).pipe(z.number().max(100)),
  RISK_LOW_CONFIDENCE_CAP: num(30).pipe(z.number().max(100)),

  RECOVERY_NOTICES: bool(false),
  REDIS_URL: z.string().optional(),
  ALLOW_MEMORY_STORE: bool(false),
  TELEGRAM_BOT_TOKEN: z.string().regex(/^\d+:[\w-]+$/, 'expected <id>:<secret>').optional(),
  ADMIN_CHAT_ID: z.coerce.number().int().optional(),
  HEALTH_PORT: int(8080),
  HEALTH_HOST: z.string().default('0.0.0.0'),
  PII_MASK: bool(true),
});

type Env = Record<string, string | undefined>;

// blank values behave as unset
function compact(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v != null && v.trim() !== '') out[k] = v.trim();
  }
  return out;
}

export function readSettings(env: Env = process.env): Settings {
  const parsed = EnvSchema.safeParse(compact(env));
  if (!parsed.success) {
    throw new SettingsError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  const issues: string[] = [];
  const weights: RiskWeights = {
    deviation: e.RISK_WEIGHT_DEVIATION,
    volatility: e.RISK_WEIGHT_VOLATILITY,
    trend: e.RISK_WEIGHT_TREND,
    sentiment: e.RISK_WEIGHT_SENTIMENT,
  };
  if (weights.deviation + weights.volatility + weights.trend <= 0) {
    issues.push('RISK_WEIGHT_*: at least one price-derived weight must be positive');
  }
  if (e.BACKOFF_MAX_MS < e.BACKOFF_BASE_MS) issues.push('BACKOFF_MAX_MS: must be >= BACKOFF_BASE_MS');
  if (e.TICK_TIMEOUT_MS > e.POLL_INTERVAL_MS * 10) issues.push('TICK_TIMEOUT_MS: must not exceed 10 poll intervals');
  if (issues.length) throw new SettingsError(issues);

  const minutes = (m: number) => Math.round(m * 60_000);
  const settings: Settings = {
    pollIntervalMs: e.POLL_INTERVAL_MS,
    tickTimeoutMs: e.TICK_TIMEOUT_MS,
    workerConcurrency: e.WORKER_CONCURRENCY,
    tiers: {
      free: {
        threshold: e.FREE_THRESHOLD_PCT / 100,
        cooldownMs: minutes(e.COOLDOWN_MINUTES),
        chatId: e.ALERT_CHANNEL_ID ?? null,
        riskScoring: false,
      },
      premium: {
        threshold: e.PREMIUM_THRESHOLD_PCT / 100,
        cooldownMs: minutes(e.PREMIUM_COOLDOWN_MINUTES ?? e.COOLDOWN_MINUTES),
        chatId: e.PREMIUM_CHANNEL_ID ?? null,
        riskScoring: e.RISK_ENABLED,
      },
      enterprise: {
        threshold: e.ENTERPRISE_THRESHOLD_PCT / 100,
        cooldownMs: minutes(e.ENTERPRISE_COOLDOWN_MINUTES ?? e.COOLDOWN_MINUTES),
        chatId: e.ENTERPRISE_CHANNEL_ID ?? null,
        riskScoring: e.RISK_ENABLED,
      },
    },
    provider: {
      baseUrl: e.COINGECKO_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.COINGECKO_API_KEY ?? null,
      batchSize: e.PROVIDER_BATCH_SIZE,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
      maxAttempts: e.PROVIDER_MAX_ATTEMPTS,
      maxWaitMs: e.PROVIDER_MAX_WAIT_MS,
      ratePerMinute: e.RATE_LIMIT_PER_MINUTE,
      backoff: { baseMs: e.BACKOFF_BASE_MS, maxMs: e.BACKOFF_MAX_MS, jitterPct: e.JITTER_PCT },
      breaker: { threshold: e.BREAKER_THRESHOLD, cooldownMs: e.BREAKER_COOLDOWN_MS, closeAfter: e.BREAKER_CLOSE_AFTER },
    },
    samples: { size: e.SAMPLE_WINDOW_SIZE, maxAgeMs: Math.round(e.SAMPLE_WINDOW_HOURS * 3_600_000) },
    risk: {
      enabled: e.RISK_ENABLED,
      horizon: e.RISK_HORIZON,
      minSamples: e.RISK_MIN_SAMPLES,
      weights,
      missingSignal: e.RISK_MISSING_SIGNAL,
      scales: { deviation: e.RISK_DEVIATION_SCALE, volatility: e.RISK_VOLATILITY_SCALE, trend: e.RISK_TREND_SCALE },
      partialConfidenceCap: e.RISK_PARTIAL_CONFIDENCE_CAP,
      lowConfidenceCap: e.RISK_LOW_CONFIDENCE_CAP,
    },
    recoveryNotices: e.RECOVERY_NOTICES,
    redisUrl: e.REDIS_URL ?? null,
    allowMemoryStore: e.ALLOW_MEMORY_STORE,
    telegramToken: e.TELEGRAM_BOT_TOKEN ?? null,
    adminChatId: e.ADMIN_CHAT_ID ?? null,
    health: { port: e.HEALTH_PORT, host: e.HEALTH_HOST },
    piiMask: e.PII_MASK,
  };
  return Object.freeze(settings);
}
