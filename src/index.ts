import fs from 'node:fs';
import dotenv from 'dotenv';
import { Bot } from 'grammy';
import { Redis } from 'ioredis';
import { AssetCatalog } from './assets.js';
import { registerCommands } from './bot.js';
import { readSettings } from './config/settings.js';
import { buildHealthServer } from './health.js';
import { errMessage, logEvent } from './observability/log.js';
import { enableDefaultMetrics } from './observability/metrics.js';
import { setMasking } from './security/log_mask.js';
import { buildServices } from './wiring.js';

if (fs.existsSync('.env.local')) dotenv.config({ path: '.env.local' }); else dotenv.config();

process.on('unhandledRejection', e => logEvent('error', 'process.unhandled_rejection', { error: errMessage(e) }));

const settings = readSettings();
setMasking(settings.piiMask);
enableDefaultMetrics();

const catalog = AssetCatalog.load();
const redis = settings.redisUrl ? new Redis(settings.redisUrl, { maxRetriesPerRequest: 2 }) : null;
redis?.on('error', e => logEvent('warn', 'redis.error', { error: errMessage(e) }));

const { gateway, scheduler } = buildServices(settings, catalog, { redis });

const health = buildHealthServer({
  lastReport: () => scheduler.lastReport(),
  lastCompletedAt: () => scheduler.lastCompletedAt(),
  breakerState: () => gateway.breaker.state(),
  flaggedIds: () => gateway.flaggedIds(),
  logger: true,
});

let bot: Bot | null = null;
if (settings.telegramToken) {
  bot = new Bot(settings.telegramToken);
  registerCommands(bot, { catalog, lastReport: () => scheduler.lastReport(), flags: gateway, adminId: settings.adminChatId });
  bot.start({ onStart: me => logEvent('info', 'bot.started', { username: me.username }) })
    .catch(e => logEvent('error', 'bot.stopped', { error: errMessage(e) }));
}

await health.listen({ port: settings.health.port, host: settings.health.host });
logEvent('info', 'pegwatch.started', {
  assets: catalog.all().length,
  pollIntervalMs: settings.pollIntervalMs,
  redis: redis !== null,
  bot: bot !== null,
});
scheduler.start();

let stopping = false;
async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  logEvent('info', 'pegwatch.stopping', { signal });
  try {
    await scheduler.stop();
    await health.close();
    if (bot) await bot.stop();
    if (redis) await redis.quit();
  } catch (e) {
    logEvent('error', 'pegwatch.stop_failed', { error: errMessage(e) });
    process.exit(1);
  }
  process.exit(0);
}

process.once('SIGINT', () => { void shutdown('SIGINT'); });
process.once('SIGTERM', () => { void shutdown('SIGTERM'); });
