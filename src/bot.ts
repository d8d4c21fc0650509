import type { Bot } from 'grammy';
import { HELP_TEXT, START_TEXT, formatCheck, formatStatus } from './alerts/format.js';
import type { AssetCatalog } from './assets.js';
import type { TickReport } from './monitor/scheduler.js';
import { errMessage, logEvent } from './observability/log.js';
import { TIERS, type Tier, type TierReading } from './schemas.js';

/** The gateway's flag controls, as the admin commands see them. */
export interface FlagControl {
  flaggedIds(): string[];
  clearFlag(id: string): boolean;
  clearFlags(): number;
}

export type BotDeps = {
  catalog: AssetCatalog;
  lastReport: () => TickReport | null;
  flags?: FlagControl;
  adminId?: number | null;
};

const isTier = (s: string): s is Tier => TIERS.some(t => t === s);

const NO_DATA = 'No readings yet, the first check is still running.';

export function statusReply(arg: string, report: TickReport | null): string {
  const want = arg.trim().toLowerCase() || 'free';
  if (!isTier(want)) return `Unknown tier "${arg.trim()}". Use free, premium or enterprise.`;
  if (!report) return NO_DATA;
  return formatStatus(want, report.readings[want], report.startedAt);
}

// Prefers the tier that carries a risk score for the asset
function findReading(report: TickReport, assetId: string): TierReading | undefined {
  const found = TIERS.map(t => report.readings[t].find(r => r.assetId === assetId)).filter((r): r is TierReading => r !== undefined);
  return found.find(r => r.risk !== null) ?? found[0];
}

export function checkReply(arg: string, report: TickReport | null, catalog: AssetCatalog): string {
  const sym = arg.trim();
  if (!sym) return 'Usage: /check <SYMBOL>, e.g. /check USDC';
  const asset = catalog.bySymbol(sym);
  if (!asset) return `Unknown asset "${sym}".`;
  if (!report) return NO_DATA;
  const reading = findReading(report, asset.id);
  if (!reading) return `${asset.symbol}: no price in the latest check.`;
  return formatCheck(reading, asset.name, report.startedAt);
}

export const isAdmin = (fromId: number | undefined, adminId: number | null | undefined): boolean =>
  adminId != null && fromId === adminId;

export function flagsReply(flags: FlagControl): string {
  const ids = flags.flaggedIds();
  return ids.length ? `Flagged (not fetched): ${ids.join(', ')}` : 'Nothing flagged.';
}

// accepts a catalog symbol or a raw provider id
export function clearFlagsReply(arg: string, flags: FlagControl, catalog: AssetCatalog): string {
  const want = arg.trim();
  if (!want) {
    const n = flags.clearFlags();
    return n ? `Cleared ${n} flagged asset${n === 1 ? '' : 's'}.` : 'Nothing flagged.';
  }
  const id = catalog.bySymbol(want)?.id ?? want;
  return flags.clearFlag(id) ? `Cleared ${id}, it is fetched again on the next tick.` : `${id} is not flagged.`;
}

export function registerCommands(bot: Bot, deps: BotDeps) {
  bot.command('start', ctx => ctx.reply(START_TEXT));
  bot.command('help', ctx => ctx.reply(HELP_TEXT));
  bot.command('status', ctx => ctx.reply(statusReply(ctx.match, deps.lastReport())));
  bot.command('check', ctx => ctx.reply(checkReply(ctx.match, deps.lastReport(), deps.catalog)));
  bot.command('flags', ctx => {
    if (!deps.flags || !isAdmin(ctx.from?.id, deps.adminId)) return ctx.reply('Unauthorized.');
    return ctx.reply(flagsReply(deps.flags));
  });
  bot.command('clearflags', ctx => {
    if (!deps.flags || !isAdmin(ctx.from?.id, deps.adminId)) return ctx.reply('Unauthorized.');
    logEvent('info', 'bot.clearflags', { admin: ctx.from?.id, arg: ctx.match });
    return ctx.reply(clearFlagsReply(ctx.match, deps.flags, deps.catalog));
  });
  bot.catch(err => logEvent('error', 'bot.error', { error: errMessage(err.error) }));
}
