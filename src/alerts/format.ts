import type { PegStatus, RiskAssessment, Tier, TierReading } from '../schemas.js';

export const MAX_MESSAGE = 4096;

const MARK: Record<PegStatus, string> = { STABLE: '🟢', WARNING: '🟡', DEPEGGED: '🔴' };
const TIER_LABEL: Record<Tier, string> = { free: 'FREE', premium: 'PREMIUM', enterprise: 'ENTERPRISE' };

export const marker = (s: PegStatus) => MARK[s];

export function formatPct(deviation: number): string {
  const pct = deviation * 100;
  return `${pct >= 0 ? '+' : ''}${pct.toFixed(2)}%`;
}

export const formatPrice = (p: number) => `$${p.toFixed(4)}`;

export function formatUtc(ts: number): string {
  return `${new Date(ts).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatRisk(r: RiskAssessment): string {
  return `Risk: ${r.score.toFixed(1)}/100 ${r.level} (confidence ${Math.round(r.confidence)}%, ${r.horizon})`;
}

export function truncate(text: string, max = MAX_MESSAGE): string {
  if (text.length <= max) return text;
  let cut = max - 1;
  // never leave half of a surrogate pair before the ellipsis
  const last = text.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut--;
  return `${text.slice(0, cut)}…`;
}

export function sortByMagnitude(rs: readonly TierReading[]): TierReading[] {
  return [...rs].sort((a, b) => b.reading.magnitude - a.reading.magnitude || a.symbol.localeCompare(b.symbol));
}

const overviewLine = (r: TierReading) => `${marker(r.reading.status)} ${r.symbol} ${formatPrice(r.price)} ${formatPct(r.reading.deviation)}`;

export type AlertPayload = {
  tier: Tier;
  threshold: number;
  symbol: string;
  name: string;
  price: number;
  deviation: number;
  status: PegStatus;
  risk: RiskAssessment | null;
  timestamp: number;
};

export function formatAlert(p: AlertPayload, overview: readonly TierReading[] = []): string {
  const lines = [
    p.status === 'DEPEGGED' ? `🚨 DEPEG ALERT (${TIER_LABEL[p.tier]})` : `⚠️ PEG WARNING (${TIER_LABEL[p.tier]})`,
    '',
    `${marker(p.status)} ${p.symbol} (${p.name}) ${p.status}`,
    `Price: ${formatPrice(p.price)} (${formatPct(p.deviation)})`,
  ];
  if (p.risk) lines.push(formatRisk(p.risk));
  if (overview.length) {
    lines.push('', 'Overview:');
    for (const r of sortByMagnitude(overview)) lines.push(overviewLine(r));
  }
  lines.push('', `Time: ${formatUtc(p.timestamp)}`);
  if (p.tier !== 'free') lines.push(`${TIER_LABEL[p.tier]} feed · threshold ${(p.threshold * 100).toFixed(2)}%`);
  return truncate(lines.join('\n'));
}

export function formatRecovery(p: Pick<AlertPayload, 'tier' | 'symbol' | 'name' | 'price' | 'deviation' | 'timestamp'>): string {
  return truncate([
    `✅ PEG RESTORED (${TIER_LABEL[p.tier]})`,
    '',
    `${marker('STABLE')} ${p.symbol} (${p.name}) back within threshold`,
    `Price: ${formatPrice(p.price)} (${formatPct(p.deviation)})`,
    '',
    `Time: ${formatUtc(p.timestamp)}`,
  ].join('\n'));
}

export function statusHeadline(rs: readonly TierReading[]): string {
  const off = rs.filter(r => r.reading.status !== 'STABLE').length;
  if (!rs.length) return 'No readings yet';
  if (off === 0) return 'All pegs holding';
  return `${off} of ${rs.length} off peg`;
}

export function formatStatus(tier: Tier, rs: readonly TierReading[], at: number | null): string {
  const lines = [`📊 Peg status (${TIER_LABEL[tier]})`, statusHeadline(rs)];
  if (rs.length) lines.push('');
  for (const r of sortByMagnitude(rs)) lines.push(overviewLine(r));
  if (at !== null) lines.push('', `Updated: ${formatUtc(at)}`);
  return truncate(lines.join('\n'));
}

export function formatCheck(r: TierReading, name: string, at: number | null): string {
  const lines = [
    `${marker(r.reading.status)} ${r.symbol} (${name}) ${r.reading.status}`,
    `Price: ${formatPrice(r.price)} (${formatPct(r.reading.deviation)})`,
  ];
  if (r.risk) lines.push(formatRisk(r.risk));
  if (at !== null) lines.push(`Updated: ${formatUtc(at)}`);
  return lines.join('\n');
}

export const HELP_TEXT = [
  'Commands:',
  '/status [free|premium|enterprise] – latest readings for a tier',
  '/check <SYMBOL> – latest reading and risk for one asset',
  '/help – this message',
].join('\n');

export const START_TEXT = `Stablecoin peg monitor. Alerts are posted to the tier channels.\n\n${HELP_TEXT}`;
