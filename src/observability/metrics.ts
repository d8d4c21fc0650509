import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { FailureKind, Tier } from '../schemas.js';

export const registry = new Registry();

let defaultsOn = false;
export function enableDefaultMetrics() {
  if (defaultsOn) return;
  defaultsOn = true;
  collectDefaultMetrics({ register: registry });
}

const ticks = new Counter({ name: 'pegwatch_ticks_total', help: 'Completed ticks by outcome', labelNames: ['outcome'], registers: [registry] });
const ticksSkipped = new Counter({ name: 'pegwatch_ticks_skipped_total', help: 'Ticks skipped because the previous one was still running', registers: [registry] });
const tickDuration = new Histogram({
  name: 'pegwatch_tick_duration_seconds',
  help: 'Wall time of a tick',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});
const providerCalls = new Counter({ name: 'pegwatch_provider_calls_total', help: 'Provider batch calls by result', labelNames: ['result'], registers: [registry] });
const fetchFailures = new Counter({ name: 'pegwatch_fetch_failures_total', help: 'Per-asset fetch failures', labelNames: ['kind'], registers: [registry] });
const alerts = new Counter({ name: 'pegwatch_alerts_total', help: 'Dispatch decisions', labelNames: ['tier', 'result'], registers: [registry] });
const deviation = new Gauge({ name: 'pegwatch_deviation_ratio', help: 'Signed deviation from the 1.00 reference', labelNames: ['symbol'], registers: [registry] });
const riskScore = new Gauge({ name: 'pegwatch_risk_score', help: 'Latest risk score 0-100', labelNames: ['symbol'], registers: [registry] });

export type ProviderCallResult = 'ok' | 'transient' | 'persistent' | 'rate_limited' | 'breaker_open';

export function recordTick(outcome: string, seconds: number) {
  ticks.inc({ outcome });
  tickDuration.observe(seconds);
}
export function recordTickSkipped() { ticksSkipped.inc(); }
export function recordProviderCall(result: ProviderCallResult) { providerCalls.inc({ result }); }
export function recordFetchFailure(kind: FailureKind) { fetchFailures.inc({ kind }); }
export function recordAlert(tier: Tier, result: string) { alerts.inc({ tier, result }); }
export function setDeviation(symbol: string, value: number) { deviation.set({ symbol }, value); }
export function setRiskScore(symbol: string, value: number) { riskScore.set({ symbol }, value); }
