import type { RiskSettings } from '../config/settings.js';
import { deviationOf } from '../peg/classifier.js';
import type { PriceSample, RiskAssessment, RiskHorizon, RiskLevel, RiskSignal } from '../schemas.js';

/** Anything that turns a window of samples into an assessment; a trained model can stand in. */
export interface RiskModel {
  assess(assetId: string, samples: readonly PriceSample[], sentiment?: number | null): RiskAssessment;
}

const HORIZON_HOURS: Record<RiskHorizon, number> = { '1h': 1, '6h': 6, '24h': 24 };
const SIGNALS: readonly RiskSignal[] = ['deviation', 'volatility', 'trend', 'sentiment'];
const HOUR_MS = 3_600_000;

const clamp = (x: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, x));

export function mean(xs: readonly number[]): number {
  return xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : 0;
}

export function pstdev(xs: readonly number[]): number {
  if (xs.length < 2) return 0;
  const m = mean(xs);
  return Math.sqrt(mean(xs.map(x => (x - m) ** 2)));
}

// Least-squares slope of y over x; 0 when x has no spread
export function slope(xs: readonly number[], ys: readonly number[]): number {
  const mx = mean(xs);
  const my = mean(ys);
  let num = 0;
  let den = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = (xs[i] ?? 0) - mx;
    num += dx * ((ys[i] ?? 0) - my);
    den += dx * dx;
  }
  return den > 0 ? num / den : 0;
}

export function levelFor(score: number): RiskLevel {
  if (score <= 25) return 'low';
  if (score <= 50) return 'medium';
  if (score <= 75) return 'high';
  return 'critical';
}

const usable = (s: PriceSample) => Number.isFinite(s.price) && s.price > 0 && Number.isFinite(s.timestamp);

/**
 * Weighted heuristic over four signals scored 0-100:
 * deviation (current distance from peg), volatility (spread of signed
 * deviations), trend (projected drift away from the peg over the horizon)
 * and sentiment (negative market mood).
 *
 * Sentiment is optional. Without it the remaining weights are either
 * renormalised (`redistribute`) or the missing share simply counts as zero
 * (`drop`), and confidence is capped at `partialConfidenceCap`.
 */
export class HeuristicRiskModel implements RiskModel {
  constructor(private readonly cfg: RiskSettings) {}

  signalScores(samples: readonly PriceSample[], sentiment?: number | null): Partial<Record<RiskSignal, number>> {
    const { scales, horizon } = this.cfg;
    const out: Partial<Record<RiskSignal, number>> = {};
    const last = samples[samples.length - 1];
    if (last) {
      const devs = samples.map(s => deviationOf(s.price));
      out.deviation = clamp((Math.abs(deviationOf(last.price)) / scales.deviation) * 100, 0, 100);
      out.volatility = clamp((pstdev(devs) / scales.volatility) * 100, 0, 100);
      const t0 = samples[0]?.timestamp ?? last.timestamp;
      const hours = samples.map(s => (s.timestamp - t0) / HOUR_MS);
      const drift = slope(hours, devs.map(Math.abs)) * HORIZON_HOURS[horizon];
      out.trend = clamp((Math.max(0, drift) / scales.trend) * 100, 0, 100);
    }
    if (typeof sentiment === 'number' && Number.isFinite(sentiment)) {
      out.sentiment = Math.max(0, -clamp(sentiment, -100, 100));
    }
    return out;
  }

  assess(assetId: string, samples: readonly PriceSample[], sentiment?: number | null): RiskAssessment {
    const window = samples.filter(usable).sort((a, b) => a.timestamp - b.timestamp);
    const n = window.length;
    const scores = this.signalScores(window, sentiment);
    const present = SIGNALS.filter(s => scores[s] !== undefined);

    const w = this.cfg.weights;
    const pool = this.cfg.missingSignal === 'redistribute' ? present : SIGNALS;
    const total = pool.reduce((acc, s) => acc + w[s], 0);

    const contributions = present
      .map(signal => ({ signal, contribution: total > 0 ? ((scores[signal] ?? 0) * w[signal]) / total : 0 }))
      .sort((a, b) => b.contribution - a.contribution);
    const score = contributions.reduce((acc, c) => acc + c.contribution, 0);

    return {
      assetId,
      score,
      confidence: this.confidence(n, present.map(s => scores[s] ?? 0), scores.sentiment !== undefined),
      level: levelFor(score),
      contributions,
      horizon: this.cfg.horizon,
      sampleCount: n,
    };
  }

  private confidence(n: number, signalScores: number[], hasSentiment: boolean): number {
    if (n === 0) return 0;
    const ceiling = hasSentiment ? 100 : this.cfg.partialConfidenceCap;
    let c = clamp(100 - 2 * pstdev(signalScores), 10, ceiling);
    if (n < this.cfg.minSamples) c = Math.min(c, (this.cfg.lowConfidenceCap * n) / this.cfg.minSamples);
    return c;
  }
}
