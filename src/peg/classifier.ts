import { PEG_REFERENCE } from '../assets.js';
import type { PegReading, PegStatus, PriceSample } from '../schemas.js';

const RANK: Record<PegStatus, number> = { STABLE: 0, WARNING: 1, DEPEGGED: 2 };

export function severityRank(status: PegStatus): number {
  return RANK[status];
}

export function deviationOf(price: number, reference = PEG_REFERENCE): number {
  return (price - reference) / reference;
}

/**
 * Bands by magnitude against the caller's threshold `t`:
 * below t is STABLE, [t, 2t) is WARNING, 2t and above is DEPEGGED.
 */
export function classifyPrice(price: number, threshold: number, reference = PEG_REFERENCE): PegReading {
  if (!Number.isFinite(threshold) || threshold <= 0) throw new RangeError(`threshold must be a positive fraction, got ${threshold}`);
  if (!Number.isFinite(price)) throw new RangeError(`price must be finite, got ${price}`);
  const deviation = deviationOf(price, reference);
  const magnitude = Math.abs(deviation);
  let status: PegStatus = 'STABLE';
  if (magnitude >= 2 * threshold) status = 'DEPEGGED';
  else if (magnitude >= threshold) status = 'WARNING';
  return { status, deviation, magnitude };
}

export function classify(sample: PriceSample, threshold: number): PegReading {
  return classifyPrice(sample.price, threshold);
}
