import { Breaker } from '../circuit.js';
import { ProviderError, toProviderError } from '../errors.js';
import { logEvent } from '../observability/log.js';
import { recordFetchFailure, recordProviderCall } from '../observability/metrics.js';
import type { FetchFailure, FetchResult, PriceSample } from '../schemas.js';
import type { BatchResponse, MarketDataProvider } from './coingecko.js';
import { RateLedger } from './rate_ledger.js';

export type GatewayOptions = {
  batchSize: number;
  maxAttempts: number;
  backoff: { baseMs: number; maxMs: number; jitterPct: number };
  ledger: RateLedger;
  breaker: Breaker;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function backoffDelay(attempt: number, b: GatewayOptions['backoff'], random: () => number = Math.random): number {
  const capped = Math.min(b.maxMs, b.baseMs * 2 ** attempt);
  return Math.round(capped + capped * (b.jitterPct / 100) * random());
}

export function chunk<T>(xs: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < xs.length; i += size) out.push(xs.slice(i, i + size));
  return out;
}

const validPrice = (p: number | null): p is number => p !== null && Number.isFinite(p) && p > 0;

export class MarketDataGateway {
  private flagged = new Map<string, FetchFailure>();
  private seq = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly provider: MarketDataProvider, private readonly opts: GatewayOptions) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? (ms => new Promise<void>(res => setTimeout(res, ms)));
    this.random = opts.random ?? Math.random;
  }

  get breaker(): Breaker { return this.opts.breaker; }

  flaggedIds(): string[] { return [...this.flagged.keys()]; }
  clearFlag(id: string): boolean { return this.flagged.delete(id); }
  clearFlags(): number {
    const n = this.flagged.size;
    this.flagged.clear();
    if (n) logEvent('info', 'gateway.flags.cleared', { count: n });
    return n;
  }

  /** Never rejects for provider faults; they come back in `failures`. */
  async fetch(assetIds: readonly string[]): Promise<FetchResult> {
    const samples = new Map<string, PriceSample>();
    const failures: FetchFailure[] = [];
    const active: string[] = [];
    for (const id of new Set(assetIds)) {
      const f = this.flagged.get(id);
      if (f) failures.push({ assetId: id, kind: 'persistent', reason: 'flagged', message: `flagged earlier: ${f.reason}` });
      else active.push(id);
    }

    const tick = ++this.seq;
    const batches = chunk(active, Math.max(1, this.opts.batchSize));
    for (const [i, batch] of batches.entries()) {
      const batchId = `${this.provider.name}-${tick}-${i + 1}`;
      const res = await this.fetchWithRetry(batch, batchId);
      if (res instanceof ProviderError) {
        for (const id of batch) failures.push(this.fail(id, res.kind, res.reason, res.message));
        continue;
      }
      for (const id of res.unknownIds) failures.push(this.fail(id, 'persistent', 'unknown_id', 'id not known to provider'));
      for (const [id, q] of res.quotes) {
        // a gap in the feed skips the asset for this tick only
        if (!validPrice(q.price)) {
          failures.push(this.fail(id, 'transient', 'invalid_price', `unusable price: ${String(q.price)}`));
          continue;
        }
        samples.set(id, Object.freeze({
          assetId: id,
          price: q.price,
          volume24h: q.volume24h,
          marketCap: q.marketCap,
          timestamp: q.lastUpdatedAt ?? this.now(),
          provenance: Object.freeze({ provider: this.provider.name, batchId }),
        }));
      }
      // ids the provider silently dropped from the payload
      for (const id of batch) {
        if (!samples.has(id) && !res.quotes.has(id) && !res.unknownIds.includes(id)) {
          failures.push(this.fail(id, 'persistent', 'unknown_id', 'missing from response'));
        }
      }
    }
    for (const f of failures) recordFetchFailure(f.kind);
    return { samples, failures };
  }

  private fail(assetId: string, kind: FetchFailure['kind'], reason: FetchFailure['reason'], message: string): FetchFailure {
    const failure: FetchFailure = { assetId, kind, reason, message };
    if (kind === 'persistent' && !this.flagged.has(assetId)) {
      this.flagged.set(assetId, failure);
      logEvent('warn', 'gateway.flagged', { assetId, reason, message });
    }
    return failure;
  }

  private async fetchWithRetry(batch: string[], batchId: string): Promise<BatchResponse | ProviderError> {
    const { breaker, ledger, maxAttempts } = this.opts;
    let last: ProviderError = new ProviderError('transient', 'network', 'no attempt made');
    for (let attempt = 0; attempt < Math.max(1, maxAttempts); attempt++) {
      if (!breaker.allow()) {
        recordProviderCall('breaker_open');
        return new ProviderError('transient', 'breaker_open', 'provider circuit open');
      }
      if (!(await ledger.acquire())) {
        recordProviderCall('rate_limited');
        logEvent('warn', 'gateway.rate_limited', { batchId, size: batch.length });
        return new ProviderError('transient', 'rate_limited', 'no call slot within max wait');
      }
      try {
        const res = await this.provider.fetchBatch(batch);
        breaker.success();
        recordProviderCall('ok');
        return res;
      } catch (e) {
        last = toProviderError(e);
        recordProviderCall(last.kind);
        if (last.kind === 'persistent') {
          logEvent('warn', 'gateway.batch.rejected', { batchId, reason: last.reason, message: last.message });
          return last;
        }
        breaker.fail();
        const retrying = attempt + 1 < maxAttempts;
        logEvent(retrying ? 'info' : 'warn', retrying ? 'gateway.batch.retry' : 'gateway.batch.failed', {
          batchId, attempt: attempt + 1, reason: last.reason, message: last.message,
        });
        if (retrying) await this.sleep(backoffDelay(attempt, this.opts.backoff, this.random));
      }
    }
    return last;
  }
}
