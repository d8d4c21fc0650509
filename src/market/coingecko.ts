import { request } from 'undici';
import { z } from 'zod';
import { ProviderError, providerErrorFromStatus, toProviderError } from '../errors.js';

export type Quote = {
  price: number | null;
  volume24h: number;
  marketCap: number | null;
  lastUpdatedAt: number | null; // ms epoch
};

export type BatchResponse = {
  quotes: Map<string, Quote>;
  unknownIds: string[];
};

/** One remote call for a batch of ids. Implementations throw ProviderError. */
export interface MarketDataProvider {
  readonly name: string;
  fetchBatch(ids: readonly string[]): Promise<BatchResponse>;
}

export type CoinGeckoOptions = {
  baseUrl: string;
  apiKey?: string | null;
  timeoutMs: number;
};

const Entry = z.object({
  usd: z.number().nullable().optional(),
  usd_market_cap: z.number().nullable().optional(),
  usd_24h_vol: z.number().nullable().optional(),
  last_updated_at: z.number().nullable().optional(),
});
const SimplePrice = z.record(Entry);

export class CoinGeckoProvider implements MarketDataProvider {
  readonly name = 'coingecko';

  constructor(private readonly opts: CoinGeckoOptions) {}

  url(ids: readonly string[]): string {
    const q = new URLSearchParams({
      ids: ids.join(','),
      vs_currencies: 'usd',
      include_market_cap: 'true',
      include_24hr_vol: 'true',
      include_last_updated_at: 'true',
      precision: 'full',
    });
    return `${this.opts.baseUrl}/simple/price?${q.toString()}`;
  }

  async fetchBatch(ids: readonly string[]): Promise<BatchResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.opts.apiKey) headers['x-cg-demo-api-key'] = this.opts.apiKey;
    let body: unknown;
    try {
      const res = await request(this.url(ids), { method: 'GET', headers, signal: controller.signal });
      if (res.statusCode >= 400) {
        await res.body.dump();
        throw providerErrorFromStatus(res.statusCode);
      }
      body = await res.body.json();
    } catch (e) {
      if (controller.signal.aborted) throw new ProviderError('transient', 'timeout', `request timed out after ${this.opts.timeoutMs}ms`);
      throw toProviderError(e);
    } finally {
      clearTimeout(timer);
    }

    const parsed = SimplePrice.safeParse(body);
    if (!parsed.success) throw new ProviderError('transient', 'network', 'malformed price response');

    const quotes = new Map<string, Quote>();
    const unknownIds: string[] = [];
    for (const id of ids) {
      const e = parsed.data[id];
      if (!e) { unknownIds.push(id); continue; }
      quotes.set(id, {
        price: e.usd ?? null,
        volume24h: e.usd_24h_vol ?? 0,
        marketCap: e.usd_market_cap ?? null,
        lastUpdatedAt: e.last_updated_at != null ? e.last_updated_at * 1000 : null,
      });
    }
    return { quotes, unknownIds };
  }
}
