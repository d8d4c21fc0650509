import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Asset, Tier } from './schemas.js';

export const PEG_REFERENCE = 1.0;

const AssetEntry = z.object({
  id: z.string().min(1),
  symbol: z.string().min(1),
  name: z.string().min(1),
  kind: z.string().default('unknown'),
  audience: z.enum(['free', 'premium', 'both']),
});

// src/ when run from sources, dist/src/ when built
const CANDIDATES = ['../data/assets.json', '../../data/assets.json'];

function defaultCatalogPath(): string {
  for (const rel of CANDIDATES) {
    const p = fileURLToPath(new URL(rel, import.meta.url));
    if (fs.existsSync(p)) return p;
  }
  throw new Error('assets.json not found; set ASSETS_FILE');
}

export class AssetCatalog {
  private byId = new Map<string, Asset>();
  private bySym = new Map<string, Asset>();

  constructor(assets: readonly Asset[]) {
    for (const a of assets) {
      if (this.byId.has(a.id)) throw new Error(`duplicate asset id: ${a.id}`);
      const sym = a.symbol.toUpperCase();
      if (this.bySym.has(sym)) throw new Error(`duplicate asset symbol: ${a.symbol}`);
      const frozen = Object.freeze({ ...a });
      this.byId.set(a.id, frozen);
      this.bySym.set(sym, frozen);
    }
  }

  static fromJson(raw: unknown): AssetCatalog {
    const entries = z.array(AssetEntry).parse(raw);
    return new AssetCatalog(entries.map(e => ({ ...e, reference: PEG_REFERENCE })));
  }

  static load(path = process.env.ASSETS_FILE || defaultCatalogPath()): AssetCatalog {
    return AssetCatalog.fromJson(JSON.parse(fs.readFileSync(path, 'utf8')));
  }

  all(): Asset[] { return [...this.byId.values()]; }
  get(id: string): Asset | undefined { return this.byId.get(id); }
  bySymbol(symbol: string): Asset | undefined { return this.bySym.get(symbol.trim().toUpperCase()); }

  forTier(tier: Tier): Asset[] {
    if (tier === 'free') return this.all().filter(a => a.audience === 'free' || a.audience === 'both');
    return this.all().filter(a => a.audience === 'premium' || a.audience === 'both');
  }

  // Union across tiers so one provider call covers everyone
  idsFor(tiers: readonly Tier[]): string[] {
    const ids = new Set<string>();
    for (const t of tiers) for (const a of this.forTier(t)) ids.add(a.id);
    return [...ids];
  }
}
