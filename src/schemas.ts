export type Tier = 'free' | 'premium' | 'enterprise';
export const TIERS: readonly Tier[] = ['free', 'premium', 'enterprise'];

export type Audience = 'free' | 'premium' | 'both';

export type Asset = {
  id: string; // provider identifier, e.g. "usd-coin"
  symbol: string;
  name: string;
  kind: string; // collateral model, informational only
  audience: Audience;
  reference: number; // always 1.00
};

export type Provenance = { provider: string; batchId: string };

export type PriceSample = {
  assetId: string;
  price: number;
  volume24h: number;
  marketCap: number | null;
  timestamp: number; // ms epoch
  provenance: Provenance;
};

export type PegStatus = 'STABLE' | 'WARNING' | 'DEPEGGED';

export type PegReading = {
  status: PegStatus;
  deviation: number; // signed, (price - ref) / ref
  magnitude: number; // |deviation|
};

export type RiskHorizon = '1h' | '6h' | '24h';
export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';
export type RiskSignal = 'deviation' | 'volatility' | 'trend' | 'sentiment';

export type RiskAssessment = {
  assetId: string;
  score: number; // 0..100
  confidence: number; // 0..100
  level: RiskLevel;
  contributions: { signal: RiskSignal; contribution: number }[]; // descending
  horizon: RiskHorizon;
  sampleCount: number;
};

export type FailureKind = 'transient' | 'persistent';
export type FailureReason =
  | 'timeout'
  | 'http_429'
  | 'http_5xx'
  | 'network'
  | 'rate_limited'
  | 'breaker_open'
  | 'auth'
  | 'bad_request'
  | 'unknown_id'
  | 'invalid_price'
  | 'flagged';

export type FetchFailure = {
  assetId: string;
  kind: FailureKind;
  reason: FailureReason;
  message: string;
};

export type FetchResult = {
  samples: Map<string, PriceSample>;
  failures: FetchFailure[];
};

export type TierReading = {
  tier: Tier;
  assetId: string;
  symbol: string;
  price: number;
  reading: PegReading;
  risk: RiskAssessment | null;
};
