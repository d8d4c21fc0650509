import { trace } from '@opentelemetry/api';
import type { DispatchDecision, DispatchInput } from '../alerts/dispatcher.js';
import type { AssetCatalog } from '../assets.js';
import type { Settings } from '../config/settings.js';
import { CooldownStoreUnavailableError, TickTimeoutError } from '../errors.js';
import { errMessage, logEvent } from '../observability/log.js';
import { recordTick, recordTickSkipped, setDeviation, setRiskScore } from '../observability/metrics.js';
import { classify, deviationOf } from '../peg/classifier.js';
import type { RiskModel } from '../risk/aggregator.js';
import type { SampleWindowStore } from '../risk/sample_window.js';
import { TIERS, type Asset, type FetchFailure, type FetchResult, type PriceSample, type RiskAssessment, type Tier, type TierReading } from '../schemas.js';
import { runBounded } from './pool.js';

export type Phase = 'IDLE' | 'FETCHING' | 'CLASSIFYING' | 'SCORING' | 'DISPATCHING';
export type TickOutcome = 'ok' | 'degraded' | 'failed' | 'skipped';

export type TickReport = {
  seq: number;
  outcome: TickOutcome;
  startedAt: number;
  durationMs: number;
  requested: number;
  fetched: number;
  failures: FetchFailure[];
  readings: Record<Tier, TierReading[]>;
  decisions: DispatchDecision[];
  dispatchHalted: boolean;
  error: string | null;
};

export interface PriceSource {
  fetch(assetIds: readonly string[]): Promise<FetchResult>;
}

export interface Dispatcher {
  evaluate(input: DispatchInput): Promise<DispatchDecision>;
}

/** Optional market-mood feed in [-100, 100]; null when unknown. */
export interface SentimentSource {
  sentiment(assetId: string): Promise<number | null>;
}

export type SchedulerDeps = {
  settings: Pick<Settings, 'pollIntervalMs' | 'tickTimeoutMs' | 'workerConcurrency' | 'tiers'>;
  catalog: AssetCatalog;
  gateway: PriceSource;
  windows: SampleWindowStore;
  dispatcher: Dispatcher;
  risk?: RiskModel | null;
  sentiment?: SentimentSource | null;
  tiers?: readonly Tier[];
  now?: () => number;
};

type TickState = {
  report: TickReport;
  samples: Map<string, PriceSample>;
  aborted: boolean;
};

const emptyReadings = (): Record<Tier, TierReading[]> => ({ free: [], premium: [], enterprise: [] });

export class MonitorScheduler {
  private state: Phase = 'IDLE';
  private seq = 0;
  private inFlight: Promise<TickReport> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private last: TickReport | null = null;
  private lastCompleted: number | null = null;
  private readonly tiers: readonly Tier[];
  private readonly now: () => number;

  constructor(private readonly deps: SchedulerDeps) {
    this.tiers = deps.tiers ?? TIERS;
    this.now = deps.now ?? Date.now;
  }

  phase(): Phase { return this.state; }
  lastReport(): TickReport | null { return this.last; }
  lastCompletedAt(): number | null { return this.lastCompleted; }
  running(): boolean { return this.timer !== null; }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.fire(), this.deps.settings.pollIntervalMs);
    this.fire();
  }

  /** Clears the timer and waits for the tick in flight, if any. */
  async stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    if (this.inFlight) await this.inFlight;
  }

  private fire() {
    this.runTick().catch(e => logEvent('error', 'tick.unhandled', { error: errMessage(e) }));
  }

  /** One full tick. Never rejects; a tick already in flight makes this one `skipped`. */
  runTick(): Promise<TickReport> {
    if (this.inFlight) {
      recordTickSkipped();
      logEvent('warn', 'tick.skipped', { running: this.seq, phase: this.state });
      return Promise.resolve(this.blankReport(this.seq, 'skipped'));
    }
    const run = this.execute().finally(() => { this.inFlight = null; });
    this.inFlight = run;
    return run;
  }

  private blankReport(seq: number, outcome: TickOutcome): TickReport {
    return {
      seq, outcome, startedAt: this.now(), durationMs: 0, requested: 0, fetched: 0,
      failures: [], readings: emptyReadings(), decisions: [], dispatchHalted: false, error: null,
    };
  }

  private async execute(): Promise<TickReport> {
    const tick: TickState = { report: this.blankReport(++this.seq, 'ok'), samples: new Map(), aborted: false };
    const { report } = tick;
    const span = trace.getTracer('pegwatch').startSpan('tick', { attributes: { 'tick.seq': report.seq } });
    const limit = this.deps.settings.tickTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TickTimeoutError(limit)), limit);
    });

    try {
      await Promise.race([this.phases(tick), timeout]);
      // flagged ids count too: every requested asset left unwatched is lost coverage
      const degraded = report.dispatchHalted
        || report.failures.length > 0
        || report.decisions.some(d => d.result === 'failed');
      report.outcome = degraded ? 'degraded' : 'ok';
      this.lastCompleted = this.now();
    } catch (e) {
      tick.aborted = true;
      report.outcome = 'failed';
      report.error = errMessage(e);
      logEvent('error', e instanceof TickTimeoutError ? 'tick.timeout' : 'tick.failed', { seq: report.seq, phase: this.state, error: report.error });
    } finally {
      clearTimeout(timer);
      this.state = 'IDLE';
    }

    report.durationMs = this.now() - report.startedAt;
    recordTick(report.outcome, report.durationMs / 1000);
    span.setAttribute('tick.outcome', report.outcome);
    span.end();
    logEvent(report.outcome === 'ok' ? 'info' : 'warn', 'tick.done', {
      seq: report.seq,
      outcome: report.outcome,
      durationMs: report.durationMs,
      fetched: report.fetched,
      failed: report.failures.length,
      sent: report.decisions.filter(d => d.result === 'sent').length,
    });
    this.last = report;
    return report;
  }

  // A tick abandoned on timeout keeps running until its next check; it must not move the phase.
  private enter(tick: TickState, phase: Phase) {
    if (!tick.aborted) this.state = phase;
  }

  private async phases(tick: TickState) {
    await this.fetchPhase(tick);
    if (tick.aborted) return;
    this.classifyPhase(tick);
    if (tick.aborted) return;
    await this.scoringPhase(tick);
    if (tick.aborted) return;
    await this.dispatchPhase(tick);
  }

  private async fetchPhase(tick: TickState) {
    this.enter(tick, 'FETCHING');
    const ids = this.deps.catalog.idsFor(this.tiers);
    tick.report.requested = ids.length;
    const res = await this.deps.gateway.fetch(ids);
    tick.samples = res.samples;
    tick.report.fetched = res.samples.size;
    tick.report.failures = res.failures;
    for (const f of res.failures) {
      logEvent(f.reason === 'flagged' ? 'debug' : 'warn', 'tick.asset.unavailable', { seq: tick.report.seq, ...f });
    }
    for (const s of res.samples.values()) {
      const asset = this.deps.catalog.get(s.assetId);
      if (asset) setDeviation(asset.symbol, deviationOf(s.price));
      try {
        await this.deps.windows.append(s);
      } catch (e) {
        logEvent('warn', 'window.append.failed', { assetId: s.assetId, error: errMessage(e) });
      }
    }
  }

  private classifyPhase(tick: TickState) {
    this.enter(tick, 'CLASSIFYING');
    for (const tier of this.tiers) {
      const { threshold } = this.deps.settings.tiers[tier];
      for (const asset of this.deps.catalog.forTier(tier)) {
        const sample = tick.samples.get(asset.id);
        if (!sample) continue;
        const reading = classify(sample, threshold);
        tick.report.readings[tier].push({ tier, assetId: asset.id, symbol: asset.symbol, price: sample.price, reading, risk: null });
      }
    }
  }

  private async scoringPhase(tick: TickState) {
    const model = this.deps.risk;
    const scored = this.tiers.filter(t => this.deps.settings.tiers[t].riskScoring);
    if (!model || !scored.length) return;
    this.enter(tick, 'SCORING');
    const ids = [...new Set(scored.flatMap(t => tick.report.readings[t].map(r => r.assetId)))];
    const risks = new Map<string, RiskAssessment>();
    await runBounded(ids, this.deps.settings.workerConcurrency, async id => {
      try {
        const window = await this.deps.windows.window(id);
        const sentiment = this.deps.sentiment ? await this.deps.sentiment.sentiment(id) : null;
        risks.set(id, model.assess(id, window, sentiment));
      } catch (e) {
        logEvent('warn', 'risk.assess.failed', { assetId: id, error: errMessage(e) });
      }
    });
    for (const t of scored) {
      for (const r of tick.report.readings[t]) {
        const risk = risks.get(r.assetId);
        if (!risk) continue;
        r.risk = risk;
        setRiskScore(r.symbol, risk.score);
      }
    }
  }

  private async dispatchPhase(tick: TickState) {
    this.enter(tick, 'DISPATCHING');
    const now = tick.report.startedAt;
    const jobs: DispatchInput[] = [];
    for (const tier of this.tiers) {
      const overview = tick.report.readings[tier];
      for (const r of overview) {
        const asset: Asset | undefined = this.deps.catalog.get(r.assetId);
        const sample = tick.samples.get(r.assetId);
        if (!asset || !sample) continue;
        jobs.push({ asset, sample, reading: r.reading, risk: r.risk, tier, now, overview });
      }
    }
    const out = await runBounded(jobs, this.deps.settings.workerConcurrency, async job => {
      if (tick.aborted) throw new TickTimeoutError(this.deps.settings.tickTimeoutMs);
      return this.deps.dispatcher.evaluate(job);
    });
    tick.report.decisions = out.results;
    if (out.ok) return;
    if (out.error instanceof CooldownStoreUnavailableError) {
      tick.report.dispatchHalted = true;
      logEvent('error', 'tick.dispatch.halted', { seq: tick.report.seq, error: out.error.message });
      return;
    }
    throw out.error;
  }
}
