export type RateLedgerOptions = {
  ratePerMinute: number;
  maxWaitMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const WINDOW_MS = 60_000;

const defaultSleep = (ms: number) => new Promise<void>(res => setTimeout(res, ms));

/**
 * Sliding-window call ledger. A slot is granted when fewer than `ratePerMinute`
 * calls happened in the last 60s and the previous call is at least
 * `60000 / ratePerMinute` ms old. Callers are served one at a time.
 */
export class RateLedger {
  private calls: number[] = [];
  private tail: Promise<unknown> = Promise.resolve();
  readonly spacingMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: RateLedgerOptions) {
    this.spacingMs = Math.ceil(WINDOW_MS / Math.max(1, opts.ratePerMinute));
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /** Milliseconds until the next slot opens, 0 when one is free now. */
  waitFor(at = this.now()): number {
    this.calls = this.calls.filter(ts => at - ts < WINDOW_MS);
    let wait = 0;
    const last = this.calls[this.calls.length - 1];
    if (last !== undefined) wait = Math.max(wait, last + this.spacingMs - at);
    if (this.calls.length >= this.opts.ratePerMinute) {
      const oldest = this.calls[this.calls.length - this.opts.ratePerMinute];
      if (oldest !== undefined) wait = Math.max(wait, oldest + WINDOW_MS - at);
    }
    return Math.max(0, wait);
  }

  /** Resolves true once a slot is taken, false when it would take longer than maxWaitMs. */
  acquire(): Promise<boolean> {
    const run = this.tail.then(() => this.take());
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async take(): Promise<boolean> {
    const wait = this.waitFor();
    if (wait > this.opts.maxWaitMs) return false;
    if (wait > 0) await this.sleep(wait);
    this.calls.push(this.now());
    return true;
  }

  recent(): number {
    const at = this.now();
    return this.calls.filter(ts => at - ts < WINDOW_MS).length;
  }
}
