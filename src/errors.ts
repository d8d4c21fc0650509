import type { FailureKind, FailureReason } from './schemas.js';

export class ProviderError extends Error {
  constructor(readonly kind: FailureKind, readonly reason: FailureReason, message: string, readonly status?: number) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function providerErrorFromStatus(status: number): ProviderError {
  if (status === 429) return new ProviderError('transient', 'http_429', 'HTTP 429', status);
  if (status >= 500) return new ProviderError('transient', 'http_5xx', `HTTP ${status}`, status);
  if (status === 401 || status === 403) return new ProviderError('persistent', 'auth', `HTTP ${status}`, status);
  return new ProviderError('persistent', 'bad_request', `HTTP ${status}`, status);
}

// Anything unclassified (DNS, reset sockets, aborted requests) is treated as transient
export function toProviderError(e: unknown): ProviderError {
  if (e instanceof ProviderError) return e;
  if (e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError' || /timeout|aborted/i.test(e.message))) {
    return new ProviderError('transient', 'timeout', e.message);
  }
  return new ProviderError('transient', 'network', e instanceof Error ? e.message : String(e));
}

export class CooldownStoreUnavailableError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'CooldownStoreUnavailableError';
  }
}

export class TickTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`tick exceeded ${timeoutMs}ms`);
    this.name = 'TickTimeoutError';
  }
}
