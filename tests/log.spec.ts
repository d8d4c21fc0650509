import { describe, it, expect, vi } from 'vitest';
import { logEvent } from '../src/observability/log.js';
import { mask, maskChatId, maskText } from '../src/security/log_mask.js';
import { withEnv } from './helpers/mockEnv.js';

describe('structured logging', () => {
  it('writes one JSON line per event with the bot token masked', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'debug' }, () => logEvent('info', 'alert.sent', { token: '123456:test-secret-test-secret-xx' }));
    expect(out).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: 'info', at: 'alert.sent', token: '1234…t-xx' });
  });

  it('drops events below LOG_LEVEL and routes errors to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'warn' }, () => {
      logEvent('info', 'tick.done');
      logEvent('error', 'tick.failed', { error: 'boom' });
    });
    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
  });
});

describe('masking', () => {
  it('shortens identifiers', () => {
    expect(mask('abcdefghij', 2)).toBe('ab…ij');
    expect(mask('short', 4)).toBe('short');
    expect(maskChatId('-1001234567')).toBe('-10…567');
    expect(maskChatId('@peg_feed')).toBe('@peg_feed');
    expect(maskText('no secrets here')).toBe('no secrets here');
  });
});
