import { logEvent } from '../observability/log.js';
import type { DeliveryResult, NotificationChannel, OutboundMessage } from './types.js';

const KEEP = 100;

// Dry run: used when no bot token is configured. Keeps the last messages for /status and tests.
export class LogChannel implements NotificationChannel {
  readonly name = 'log';
  readonly sent: OutboundMessage[] = [];

  async send(msg: OutboundMessage): Promise<DeliveryResult> {
    this.sent.push(msg);
    if (this.sent.length > KEEP) this.sent.shift();
    logEvent('info', 'alert.dry_run', { tier: msg.tier, assetId: msg.meta.assetId, kind: msg.meta.kind, preview: msg.text.slice(0, 120) });
    return { ok: true };
  }
}
