import type { Tier } from '../schemas.js';

export type OutboundMessage = {
  tier: Tier;
  text: string;
  meta: { assetId: string; kind: 'alert' | 'recovery' };
};

export type DeliveryResult = { ok: true } | { ok: false; error: string };

/** Resolves a result for every message; delivery problems never reject. */
export interface NotificationChannel {
  readonly name: string;
  send(msg: OutboundMessage): Promise<DeliveryResult>;
}
