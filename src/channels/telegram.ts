import { Api } from 'grammy';
import { errMessage, logEvent } from '../observability/log.js';
import { maybeMask } from '../security/log_mask.js';
import type { DeliveryResult, NotificationChannel, OutboundMessage } from './types.js';

export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';
  private readonly sender: MessageSender;

  constructor(private readonly chatId: string, sender: MessageSender | string) {
    this.sender = typeof sender === 'string' ? new Api(sender) : sender;
  }

  async send(msg: OutboundMessage): Promise<DeliveryResult> {
    try {
      await this.sender.sendMessage(this.chatId, msg.text);
      return { ok: true };
    } catch (e) {
      const error = errMessage(e);
      logEvent('warn', 'telegram.send.failed', { chat: maybeMask(this.chatId), tier: msg.tier, assetId: msg.meta.assetId, error });
      return { ok: false, error };
    }
  }
}
