import { config } from '@config/env.config.js';

import { DeliveryFailureError, type DeliveryTarget } from '@core/errors/delivery-failure.error.js';

import {
  telegramApi,
  type InlineKeyboard,
  type TelegramApi,
} from '@infra/telegram/telegram.client.js';

import { logger } from '@utils/logger.js';
import { withRetry } from '@utils/retry.js';

import { CallbackCodec } from './callback.codec.js';
import type { Notifier, OutboundMessage } from './message.types.js';
import { MessageRenderer } from './templates.js';

export interface TelegramNotifierOptions {
  api?: TelegramApi;
  renderer?: MessageRenderer;
  codec?: CallbackCodec;
  groupChatId?: string;
  retries?: number;
}

/** Renders outbound messages and delivers them through the Bot API. */
export class TelegramNotifier implements Notifier {
  private readonly api: TelegramApi;
  private readonly renderer: MessageRenderer;
  private readonly codec: CallbackCodec;
  private readonly groupChatId?: string;
  private readonly retries: number;

  constructor(options: TelegramNotifierOptions = {}) {
    this.api = options.api ?? telegramApi;
    this.renderer = options.renderer ?? new MessageRenderer();
    this.codec = options.codec ?? new CallbackCodec(config.LOCATIONS);
    this.groupChatId = options.groupChatId ?? config.TELEGRAM_GROUP_CHAT_ID;
    this.retries = options.retries ?? 1;
  }

  /** One button per row, in the order the choices were offered. */
  keyboard(msg: OutboundMessage): InlineKeyboard | undefined {
    if (!msg.choices || msg.choices.length === 0) return undefined;
    return {
      inline_keyboard: msg.choices.map((choice) => [
        { text: this.renderer.label(choice), callback_data: this.codec.encode(choice) },
      ]),
    };
  }

  async sendToUser(userId: number, msg: OutboundMessage): Promise<void> {
    const text = this.renderer.text(msg);
    await this.deliver({ kind: 'user', userId }, msg, () =>
      this.api.sendMessage(userId, text, this.keyboard(msg)),
    );
  }

  async sendToGroup(msg: OutboundMessage): Promise<void> {
    const chatId = this.requireGroup();
    const text = this.renderer.text(msg);
    await this.deliver({ kind: 'group' }, msg, () => this.api.sendMessage(chatId, text));
  }

  async sendPhotoToGroup(photoRef: string, msg: OutboundMessage): Promise<void> {
    const chatId = this.requireGroup();
    const caption = this.renderer.text(msg);
    await this.deliver({ kind: 'group' }, msg, () => this.api.sendPhoto(chatId, photoRef, caption));
  }

  private requireGroup(): string {
    if (!this.groupChatId) {
      throw new DeliveryFailureError({ kind: 'group' }, 'TELEGRAM_GROUP_CHAT_ID is not configured');
    }
    return this.groupChatId;
  }

  private async deliver(
    target: DeliveryTarget,
    msg: OutboundMessage,
    send: () => Promise<void>,
  ): Promise<void> {
    try {
      await withRetry(send, { retries: this.retries, base: 500, max: 2000 });
    } catch (err) {
      logger.warn({ target, key: msg.key, err }, '[telegram] delivery failed');
      throw new DeliveryFailureError(target, `Delivery of ${msg.key} failed`, { cause: err });
    }
  }
}
