import type { Job } from 'bullmq';

import { redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';

import type { InboundUpdate } from '../../types/index.js';
import type { ConversationService } from '../conversation/conversation.service.js';
import type { HandleResult } from '../conversation/state.types.js';
import { message, type Notifier, type OutboundMessage } from '../messaging/message.types.js';

export interface CallbackAcknowledger {
  answerCallbackQuery(callbackQueryId: string): Promise<void>;
}

export type ConversationHandler = Pick<ConversationService, 'handle'>;

export type UpdateJob = Pick<Job<InboundUpdate>, 'data' | 'attemptsMade' | 'opts'>;

export class MessageProcessor {
  constructor(
    private readonly conversation: ConversationHandler,
    private readonly notifier: Notifier,
    private readonly callbacks: CallbackAcknowledger,
  ) {}

  async processMessage(job: UpdateJob): Promise<void> {
    const { updateId, userId, event, callbackQueryId } = job.data;
    const dedupKey = `${redisConfig.prefixes.processed}:${updateId}`;
    const set = await redis.set(dedupKey, '1', { NX: true, EX: redisConfig.dedupTtlSeconds });
    if (set !== 'OK') {
      logger.debug({ updateId }, '[queue] duplicate update skipped');
      return;
    }

    if (callbackQueryId) await this.acknowledge(callbackQueryId);

    let result: HandleResult;
    try {
      result = await this.conversation.handle(userId, event);
    } catch (err) {
      if (job.attemptsMade + 1 < (job.opts.attempts ?? 1)) {
        await redis.del(dedupKey);
        throw err;
      }
      logger.error({ updateId, userId, err }, '[queue] update failed after retries');
      await this.reply(userId, [message('temporary_error')]);
      return;
    }

    const delivered = await this.reply(userId, result.replies);
    logger.debug({ updateId, userId, state: result.state, delivered }, '[queue] update handled');
  }

  /** Replies are not retried by re-running the event; a failed one is logged. */
  private async reply(userId: number, replies: OutboundMessage[]): Promise<number> {
    let delivered = 0;
    for (const reply of replies) {
      try {
        await this.notifier.sendToUser(userId, reply);
        delivered += 1;
      } catch (err) {
        logger.warn({ userId, key: reply.key, err }, '[queue] reply not delivered');
      }
    }
    return delivered;
  }

  private async acknowledge(callbackQueryId: string): Promise<void> {
    try {
      await this.callbacks.answerCallbackQuery(callbackQueryId);
    } catch (err) {
      logger.warn({ callbackQueryId, err }, '[queue] callback query not answered');
    }
  }
}
