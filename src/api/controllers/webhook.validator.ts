import crypto from 'node:crypto';

import type { Request } from 'express';
import { z } from 'zod';

import type { CallbackCodec } from '@services/messaging/callback.codec.js';

import type { InboundUpdate } from '../../types/index.js';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

const UserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

const PhotoSizeSchema = z.object({
  file_id: z.string(),
  file_size: z.number().optional(),
});

const MessageSchema = z.object({
  message_id: z.number().int(),
  from: UserSchema.optional(),
  chat: z.object({ id: z.number().int(), type: z.string().optional() }),
  text: z.string().optional(),
  photo: z.array(PhotoSizeSchema).optional(),
});

const CallbackQuerySchema = z.object({
  id: z.string(),
  from: UserSchema,
  data: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: MessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export function verifySecret(req: Request, secret: string | undefined): boolean {
  if (!secret) {
    throw new Error('TELEGRAM_WEBHOOK_SECRET is not configured');
  }
  const provided = req.headers[SECRET_HEADER];
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(secret);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Maps a Bot API update onto a conversation event. Null for updates the bot
 * ignores: group chatter, stickers, unknown button payloads.
 */
export function toInboundUpdate(update: TelegramUpdate, codec: CallbackCodec): InboundUpdate | null {
  const query = update.callback_query;
  if (query) {
    const choice = query.data ? codec.decode(query.data) : null;
    if (!choice) return null;
    return {
      updateId: update.update_id,
      userId: query.from.id,
      event: { type: 'CHOICE', choice },
      callbackQueryId: query.id,
    };
  }

  const msg = update.message;
  if (!msg || (msg.chat.type !== undefined && msg.chat.type !== 'private')) return null;
  const userId = msg.from?.id ?? msg.chat.id;

  if (msg.photo && msg.photo.length > 0) {
    // sizes come smallest first
    const largest = msg.photo[msg.photo.length - 1];
    if (!largest) return null;
    return { updateId: update.update_id, userId, event: { type: 'PHOTO', photoRef: largest.file_id } };
  }
  if (msg.text !== undefined) {
    const text = msg.text.trim();
    if (/^\/start(@\w+)?(\s|$)/.test(text)) {
      return { updateId: update.update_id, userId, event: { type: 'START' } };
    }
    return { updateId: update.update_id, userId, event: { type: 'TEXT', text } };
  }
  return null;
}
