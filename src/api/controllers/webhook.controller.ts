import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { CallbackCodec } from '@services/messaging/callback.codec.js';

import { logger } from '@utils/logger.js';

import type { InboundUpdate } from '../../types/index.js';

import { TelegramUpdateSchema, toInboundUpdate, verifySecret } from './webhook.validator.js';

export interface WebhookDeps {
  enqueue: (update: InboundUpdate) => Promise<unknown>;
  codec: CallbackCodec;
  secret: string | undefined;
}

export function createWebhookHandler(deps: WebhookDeps): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!verifySecret(req, deps.secret)) {
        res.sendStatus(401);
        return;
      }

      const parsed = TelegramUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues.length }, '[webhook] malformed update ignored');
        res.sendStatus(200);
        return;
      }

      const update = toInboundUpdate(parsed.data, deps.codec);
      if (!update) {
        res.sendStatus(200);
        return;
      }

      try {
        await deps.enqueue(update);
      } catch (err) {
        logger.error({ updateId: update.updateId, err }, '[webhook] enqueue failed');
        // a non-2xx status makes Telegram redeliver the update
        res.sendStatus(503);
        return;
      }
      res.sendStatus(200);
    } catch (err) {
      next(err);
    }
  };
}
