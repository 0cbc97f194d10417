import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

import type { ConversationService } from '@services/conversation/conversation.service.js';
import type { ConversationEvent } from '@services/conversation/state.types.js';
import type { CallbackCodec } from '@services/messaging/callback.codec.js';
import type { ReminderService } from '@services/reminders/reminder.service.js';

export interface DevRouteDeps {
  conversation: ConversationService;
  reminders: ReminderService;
  codec: CallbackCodec;
}

const EventBody = z.object({
  userId: z.number().int().positive(),
  event: z.discriminatedUnion('type', [
    z.object({ type: z.literal('TEXT'), text: z.string() }),
    z.object({ type: z.literal('PHOTO'), photoRef: z.string().min(1) }),
    z.object({ type: z.literal('START') }),
    z.object({ type: z.literal('CHOICE'), data: z.string().min(1) }),
  ]),
});

const SweepBody = z.object({
  now: z.string().datetime({ offset: true }).optional(),
});

function invalid(error: z.ZodError): ValidationError {
  const first = error.issues[0];
  return new ValidationError(first?.message ?? 'Invalid request', first?.path.join('.'));
}

/** Drives the engine without Telegram: events in, rendered-free replies out. */
export default function devRoutes(deps: DevRouteDeps): Router {
  const router = Router();

  router.post('/dev/events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = EventBody.safeParse(req.body);
      if (!parsed.success) throw invalid(parsed.error);

      const raw = parsed.data.event;
      let event: ConversationEvent;
      if (raw.type === 'CHOICE') {
        const choice = deps.codec.decode(raw.data);
        if (!choice) throw new ValidationError(`Unknown choice ${raw.data}`, 'event.data');
        event = { type: 'CHOICE', choice };
      } else {
        event = raw;
      }

      const result = await deps.conversation.handle(parsed.data.userId, event);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/dev/reminders/sweep', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = SweepBody.safeParse(req.body ?? {});
      if (!parsed.success) throw invalid(parsed.error);
      const now = parsed.data.now ? new Date(parsed.data.now) : undefined;
      const report = await deps.reminders.runReminderSweep(now);
      res.json(report);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
