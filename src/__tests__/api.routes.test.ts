import request from 'supertest';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import type { ApiDeps } from '@api/routes/index.js';

import { CallbackCodec } from '@services/messaging/callback.codec.js';

import { buildTestApp } from '@test/utils/buildTestApp.js';
import { createHarness, LOCATIONS, registerUser, type Harness } from '@test/utils/harness.js';

import type { InboundUpdate } from '../types/index.js';

const SECRET = 'test-secret';
const codec = new CallbackCodec(LOCATIONS);

describe('HTTP routes', () => {
  let h: Harness;
  let enqueue: Mock<(update: InboundUpdate) => Promise<unknown>>;
  let deps: ApiDeps;

  beforeEach(async () => {
    h = await createHarness();
    enqueue = vi.fn<(update: InboundUpdate) => Promise<unknown>>().mockResolvedValue(undefined);
    deps = {
      webhook: { enqueue, codec, secret: SECRET },
      dev: { conversation: h.conversation, reminders: h.reminders, codec },
      health: { checks: { store: async () => undefined } },
      devRoutesEnabled: true,
    };
  });

  describe('POST /v1/webhook/telegram', () => {
    const post = (body: object, secret: string | null = SECRET) => {
      const req = request(buildTestApp(deps)).post('/v1/webhook/telegram');
      return secret === null ? req.send(body) : req.set('X-Telegram-Bot-Api-Secret-Token', secret).send(body);
    };
    const privateMessage = (fields: object) => ({
      update_id: 100,
      message: { message_id: 1, from: { id: 5 }, chat: { id: 5, type: 'private' }, ...fields },
    });

    it('rejects a missing or wrong secret', async () => {
      await post(privateMessage({ text: 'привет' }), null).expect(401);
      await post(privateMessage({ text: 'привет' }), 'wrong').expect(401);
      expect(enqueue).not.toHaveBeenCalled();
    });

    it('queues text, trimmed', async () => {
      await post(privateMessage({ text: '  книга а ' })).expect(200);

      expect(enqueue).toHaveBeenCalledWith({ updateId: 100, userId: 5, event: { type: 'TEXT', text: 'книга а' } });
    });

    it('turns /start into a reset', async () => {
      await post(privateMessage({ text: '/start' })).expect(200);

      expect(enqueue).toHaveBeenCalledWith({ updateId: 100, userId: 5, event: { type: 'START' } });
    });

    it('keeps the largest photo size', async () => {
      await post(privateMessage({ photo: [{ file_id: 'small' }, { file_id: 'large' }] })).expect(200);

      expect(enqueue).toHaveBeenCalledWith({
        updateId: 100,
        userId: 5,
        event: { type: 'PHOTO', photoRef: 'large' },
      });
    });

    it('decodes button taps', async () => {
      await post({ update_id: 101, callback_query: { id: 'cb-9', from: { id: 5 }, data: 'dur:WEEK' } }).expect(200);

      expect(enqueue).toHaveBeenCalledWith({
        updateId: 101,
        userId: 5,
        event: { type: 'CHOICE', choice: { kind: 'DURATION', tier: 'WEEK' } },
        callbackQueryId: 'cb-9',
      });
    });

    it('acknowledges but drops what the bot does not handle', async () => {
      await post({ update_id: 102, callback_query: { id: 'cb-1', from: { id: 5 }, data: 'zz' } }).expect(200);
      await post({
        update_id: 103,
        message: { message_id: 2, from: { id: 5 }, chat: { id: -100, type: 'group' }, text: 'всем привет' },
      }).expect(200);
      await post({ hello: 'world' }).expect(200);

      expect(enqueue).not.toHaveBeenCalled();
    });

    it('asks for redelivery when the queue is down', async () => {
      enqueue.mockRejectedValueOnce(new Error('redis down'));

      await post(privateMessage({ text: 'привет' })).expect(503);
    });

    it('fails loudly when no secret is configured', async () => {
      deps.webhook.secret = undefined;

      const res = await post(privateMessage({ text: 'привет' })).expect(500);

      expect(res.body).toMatchObject({ message: 'Internal error', code: 'INTERNAL' });
    });
  });

  describe('POST /v1/dev/events', () => {
    it('runs the conversation and returns its replies', async () => {
      const res = await request(buildTestApp(deps))
        .post('/v1/dev/events')
        .send({ userId: 10, event: { type: 'START' } })
        .expect(200);

      expect(res.body).toEqual({ state: 'NEED_NAME', replies: [{ key: 'welcome' }, { key: 'ask_name' }] });
    });

    it('decodes choice tokens', async () => {
      await registerUser(h, 1, 'Анна', 'Петрова');
      const app = buildTestApp(deps);
      await request(app).post('/v1/dev/events').send({ userId: 1, event: { type: 'START' } });

      const res = await request(app)
        .post('/v1/dev/events')
        .send({ userId: 1, event: { type: 'CHOICE', data: 'act:book' } })
        .expect(200);

      expect(res.body).toEqual({ state: 'NEED_TITLE', replies: [{ key: 'ask_title' }] });
    });

    it('rejects an invalid body with the offending field', async () => {
      const res = await request(buildTestApp(deps))
        .post('/v1/dev/events')
        .send({ userId: 0, event: { type: 'START' } })
        .expect(422);

      expect(res.body).toMatchObject({ code: 'VALIDATION_ERROR', field: 'userId' });
    });

    it('rejects an unknown choice token', async () => {
      const res = await request(buildTestApp(deps))
        .post('/v1/dev/events')
        .send({ userId: 1, event: { type: 'CHOICE', data: 'zz' } })
        .expect(422);

      expect(res.body).toMatchObject({ code: 'VALIDATION_ERROR', field: 'event.data', message: 'Unknown choice zz' });
    });

    it('is not mounted when dev routes are off', async () => {
      deps.devRoutesEnabled = false;

      await request(buildTestApp(deps))
        .post('/v1/dev/events')
        .send({ userId: 1, event: { type: 'START' } })
        .expect(404);
    });
  });

  describe('POST /v1/dev/reminders/sweep', () => {
    it('runs a sweep at the given time', async () => {
      await registerUser(h, 1, 'Анна', 'Петрова');
      await h.reservations.createReservation(1, h.bookId('книга а'), 'HOUR');

      const res = await request(buildTestApp(deps))
        .post('/v1/dev/reminders/sweep')
        .send({ now: '2026-03-02T10:46:00+03:00' })
        .expect(200);

      expect(res.body).toEqual({ scanned: 1, sent: 1, skipped: 0, failed: 0 });
      expect(h.notifier.toUser(1).map((m) => m.key)).toEqual(['reminder_due_soon']);
    });

    it('rejects a time without an offset', async () => {
      const res = await request(buildTestApp(deps))
        .post('/v1/dev/reminders/sweep')
        .send({ now: 'yesterday' })
        .expect(422);

      expect(res.body).toMatchObject({ code: 'VALIDATION_ERROR', field: 'now' });
    });
  });

  describe('GET /v1/health', () => {
    it('reports every check', async () => {
      const res = await request(buildTestApp(deps)).get('/v1/health').expect(200);

      expect(res.body).toEqual({ status: 'ok', checks: { store: 'ok' } });
    });

    it('degrades when a check fails', async () => {
      deps.health.checks.redis = async () => {
        throw new Error('ECONNREFUSED');
      };

      const res = await request(buildTestApp(deps)).get('/v1/health').expect(503);

      expect(res.body).toEqual({ status: 'degraded', checks: { store: 'ok', redis: 'down' } });
    });
  });
});
