import type { Server } from 'node:http';

import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';

import { config } from '@config/env.config.js';

import { StoreUnavailableError } from '@core/errors/store-unavailable.error.js';

import { loadCatalog, migrate, seedCatalog } from '@infra/database/bootstrap.js';
import { PgLibraryStore } from '@infra/database/pg-library.store.js';
import { closePool } from '@infra/database/pg.pool.js';
import { connectRedis, disconnectRedis, pingRedis } from '@infra/redis/redis.client.js';
import { telegramApi } from '@infra/telegram/telegram.client.js';

import { buildServices } from '@services/index.js';
import { MemorySessionStore, RedisSessionStore } from '@services/conversation/session.store.js';
import { CallbackCodec } from '@services/messaging/callback.codec.js';
import { TelegramNotifier } from '@services/messaging/telegram.notifier.js';
import { MessageProcessor } from '@services/queue/message.processor.js';
import { enqueue, startQueue, stopQueue } from '@services/queue/queue.manager.js';
import { startReminderWorker } from '@services/reminders/reminder.worker.js';

import { logger } from '@utils/logger.js';
import { withRetry } from '@utils/retry.js';

import { apiRouter, type ApiDeps } from './api/index.js';
import { errorMiddleware } from './middleware/index.js';

function createApp(deps: ApiDeps): Express {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use('/', apiRouter(deps));
  app.use(errorMiddleware);
  return app;
}

async function connectStore(store: PgLibraryStore): Promise<void> {
  await withRetry(() => store.ping(), {
    retries: Math.max(config.DB_CONNECT_ATTEMPTS - 1, 0),
    base: config.DB_CONNECT_BACKOFF_MS,
    max: config.DB_CONNECT_BACKOFF_MS * 16,
    shouldRetry: (err) => err instanceof StoreUnavailableError,
    onRetry: (err, attempt, delayMs) => {
      logger.warn(
        { attempt, of: config.DB_CONNECT_ATTEMPTS, delayMs, err: String(err) },
        '[db] not reachable yet',
      );
    },
  });
}

async function bootstrap() {
  const store = new PgLibraryStore();
  await connectStore(store);
  await migrate();
  await seedCatalog(store, await loadCatalog());

  await connectRedis();

  const sessions =
    config.SESSION_STORE === 'memory' ? new MemorySessionStore() : new RedisSessionStore();
  const codec = new CallbackCodec(config.LOCATIONS);
  const notifier = new TelegramNotifier({ codec });
  const services = buildServices({ store, sessions, notifier, settings: config });

  startQueue(new MessageProcessor(services.conversation, notifier, telegramApi));
  const stopReminders = startReminderWorker(services.reminders, config.REMINDER_INTERVAL_MS);

  const app = createApp({
    webhook: { enqueue, codec, secret: config.TELEGRAM_WEBHOOK_SECRET },
    dev: { conversation: services.conversation, reminders: services.reminders, codec },
    health: { checks: { db: () => store.ping(), redis: () => pingRedis() } },
    devRoutesEnabled: config.NODE_ENV !== 'production',
  });

  const server: Server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT }, 'library desk up');
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    stopReminders();
    server.close();
    try {
      await stopQueue();
      await disconnectRedis();
      await closePool();
    } catch (err) {
      logger.error({ err }, 'shutdown incomplete');
    } finally {
      process.exit(0);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'fatal bootstrap error');
  process.exit(1);
});
