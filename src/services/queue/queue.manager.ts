import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

import type { InboundUpdate } from '../../types/index.js';

import type { MessageProcessor } from './message.processor.js';

export const UPDATES_QUEUE = 'updates';

let queue: Queue<InboundUpdate> | undefined;
let worker: Worker<InboundUpdate> | undefined;

export function connectionFromUrl(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.replace('/', '');
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(db ? { db: Number(db) } : {}),
    ...(parsed.protocol === 'rediss:' ? { tls: {} } : {}),
    maxRetriesPerRequest: null,
  };
}

export function startQueue(processor: MessageProcessor): void {
  if (queue && worker) return;
  const connection = connectionFromUrl(config.REDIS_URL);
  queue = new Queue<InboundUpdate>(UPDATES_QUEUE, { connection });
  worker = new Worker<InboundUpdate>(
    UPDATES_QUEUE,
    async (job: Job<InboundUpdate>) => {
      await processor.processMessage(job);
    },
    {
      connection,
      concurrency: config.QUEUE_CONCURRENCY,
    },
  );
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err: err.message }, '[queue] job failed');
  });
}

export function enqueue(update: InboundUpdate) {
  if (!queue) throw new Error('Queue not started');
  return queue.add('update', update, {
    // numeric custom ids are rejected by BullMQ
    jobId: `upd-${update.updateId}`,
    removeOnComplete: true,
    removeOnFail: 50,
    attempts: config.QUEUE_MAX_ATTEMPTS,
    backoff: { type: 'fixed', delay: 2000 },
  });
}

export async function stopQueue(): Promise<void> {
  await worker?.close();
  await queue?.close();
  worker = undefined;
  queue = undefined;
}
