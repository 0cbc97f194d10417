import { createClient } from 'redis';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

export const redis: RedisClient = createClient({
  url: config.REDIS_URL,
});

redis.on('error', (err: Error) => {
  logger.error({ err: err.message }, '[redis] error');
});

redis.on('connect', () => {
  logger.info('[redis] connected');
});

redis.on('end', () => {
  logger.info('[redis] connection closed');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

export async function pingRedis(): Promise<string> {
  await connectRedis();
  return redis.ping();
}
