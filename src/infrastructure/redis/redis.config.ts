import { config } from '@config/env.config.js';

export const redisConfig = {
  sessionTtlSeconds: config.SESSION_TTL,
  dedupTtlSeconds: 60 * 60 * 24,
  prefixes: {
    session: 'session',
    processed: 'proc',
  },
} as const;
