import { pino, type Logger } from 'pino';

import { config } from '@config/env.config.js';

export const logger: Logger = pino({
  level: config.LOG_LEVEL,
  base: { service: 'library-desk' },
  redact: {
    paths: ['req.headers["x-telegram-bot-api-secret-token"]', 'token'],
    remove: true,
  },
});
