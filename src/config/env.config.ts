import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toList = (fallback: string[]) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    return String(v)
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }, z.array(z.string()).min(1));

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: toNumber(10),
  DB_CONNECT_ATTEMPTS: toNumber(10),
  DB_CONNECT_BACKOFF_MS: toNumber(1000),

  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
  SESSION_TTL: toNumber(1800),
  SESSION_STORE: z.enum(['redis', 'memory']).default('redis'),

  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),
  TELEGRAM_GROUP_CHAT_ID: z.string().optional(),
  TELEGRAM_API_URL: z.string().default('https://api.telegram.org'),
  NOTIFY_TIMEOUT_MS: toNumber(10000),

  TIMEZONE: z.string().default('Europe/Moscow'),
  LOCATIONS: toList(['Stone Towers', 'Manhatten', 'Известия']),

  REMINDER_INTERVAL_MS: toNumber(5 * 60 * 1000),
  REMINDER_OVERDUE_COOLDOWN_MINUTES: toNumber(120),
  REMINDER_SCHEDULE: z.string().optional(),

  QUEUE_CONCURRENCY: toNumber(5),
  QUEUE_MAX_ATTEMPTS: toNumber(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
