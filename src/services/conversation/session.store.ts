import { z } from 'zod';

import { redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import type { Session } from './state.types.js';

export interface SessionStore {
  get(userId: number): Promise<Session | null>;
  save(userId: number, session: Session): Promise<void>;
  clear(userId: number): Promise<void>;
}

const SessionSchema = z.object({
  machineVersion: z.literal(1),
  state: z.enum([
    'NEED_NAME',
    'NEED_LOCATION',
    'CHOOSING_ACTION',
    'NEED_TITLE',
    'NEED_CONFIRMATION',
    'NEED_WAITLIST_CHOICE',
    'NEED_RETRY_CHOICE',
    'NEED_DURATION',
    'NEED_RETURN_PHOTO',
    'BOOKING_ACKNOWLEDGED',
    'RETURN_ACKNOWLEDGED',
  ]),
  data: z.object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    location: z.string().optional(),
    bookId: z.number().int().optional(),
    bookTitle: z.string().optional(),
    duration: z.enum(['HOUR', 'DAY', 'WEEK', 'MONTH']).optional(),
  }),
  updatedAt: z.string(),
});

function safeParse(raw: string | null): Session | null {
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = SessionSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly ttlSeconds = redisConfig.sessionTtlSeconds,
    private readonly prefix: string = redisConfig.prefixes.session,
  ) {}

  private keyFor(userId: number): string {
    return `${this.prefix}:${userId}`;
  }

  async get(userId: number): Promise<Session | null> {
    const raw = await redis.get(this.keyFor(userId));
    const session = safeParse(raw);
    if (raw && !session) {
      logger.warn({ userId }, '[session] discarded unreadable session');
    }
    return session;
  }

  async save(userId: number, session: Session): Promise<void> {
    const payload = JSON.stringify(session);
    if (this.ttlSeconds > 0) {
      await redis.set(this.keyFor(userId), payload, { EX: this.ttlSeconds });
    } else {
      await redis.set(this.keyFor(userId), payload);
    }
  }

  async clear(userId: number): Promise<void> {
    await redis.del(this.keyFor(userId));
  }
}

/** Process-local sessions with the same TTL semantics. Expired entries are dropped on read and on save. */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, { session: Session; expiresAt: number }>();

  constructor(
    private readonly ttlSeconds = redisConfig.sessionTtlSeconds,
    private readonly clock: Clock = systemClock,
  ) {}

  async get(userId: number): Promise<Session | null> {
    const entry = this.sessions.get(userId);
    if (!entry) return null;
    if (this.ttlSeconds > 0 && this.clock.now().getTime() >= entry.expiresAt) {
      this.sessions.delete(userId);
      return null;
    }
    return structuredClone(entry.session);
  }

  get size(): number {
    return this.sessions.size;
  }

  async save(userId: number, session: Session): Promise<void> {
    this.prune();
    this.sessions.set(userId, {
      session: structuredClone(session),
      expiresAt: this.clock.now().getTime() + this.ttlSeconds * 1000,
    });
  }

  async clear(userId: number): Promise<void> {
    this.sessions.delete(userId);
  }

  private prune(): void {
    if (this.ttlSeconds <= 0) return;
    const now = this.clock.now().getTime();
    for (const [userId, entry] of this.sessions) {
      if (now >= entry.expiresAt) this.sessions.delete(userId);
    }
  }
}
