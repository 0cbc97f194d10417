import { DateTime } from 'luxon';
import { z } from 'zod';

import type { DurationTier, Reservation, ReminderMark } from '@core/interfaces/library.types.js';

export const OVERDUE_CHECKPOINT = 'overdue';

const BeforeEndRule = z.object({
  id: z.string().min(1),
  kind: z.literal('before_end'),
  leadMinutes: z.number().int().positive(),
});

const DayAtHourRule = z.object({
  id: z.string().min(1),
  kind: z.literal('day_at_hour'),
  day: z.number().int().nonnegative(),
  hour: z.number().int().min(0).max(23),
});

const CheckpointRuleSchema = z.discriminatedUnion('kind', [BeforeEndRule, DayAtHourRule]);

const ScheduleOverrideSchema = z
  .object({
    HOUR: z.array(CheckpointRuleSchema),
    DAY: z.array(CheckpointRuleSchema),
    WEEK: z.array(CheckpointRuleSchema),
    MONTH: z.array(CheckpointRuleSchema),
  })
  .partial();

export type CheckpointRule = z.infer<typeof CheckpointRuleSchema>;

export interface ReminderSchedule {
  tiers: Record<DurationTier, CheckpointRule[]>;
  overdueCooldownMinutes: number;
  timezone: string;
}

export const DEFAULT_CHECKPOINTS: Record<DurationTier, CheckpointRule[]> = {
  HOUR: [{ id: 'hour-15m', kind: 'before_end', leadMinutes: 15 }],
  DAY: [{ id: 'day-1-09', kind: 'day_at_hour', day: 1, hour: 9 }],
  WEEK: [{ id: 'week-5-09', kind: 'day_at_hour', day: 5, hour: 9 }],
  MONTH: [{ id: 'month-21-09', kind: 'day_at_hour', day: 21, hour: 9 }],
};

export interface ScheduleSettings {
  REMINDER_SCHEDULE?: string;
  REMINDER_OVERDUE_COOLDOWN_MINUTES: number;
  TIMEZONE: string;
}

/**
 * Builds the checkpoint table from settings. `REMINDER_SCHEDULE` is a JSON object
 * keyed by tier; tiers it names replace the defaults wholesale.
 */
export function readReminderSchedule(settings: ScheduleSettings): ReminderSchedule {
  let override: z.infer<typeof ScheduleOverrideSchema> = {};
  if (settings.REMINDER_SCHEDULE) {
    let raw: unknown;
    try {
      raw = JSON.parse(settings.REMINDER_SCHEDULE);
    } catch (err) {
      throw new Error('REMINDER_SCHEDULE is not valid JSON', { cause: err });
    }
    const parsed = ScheduleOverrideSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid REMINDER_SCHEDULE: ${issues}`);
    }
    override = parsed.data;
  }
  return {
    tiers: { ...DEFAULT_CHECKPOINTS, ...override },
    overdueCooldownMinutes: settings.REMINDER_OVERDUE_COOLDOWN_MINUTES,
    timezone: settings.TIMEZONE,
  };
}

export type ReminderKind = CheckpointRule['kind'] | 'overdue';

export interface DueCheckpoint {
  checkpoint: string;
  kind: ReminderKind;
  windowStart: Date;
  /** Minutes before the end, for lead-time checkpoints. */
  leadMinutes?: number;
}

interface Window {
  start: DateTime;
  end: DateTime;
}

function windowOf(rule: CheckpointRule, reservation: Reservation, timezone: string): Window | null {
  const endAt = DateTime.fromJSDate(reservation.endAt);
  if (rule.kind === 'before_end') {
    return { start: endAt.minus({ minutes: rule.leadMinutes }), end: endAt };
  }
  const start = DateTime.fromJSDate(reservation.startAt)
    .setZone(timezone)
    .startOf('day')
    .plus({ days: rule.day })
    .set({ hour: rule.hour });
  // at or past the end the overdue reminder takes over
  if (start >= endAt) return null;
  return { start, end: start.plus({ hours: 1 }) };
}

/** Checkpoints whose window contains `now`, plus the overdue checkpoint once the end passed. */
export function checkpointsInWindow(
  reservation: Reservation,
  now: Date,
  schedule: ReminderSchedule,
): DueCheckpoint[] {
  const at = DateTime.fromJSDate(now);
  const due: DueCheckpoint[] = [];

  for (const rule of schedule.tiers[reservation.duration]) {
    const window = windowOf(rule, reservation, schedule.timezone);
    if (!window || at < window.start || at >= window.end) continue;
    due.push({
      checkpoint: rule.id,
      kind: rule.kind,
      windowStart: window.start.toJSDate(),
      ...(rule.kind === 'before_end' ? { leadMinutes: rule.leadMinutes } : {}),
    });
  }

  if (now.getTime() >= reservation.endAt.getTime()) {
    due.push({ checkpoint: OVERDUE_CHECKPOINT, kind: 'overdue', windowStart: reservation.endAt });
  }
  return due;
}

/**
 * A checkpoint fires when nothing fired in its current window. The overdue
 * checkpoint also fires again once the cooldown since its last firing elapsed.
 */
export function shouldFire(
  due: DueCheckpoint,
  mark: ReminderMark | null,
  now: Date,
  schedule: ReminderSchedule,
): boolean {
  if (!mark) return true;
  if (mark.firedAt.getTime() < due.windowStart.getTime()) return true;
  if (due.kind !== 'overdue') return false;
  const cooldownMs = schedule.overdueCooldownMinutes * 60_000;
  return now.getTime() - mark.firedAt.getTime() >= cooldownMs;
}
