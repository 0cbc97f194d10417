import { describe, expect, it } from 'vitest';

import type { DurationTier, ReminderMark, Reservation } from '@core/interfaces/library.types.js';

import { computeEnd } from '@services/library/durations.js';
import {
  checkpointsInWindow,
  DEFAULT_CHECKPOINTS,
  readReminderSchedule,
  shouldFire,
  type DueCheckpoint,
} from '@services/reminders/reminder.schedule.js';

const schedule = readReminderSchedule({
  REMINDER_OVERDUE_COOLDOWN_MINUTES: 120,
  TIMEZONE: 'Europe/Moscow',
});

function reservation(duration: DurationTier, startIso = '2026-03-02T07:00:00.000Z'): Reservation {
  const startAt = new Date(startIso);
  return {
    id: 1,
    userId: 7,
    bookId: 3,
    bookTitle: 'книга а',
    location: 'Stone Towers',
    startAt,
    duration,
    endAt: computeEnd(startAt, duration),
    status: 'active',
    completedAt: null,
  };
}

const at = (iso: string) => new Date(iso);

describe('readReminderSchedule', () => {
  it('uses the built-in table without an override', () => {
    expect(schedule.tiers).toEqual(DEFAULT_CHECKPOINTS);
    expect(schedule.overdueCooldownMinutes).toBe(120);
  });

  it('replaces only the tiers the override names', () => {
    const custom = readReminderSchedule({
      REMINDER_SCHEDULE: JSON.stringify({
        HOUR: [
          { id: 'hour-30m', kind: 'before_end', leadMinutes: 30 },
          { id: 'hour-5m', kind: 'before_end', leadMinutes: 5 },
        ],
      }),
      REMINDER_OVERDUE_COOLDOWN_MINUTES: 60,
      TIMEZONE: 'Europe/Moscow',
    });

    expect(custom.tiers.HOUR.map((r) => r.id)).toEqual(['hour-30m', 'hour-5m']);
    expect(custom.tiers.DAY).toEqual(DEFAULT_CHECKPOINTS.DAY);
  });

  it('rejects malformed JSON', () => {
    expect(() =>
      readReminderSchedule({ REMINDER_SCHEDULE: '{', REMINDER_OVERDUE_COOLDOWN_MINUTES: 120, TIMEZONE: 'UTC' }),
    ).toThrow('REMINDER_SCHEDULE is not valid JSON');
  });

  it('rejects a rule that fails validation', () => {
    const bad = JSON.stringify({ HOUR: [{ id: 'x', kind: 'before_end', leadMinutes: 0 }] });
    expect(() =>
      readReminderSchedule({ REMINDER_SCHEDULE: bad, REMINDER_OVERDUE_COOLDOWN_MINUTES: 120, TIMEZONE: 'UTC' }),
    ).toThrow(/^Invalid REMINDER_SCHEDULE: HOUR\.0\.leadMinutes/);
  });
});

describe('checkpointsInWindow', () => {
  it('opens the hour checkpoint fifteen minutes before the end', () => {
    const hour = reservation('HOUR');

    expect(checkpointsInWindow(hour, at('2026-03-02T07:44:59.000Z'), schedule)).toEqual([]);
    expect(checkpointsInWindow(hour, at('2026-03-02T07:46:00.000Z'), schedule)).toEqual([
      {
        checkpoint: 'hour-15m',
        kind: 'before_end',
        windowStart: at('2026-03-02T07:45:00.000Z'),
        leadMinutes: 15,
      },
    ]);
  });

  it('switches to overdue at the end', () => {
    expect(checkpointsInWindow(reservation('HOUR'), at('2026-03-02T08:00:00.000Z'), schedule)).toEqual([
      { checkpoint: 'overdue', kind: 'overdue', windowStart: at('2026-03-02T08:00:00.000Z') },
    ]);
  });

  it.each([
    ['DAY', 'day-1-09', '2026-03-03T06:00:00.000Z'],
    ['WEEK', 'week-5-09', '2026-03-07T06:00:00.000Z'],
    ['MONTH', 'month-21-09', '2026-03-23T06:00:00.000Z'],
  ] as const)('places the %s checkpoint at 09:00 local time', (tier, id, windowStart) => {
    const r = reservation(tier);
    const start = at(windowStart);

    expect(checkpointsInWindow(r, new Date(start.getTime() - 1), schedule)).toEqual([]);
    expect(checkpointsInWindow(r, new Date(start.getTime() + 30 * 60_000), schedule)).toEqual([
      { checkpoint: id, kind: 'day_at_hour', windowStart: start },
    ]);
    const afterWindow = checkpointsInWindow(r, new Date(start.getTime() + 60 * 60_000), schedule);
    expect(afterWindow.filter((d) => d.kind === 'day_at_hour')).toEqual([]);
  });

  it('skips a calendar checkpoint that would open after the end', () => {
    // 05:00 local start: a day later the 09:00 slot is already past the end
    const early = reservation('DAY', '2026-03-02T02:00:00.000Z');

    expect(checkpointsInWindow(early, at('2026-03-03T06:30:00.000Z'), schedule)).toEqual([
      { checkpoint: 'overdue', kind: 'overdue', windowStart: at('2026-03-03T02:00:00.000Z') },
    ]);
  });
});

describe('shouldFire', () => {
  const mark = (firedAt: string): ReminderMark => ({ userId: 7, bookId: 3, checkpoint: 'x', firedAt: at(firedAt) });
  const dueSoon: DueCheckpoint = {
    checkpoint: 'hour-15m',
    kind: 'before_end',
    windowStart: at('2026-03-02T07:45:00.000Z'),
    leadMinutes: 15,
  };
  const overdue: DueCheckpoint = {
    checkpoint: 'overdue',
    kind: 'overdue',
    windowStart: at('2026-03-02T08:00:00.000Z'),
  };

  it('fires a one-shot checkpoint once per window', () => {
    const now = at('2026-03-02T07:50:00.000Z');
    expect(shouldFire(dueSoon, null, now, schedule)).toBe(true);
    expect(shouldFire(dueSoon, mark('2026-03-02T07:46:00.000Z'), now, schedule)).toBe(false);
    expect(shouldFire(dueSoon, mark('2026-03-01T07:46:00.000Z'), now, schedule)).toBe(true);
  });

  it('repeats the overdue checkpoint after the cooldown', () => {
    const last = mark('2026-03-02T08:00:00.000Z');
    expect(shouldFire(overdue, last, at('2026-03-02T09:59:00.000Z'), schedule)).toBe(false);
    expect(shouldFire(overdue, last, at('2026-03-02T10:00:00.000Z'), schedule)).toBe(true);
  });
});
