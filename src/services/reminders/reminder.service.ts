import type { ActiveReservationView, ReminderMark, ReminderMarkKey } from '@core/interfaces/library.types.js';
import type { LibraryStore } from '@core/repositories/library.repo.js';

import { message, type Notifier, type OutboundMessage } from '@services/messaging/message.types.js';

import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import {
  checkpointsInWindow,
  shouldFire,
  type DueCheckpoint,
  type ReminderSchedule,
} from './reminder.schedule.js';

export interface SweepReport {
  scanned: number;
  sent: number;
  skipped: number;
  failed: number;
}

interface Claim {
  previous: ReminderMark | null;
}

function reminderMessage(reservation: ActiveReservationView, due: DueCheckpoint): OutboundMessage {
  const choices = [{ kind: 'RETURN' as const, bookId: reservation.bookId }];
  switch (due.kind) {
    case 'before_end':
      return message(
        'reminder_due_soon',
        { title: reservation.bookTitle, minutesLeft: due.leadMinutes ?? 0, endsAt: reservation.endAt },
        choices,
      );
    case 'day_at_hour':
      return message(
        'reminder_checkpoint',
        { title: reservation.bookTitle, endsAt: reservation.endAt },
        choices,
      );
    case 'overdue':
      return message(
        'reminder_overdue',
        { title: reservation.bookTitle, endedAt: reservation.endAt },
        choices,
      );
  }
}

export class ReminderService {
  constructor(
    private readonly store: LibraryStore,
    private readonly notifier: Notifier,
    private readonly schedule: ReminderSchedule,
    private readonly clock: Clock = systemClock,
  ) {}

  async runReminderSweep(now: Date = this.clock.now()): Promise<SweepReport> {
    const report: SweepReport = { scanned: 0, sent: 0, skipped: 0, failed: 0 };
    const reservations = await this.store.listActiveReservations();

    for (const reservation of reservations) {
      report.scanned += 1;
      try {
        for (const due of checkpointsInWindow(reservation, now, this.schedule)) {
          await this.fire(reservation, due, now, report);
        }
      } catch (err) {
        report.failed += 1;
        logger.error(
          { reservationId: reservation.id, userId: reservation.userId, err },
          '[reminders] reservation skipped after error',
        );
      }
    }

    if (report.sent > 0 || report.failed > 0) {
      logger.info(report, '[reminders] sweep finished');
    }
    return report;
  }

  private async fire(
    reservation: ActiveReservationView,
    due: DueCheckpoint,
    now: Date,
    report: SweepReport,
  ): Promise<void> {
    const key: ReminderMarkKey = {
      userId: reservation.userId,
      bookId: reservation.bookId,
      checkpoint: due.checkpoint,
    };

    const claim = await this.claim(key, due, now);
    if (!claim) {
      report.skipped += 1;
      return;
    }

    try {
      await this.notifier.sendToUser(reservation.userId, reminderMessage(reservation, due));
    } catch (err) {
      report.failed += 1;
      logger.warn({ ...key, err }, '[reminders] delivery failed, mark released');
      await this.release(key, claim.previous);
      return;
    }

    report.sent += 1;
    logger.info(key, '[reminders] sent');
  }

  private claim(key: ReminderMarkKey, due: DueCheckpoint, now: Date): Promise<Claim | null> {
    return this.store.transaction(async (repo) => {
      const previous = await repo.findReminderMark(key);
      if (!shouldFire(due, previous, now, this.schedule)) return null;
      const won = await repo.claimReminderMark({ ...key, firedAt: now }, previous?.firedAt ?? null);
      return won ? { previous } : null;
    });
  }

  private async release(key: ReminderMarkKey, previous: ReminderMark | null): Promise<void> {
    await this.store.transaction(async (repo) => {
      if (previous) await repo.upsertReminderMark(previous);
      else await repo.deleteReminderMark(key);
    });
  }
}
