import { logger } from '@utils/logger.js';

import type { ReminderService } from './reminder.service.js';

/**
 * Runs a sweep every `intervalMs`. A tick that lands while the previous sweep is
 * still running is skipped. Returns a stop function.
 */
export function startReminderWorker(
  service: Pick<ReminderService, 'runReminderSweep'>,
  intervalMs: number,
): () => void {
  let running = false;

  const tick = () => {
    if (running) {
      logger.warn('[reminders] previous sweep still running, tick skipped');
      return;
    }
    running = true;
    void service
      .runReminderSweep()
      .catch((err: unknown) => {
        logger.error({ err }, '[reminders] sweep failed');
      })
      .finally(() => {
        running = false;
      });
  };

  const timer = setInterval(tick, intervalMs);
  if (typeof timer.unref === 'function') {
    timer.unref();
  }
  return () => clearInterval(timer);
}
