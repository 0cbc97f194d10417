import type { WaitlistEntry } from '@core/interfaces/library.types.js';
import type { LibraryStore } from '@core/repositories/library.repo.js';

import { message, type Notifier } from '@services/messaging/message.types.js';

import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

/**
 * FIFO queue of users waiting for a specific book (title at one location).
 */
export class WaitlistService {
  constructor(
    private readonly store: LibraryStore,
    private readonly notifier: Notifier,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Returns false when the user is already waiting and has not been notified yet.
   * An entry that was already notified is queued again at the back.
   */
  async enqueue(userId: number, bookId: number): Promise<boolean> {
    const queued = await this.store.transaction(async (repo) => {
      const existing = await repo.findWaitlistEntry(userId, bookId);
      if (existing && !existing.notified) return false;
      await repo.putWaitlistEntry(userId, bookId, this.clock.now());
      return true;
    });
    if (queued) logger.info({ userId, bookId }, '[waitlist] enqueued');
    return queued;
  }

  async peekOldestUnnotified(bookId: number): Promise<number | null> {
    const head = await this.store.findOldestUnnotified(bookId);
    return head ? head.userId : null;
  }

  async markNotified(userId: number, bookId: number): Promise<boolean> {
    return this.store.transaction((repo) =>
      repo.markWaitlistNotified(userId, bookId, this.clock.now()),
    );
  }

  async remove(userId: number, bookId: number): Promise<boolean> {
    const removed = await this.store.transaction((repo) => repo.deleteWaitlistEntry(userId, bookId));
    if (removed) logger.info({ userId, bookId }, '[waitlist] removed');
    return removed;
  }

  async list(bookId: number): Promise<WaitlistEntry[]> {
    return this.store.listWaitlist(bookId);
  }

  /**
   * Tells the head of the queue that the book is free. The head is flagged inside
   * a transaction before delivery and un-flagged when delivery fails, so two
   * overlapping releases never notify the same user and a failed delivery leaves
   * the entry eligible for the next release. Returns the notified user, if any.
   */
  async notifyNext(bookId: number): Promise<number | null> {
    const claimed = await this.store.transaction(async (repo) => {
      const book = await repo.findBookById(bookId);
      if (!book || book.status !== 'available') return null;
      const head = await repo.findOldestUnnotified(bookId);
      if (!head) return null;
      // false when a concurrent release flagged the same head first
      if (!(await repo.markWaitlistNotified(head.userId, bookId, this.clock.now()))) return null;
      return { userId: head.userId, book };
    });
    if (!claimed) return null;

    const { userId, book } = claimed;
    try {
      await this.notifier.sendToUser(
        userId,
        message('waitlist_available', { title: book.title, location: book.location }, [
          { kind: 'CLAIM', bookId },
          { kind: 'LEAVE_WAITLIST', bookId },
        ]),
      );
    } catch (err) {
      logger.warn({ userId, bookId, err }, '[waitlist] notification failed, entry stays queued');
      await this.store.transaction((repo) => repo.clearWaitlistNotified(userId, bookId));
      return null;
    }

    logger.info({ userId, bookId }, '[waitlist] head notified');
    return userId;
  }
}
