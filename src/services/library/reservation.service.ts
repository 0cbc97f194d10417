import { ActiveReservationExistsError } from '@core/errors/active-reservation-exists.error.js';
import { NoActiveReservationError } from '@core/errors/no-active-reservation.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { ReservationMismatchError } from '@core/errors/reservation-mismatch.error.js';
import { ResourceUnavailableError } from '@core/errors/resource-unavailable.error.js';
import type {
  DurationTier,
  RegisterUserDTO,
  Reservation,
  User,
} from '@core/interfaces/library.types.js';
import type { LibraryStore } from '@core/repositories/library.repo.js';

import type { WaitlistService } from '@services/waitlist/waitlist.service.js';

import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import { computeEnd } from './durations.js';

/**
 * Ledger of who holds which book. Every state change runs in one store
 * transaction that locks the user row first and the book row second.
 */
export class ReservationService {
  constructor(
    private readonly store: LibraryStore,
    private readonly waitlist: WaitlistService,
    private readonly clock: Clock = systemClock,
  ) {}

  async registerUser(dto: RegisterUserDTO): Promise<User> {
    const user = await this.store.transaction((repo) => repo.upsertUser(dto));
    logger.info({ userId: user.id }, '[ledger] user registered');
    return user;
  }

  async assignLocation(userId: number, location: string): Promise<void> {
    await this.store.transaction(async (repo) => {
      const user = await repo.findUserForUpdate(userId);
      if (!user) throw new NotFoundError('User is not registered');
      await repo.setUserLocation(userId, location);
    });
  }

  async getUser(userId: number): Promise<User | null> {
    return this.store.findUser(userId);
  }

  async getActiveReservation(userId: number): Promise<Reservation | null> {
    return this.store.findActiveReservationByUser(userId);
  }

  /** Resolves to the user's active reservation when it is on `bookId`. */
  async assertHolds(userId: number, bookId: number): Promise<Reservation> {
    const active = await this.store.findActiveReservationByUser(userId);
    if (!active) throw new NoActiveReservationError(userId);
    if (active.bookId !== bookId) throw new ReservationMismatchError(userId, bookId, active.bookId);
    return active;
  }

  async createReservation(userId: number, bookId: number, tier: DurationTier): Promise<Reservation> {
    const startAt = this.clock.now();
    const endAt = computeEnd(startAt, tier);

    const reservation = await this.store.transaction(async (repo) => {
      const user = await repo.findUserForUpdate(userId);
      if (!user) throw new NotFoundError('User is not registered');

      const held = await repo.findActiveReservationByUser(userId);
      if (held) throw new ActiveReservationExistsError(userId, held.id, held.bookId);

      const book = await repo.findBookForUpdate(bookId);
      if (!book) throw new NotFoundError('Book not found');
      if (book.status !== 'available') throw new ResourceUnavailableError(bookId);

      const created = await repo.insertReservation({
        userId,
        bookId,
        startAt,
        duration: tier,
        endAt,
      });
      await repo.setBookStatus(bookId, 'booked');
      await repo.setUserBooking(userId, created.id);
      await repo.deleteWaitlistEntry(userId, bookId);
      return created;
    });

    logger.info(
      { userId, bookId, reservationId: reservation.id, duration: tier },
      '[ledger] reservation created',
    );
    return reservation;
  }

  /**
   * Closes the user's reservation on `bookId`, then offers the book to the
   * waitlist. Waitlist failures are logged and never undo the return.
   */
  async completeReservation(userId: number, bookId: number): Promise<Reservation> {
    const completedAt = this.clock.now();

    const completed = await this.store.transaction(async (repo) => {
      await repo.findUserForUpdate(userId);
      const active = await repo.findActiveReservationByUser(userId);
      if (!active) throw new NoActiveReservationError(userId);
      if (active.bookId !== bookId) {
        throw new ReservationMismatchError(userId, bookId, active.bookId);
      }

      await repo.findBookForUpdate(bookId);
      await repo.completeReservation(active.id, completedAt);
      await repo.setBookStatus(bookId, 'available');
      await repo.setUserBooking(userId, null);
      const closed: Reservation = { ...active, status: 'completed', completedAt };
      return closed;
    });

    logger.info({ userId, bookId, reservationId: completed.id }, '[ledger] reservation completed');

    try {
      await this.waitlist.notifyNext(bookId);
    } catch (err) {
      logger.error({ bookId, err }, '[ledger] waitlist notification after return failed');
    }
    return completed;
  }
}
