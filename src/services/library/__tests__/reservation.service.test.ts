import { beforeEach, describe, expect, it } from 'vitest';

import {
  ActiveReservationExistsError,
  BaseError,
  NoActiveReservationError,
  ReservationMismatchError,
  ResourceUnavailableError,
} from '@core/errors/index.js';
import type { DurationTier } from '@core/interfaces/library.types.js';

import { DURATION_TIERS } from '@services/library/durations.js';

import { createHarness, registerUser, T0, type Harness } from '@test/utils/harness.js';

function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

function pick<T>(rand: () => number, items: readonly T[]): T {
  const item = items[Math.floor(rand() * items.length)];
  if (item === undefined) throw new Error('empty pick');
  return item;
}

describe('ReservationService', () => {
  let h: Harness;
  let bookA: number;
  let bookB: number;

  beforeEach(async () => {
    h = await createHarness();
    bookA = h.bookId('книга а');
    bookB = h.bookId('книга в');
    await registerUser(h, 1, 'Анна', 'Петрова');
    await registerUser(h, 2, 'Иван', 'Сидоров');
  });

  describe('createReservation', () => {
    it('books the item and the user in one step', async () => {
      const reservation = await h.reservations.createReservation(1, bookA, 'HOUR');

      expect(reservation).toMatchObject({
        userId: 1,
        bookId: bookA,
        bookTitle: 'книга а',
        location: 'Stone Towers',
        duration: 'HOUR',
        status: 'active',
        completedAt: null,
      });
      expect(reservation.startAt.toISOString()).toBe(T0);
      expect(reservation.endAt.toISOString()).toBe('2026-03-02T08:00:00.000Z');
      expect((await h.store.findBookById(bookA))?.status).toBe('booked');
      expect(await h.store.findUser(1)).toMatchObject({
        status: 'booked',
        currentReservationId: reservation.id,
      });
    });

    it('rejects a book that is already out', async () => {
      await h.reservations.createReservation(1, bookA, 'DAY');

      await expect(h.reservations.createReservation(2, bookA, 'DAY')).rejects.toBeInstanceOf(
        ResourceUnavailableError,
      );
      expect(await h.store.findUser(2)).toMatchObject({ status: 'available', currentReservationId: null });
    });

    it('rejects a second reservation for the same user', async () => {
      await h.reservations.createReservation(1, bookA, 'DAY');

      await expect(h.reservations.createReservation(1, bookB, 'DAY')).rejects.toBeInstanceOf(
        ActiveReservationExistsError,
      );
      await expect(h.reservations.createReservation(1, bookB, 'DAY')).rejects.toMatchObject({ bookId: bookA });
      expect((await h.store.findBookById(bookB))?.status).toBe('available');
    });

    it('lets exactly one of two simultaneous claims win', async () => {
      const results = await Promise.allSettled([
        h.reservations.createReservation(1, bookA, 'WEEK'),
        h.reservations.createReservation(2, bookA, 'WEEK'),
      ]);

      const won = results.filter((r) => r.status === 'fulfilled');
      const lost = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(won).toHaveLength(1);
      expect(lost).toHaveLength(1);
      expect(lost[0]?.reason).toBeInstanceOf(ResourceUnavailableError);
      expect(h.store.allReservations().filter((r) => r.status === 'active')).toHaveLength(1);
    });

    it('drops the booker from the waitlist of that book', async () => {
      await h.reservations.createReservation(1, bookA, 'HOUR');
      await h.waitlist.enqueue(2, bookA);
      await h.reservations.completeReservation(1, bookA);

      await h.reservations.createReservation(2, bookA, 'HOUR');

      expect(await h.waitlist.list(bookA)).toEqual([]);
    });
  });

  describe('completeReservation', () => {
    it('fails when the user holds nothing', async () => {
      await expect(h.reservations.completeReservation(2, bookA)).rejects.toBeInstanceOf(
        NoActiveReservationError,
      );
    });

    it('refuses another book and changes nothing', async () => {
      const held = await h.reservations.createReservation(1, bookA, 'DAY');

      await expect(h.reservations.completeReservation(1, bookB)).rejects.toBeInstanceOf(
        ReservationMismatchError,
      );
      expect((await h.store.findBookById(bookA))?.status).toBe('booked');
      expect((await h.store.findBookById(bookB))?.status).toBe('available');
      expect(await h.reservations.getActiveReservation(1)).toMatchObject({ id: held.id, status: 'active' });
    });

    it('frees the book and the user', async () => {
      const held = await h.reservations.createReservation(1, bookA, 'HOUR');
      h.clock.advance(30);

      const done = await h.reservations.completeReservation(1, bookA);

      expect(done).toMatchObject({ id: held.id, status: 'completed' });
      expect(done.completedAt?.toISOString()).toBe('2026-03-02T07:30:00.000Z');
      expect((await h.store.findBookById(bookA))?.status).toBe('available');
      expect(await h.store.findUser(1)).toMatchObject({ status: 'available', currentReservationId: null });
      expect(await h.reservations.getActiveReservation(1)).toBeNull();
    });

    it('completes even when the waitlist notification cannot be delivered', async () => {
      await h.reservations.createReservation(1, bookA, 'HOUR');
      await h.waitlist.enqueue(2, bookA);
      h.notifier.failUser(2);

      await h.reservations.completeReservation(1, bookA);

      expect((await h.store.findBookById(bookA))?.status).toBe('available');
      expect(await h.waitlist.list(bookA)).toMatchObject([{ userId: 2, notified: false }]);
    });
  });

  it('keeps book status in step with active reservations under random load', async () => {
    await registerUser(h, 3, 'Олег', 'Смирнов');
    await registerUser(h, 4, 'Мария', 'Иванова');
    const rand = lcg(20260302);
    const users = [1, 2, 3, 4];
    const bookIds = h.books.map((b) => b.id);

    for (let round = 0; round < 60; round += 1) {
      const ops = Array.from({ length: 4 }, () => {
        const userId = pick(rand, users);
        const bookId = pick(rand, bookIds);
        const tier: DurationTier = pick(rand, DURATION_TIERS);
        return rand() < 0.6
          ? h.reservations.createReservation(userId, bookId, tier)
          : h.reservations.completeReservation(userId, bookId);
      });
      const results = await Promise.allSettled(ops);
      for (const r of results) {
        if (r.status === 'rejected') expect(r.reason).toBeInstanceOf(BaseError);
      }

      const active = h.store.allReservations().filter((r) => r.status === 'active');
      for (const book of h.store.allBooks()) {
        const holders = active.filter((r) => r.bookId === book.id);
        expect(holders.length).toBe(book.status === 'booked' ? 1 : 0);
      }
      for (const user of h.store.allUsers()) {
        const held = active.filter((r) => r.userId === user.id);
        expect(held.length).toBeLessThanOrEqual(1);
        expect(user.currentReservationId).toBe(held[0]?.id ?? null);
        expect(user.status).toBe(held.length === 1 ? 'booked' : 'available');
      }
    }
  });
});
