import type pg from 'pg';

import { StoreUnavailableError } from '@core/errors/store-unavailable.error.js';
import type {
  ActiveReservationView,
  Book,
  CatalogEntry,
  DurationTier,
  ItemStatus,
  NewReservationDTO,
  RegisterUserDTO,
  ReminderMark,
  ReminderMarkKey,
  Reservation,
  ReservationStatus,
  User,
  UserStatus,
  WaitlistEntry,
} from '@core/interfaces/library.types.js';
import type { LibraryRepository, LibraryStore } from '@core/repositories/library.repo.js';

import { pool, withTransaction, type RunQuery } from './pg.pool.js';

interface UserRow extends pg.QueryResultRow {
  user_id: number;
  first_name: string;
  last_name: string;
  location: string | null;
  current_reservation_id: number | null;
  status: UserStatus;
}

interface BookRow extends pg.QueryResultRow {
  id: number;
  title: string;
  author: string;
  location: string;
  shelf: string | null;
  floor: string | null;
  status: ItemStatus;
}

interface ReservationRow extends pg.QueryResultRow {
  id: number;
  user_id: number;
  book_id: number;
  title: string;
  location: string;
  start_at: Date;
  duration: DurationTier;
  end_at: Date;
  status: ReservationStatus;
  completed_at: Date | null;
}

interface ActiveReservationRow extends ReservationRow {
  first_name: string;
  last_name: string;
}

interface WaitlistRow extends pg.QueryResultRow {
  user_id: number;
  book_id: number;
  queued_at: Date;
  notified: boolean;
  notified_at: Date | null;
}

interface ReminderMarkRow extends pg.QueryResultRow {
  user_id: number;
  book_id: number;
  checkpoint: string;
  fired_at: Date;
}

const RESERVATION_COLUMNS = `
  r.id, r.user_id, r.book_id, b.title, b.location,
  r.start_at, r.duration, r.end_at, r.status, r.completed_at`;

// node-postgres error codes that mean the database cannot be reached right now
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01',
  '57P02',
  '57P03',
  '53300',
]);

export function isUnavailable(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && (UNAVAILABLE_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }
  return /Connection terminated|timeout exceeded when trying to connect/i.test(err.message);
}

function translate(err: unknown): unknown {
  if (err instanceof StoreUnavailableError) return err;
  if (isUnavailable(err)) {
    return new StoreUnavailableError('PostgreSQL is unreachable', { cause: err });
  }
  return err;
}

function toUser(row: UserRow): User {
  return {
    id: row.user_id,
    firstName: row.first_name,
    lastName: row.last_name,
    location: row.location,
    currentReservationId: row.current_reservation_id,
    status: row.status,
  };
}

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    location: row.location,
    shelf: row.shelf,
    floor: row.floor,
    status: row.status,
  };
}

function toReservation(row: ReservationRow): Reservation {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    bookTitle: row.title,
    location: row.location,
    startAt: row.start_at,
    duration: row.duration,
    endAt: row.end_at,
    status: row.status,
    completedAt: row.completed_at,
  };
}

function toWaitlistEntry(row: WaitlistRow): WaitlistEntry {
  return {
    userId: row.user_id,
    bookId: row.book_id,
    queuedAt: row.queued_at,
    notified: row.notified,
    notifiedAt: row.notified_at,
  };
}

export class PgLibraryRepository implements LibraryRepository {
  constructor(private readonly run: RunQuery) {}

  async findUser(userId: number): Promise<User | null> {
    const { rows } = await this.run<UserRow>('SELECT * FROM users WHERE user_id = $1', [userId]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async findUserForUpdate(userId: number): Promise<User | null> {
    const { rows } = await this.run<UserRow>(
      'SELECT * FROM users WHERE user_id = $1 FOR UPDATE',
      [userId],
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async upsertUser(dto: RegisterUserDTO): Promise<User> {
    const { rows } = await this.run<UserRow>(
      `INSERT INTO users (user_id, first_name, last_name, status)
       VALUES ($1, $2, $3, 'available')
       ON CONFLICT (user_id) DO UPDATE SET first_name = $2, last_name = $3
       RETURNING *`,
      [dto.id, dto.firstName, dto.lastName],
    );
    return toUser(rows[0]);
  }

  async setUserLocation(userId: number, location: string): Promise<void> {
    await this.run('UPDATE users SET location = $1 WHERE user_id = $2', [location, userId]);
  }

  async setUserBooking(userId: number, reservationId: number | null): Promise<void> {
    await this.run(
      'UPDATE users SET current_reservation_id = $1, status = $2 WHERE user_id = $3',
      [reservationId, reservationId === null ? 'available' : 'booked', userId],
    );
  }

  async findBook(title: string, location: string): Promise<Book | null> {
    const { rows } = await this.run<BookRow>(
      'SELECT * FROM books WHERE lower(title) = lower($1) AND location = $2',
      [title, location],
    );
    return rows[0] ? toBook(rows[0]) : null;
  }

  async findBookById(bookId: number): Promise<Book | null> {
    const { rows } = await this.run<BookRow>('SELECT * FROM books WHERE id = $1', [bookId]);
    return rows[0] ? toBook(rows[0]) : null;
  }

  async findBookForUpdate(bookId: number): Promise<Book | null> {
    const { rows } = await this.run<BookRow>('SELECT * FROM books WHERE id = $1 FOR UPDATE', [
      bookId,
    ]);
    return rows[0] ? toBook(rows[0]) : null;
  }

  async listBooks(location: string, status?: ItemStatus): Promise<Book[]> {
    const { rows } = status
      ? await this.run<BookRow>(
          'SELECT * FROM books WHERE location = $1 AND status = $2 ORDER BY id',
          [location, status],
        )
      : await this.run<BookRow>('SELECT * FROM books WHERE location = $1 ORDER BY id', [location]);
    return rows.map(toBook);
  }

  async setBookStatus(bookId: number, status: ItemStatus): Promise<void> {
    await this.run('UPDATE books SET status = $1 WHERE id = $2', [status, bookId]);
  }

  async countBooks(): Promise<number> {
    const { rows } = await this.run<{ count: number }>('SELECT count(*)::int AS count FROM books');
    return rows[0]?.count ?? 0;
  }

  async insertBook(entry: CatalogEntry): Promise<Book> {
    const { rows } = await this.run<BookRow>(
      `INSERT INTO books (title, author, location, shelf, floor)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [entry.title, entry.author, entry.location, entry.shelf ?? null, entry.floor ?? null],
    );
    return toBook(rows[0]);
  }

  async insertReservation(dto: NewReservationDTO): Promise<Reservation> {
    const { rows } = await this.run<ReservationRow>(
      `WITH r AS (
         INSERT INTO reservations (user_id, book_id, start_at, duration, end_at, status)
         VALUES ($1, $2, $3, $4, $5, 'active')
         RETURNING *
       )
       SELECT ${RESERVATION_COLUMNS} FROM r JOIN books b ON b.id = r.book_id`,
      [dto.userId, dto.bookId, dto.startAt, dto.duration, dto.endAt],
    );
    return toReservation(rows[0]);
  }

  async findActiveReservationByUser(userId: number): Promise<Reservation | null> {
    const { rows } = await this.run<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS}
       FROM reservations r JOIN books b ON b.id = r.book_id
       WHERE r.user_id = $1 AND r.status = 'active'`,
      [userId],
    );
    return rows[0] ? toReservation(rows[0]) : null;
  }

  async findActiveReservationByBook(bookId: number): Promise<Reservation | null> {
    const { rows } = await this.run<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS}
       FROM reservations r JOIN books b ON b.id = r.book_id
       WHERE r.book_id = $1 AND r.status = 'active'`,
      [bookId],
    );
    return rows[0] ? toReservation(rows[0]) : null;
  }

  async listActiveReservations(): Promise<ActiveReservationView[]> {
    const { rows } = await this.run<ActiveReservationRow>(
      `SELECT ${RESERVATION_COLUMNS}, u.first_name, u.last_name
       FROM reservations r
       JOIN books b ON b.id = r.book_id
       JOIN users u ON u.user_id = r.user_id
       WHERE r.status = 'active'
       ORDER BY r.end_at`,
    );
    return rows.map((row) => ({
      ...toReservation(row),
      firstName: row.first_name,
      lastName: row.last_name,
    }));
  }

  async completeReservation(reservationId: number, completedAt: Date): Promise<void> {
    await this.run(
      `UPDATE reservations SET status = 'completed', completed_at = $1
       WHERE id = $2 AND status = 'active'`,
      [completedAt, reservationId],
    );
  }

  async findWaitlistEntry(userId: number, bookId: number): Promise<WaitlistEntry | null> {
    const { rows } = await this.run<WaitlistRow>(
      'SELECT * FROM waitlist WHERE user_id = $1 AND book_id = $2',
      [userId, bookId],
    );
    return rows[0] ? toWaitlistEntry(rows[0]) : null;
  }

  async putWaitlistEntry(userId: number, bookId: number, queuedAt: Date): Promise<void> {
    // a re-enqueue takes a fresh serial so that ties on queued_at keep insertion order
    await this.run('DELETE FROM waitlist WHERE user_id = $1 AND book_id = $2', [userId, bookId]);
    await this.run(
      `INSERT INTO waitlist (user_id, book_id, queued_at, notified)
       VALUES ($1, $2, $3, false)`,
      [userId, bookId, queuedAt],
    );
  }

  async findOldestUnnotified(bookId: number): Promise<WaitlistEntry | null> {
    const { rows } = await this.run<WaitlistRow>(
      `SELECT * FROM waitlist
       WHERE book_id = $1 AND notified = false
       ORDER BY queued_at, id
       LIMIT 1
       FOR UPDATE SKIP LOCKED`,
      [bookId],
    );
    return rows[0] ? toWaitlistEntry(rows[0]) : null;
  }

  async listWaitlist(bookId: number): Promise<WaitlistEntry[]> {
    const { rows } = await this.run<WaitlistRow>(
      'SELECT * FROM waitlist WHERE book_id = $1 ORDER BY queued_at, id',
      [bookId],
    );
    return rows.map(toWaitlistEntry);
  }

  async markWaitlistNotified(userId: number, bookId: number, notifiedAt: Date): Promise<boolean> {
    const { rowCount } = await this.run(
      `UPDATE waitlist SET notified = true, notified_at = $1
       WHERE user_id = $2 AND book_id = $3 AND notified = false`,
      [notifiedAt, userId, bookId],
    );
    return (rowCount ?? 0) > 0;
  }

  async clearWaitlistNotified(userId: number, bookId: number): Promise<void> {
    await this.run(
      `UPDATE waitlist SET notified = false, notified_at = NULL
       WHERE user_id = $1 AND book_id = $2`,
      [userId, bookId],
    );
  }

  async deleteWaitlistEntry(userId: number, bookId: number): Promise<boolean> {
    const { rowCount } = await this.run(
      'DELETE FROM waitlist WHERE user_id = $1 AND book_id = $2',
      [userId, bookId],
    );
    return (rowCount ?? 0) > 0;
  }

  async findReminderMark(key: ReminderMarkKey): Promise<ReminderMark | null> {
    const { rows } = await this.run<ReminderMarkRow>(
      `SELECT * FROM reminder_marks
       WHERE user_id = $1 AND book_id = $2 AND checkpoint = $3
       FOR UPDATE`,
      [key.userId, key.bookId, key.checkpoint],
    );
    const row = rows[0];
    if (!row) return null;
    return {
      userId: row.user_id,
      bookId: row.book_id,
      checkpoint: row.checkpoint,
      firedAt: row.fired_at,
    };
  }

  async upsertReminderMark(mark: ReminderMark): Promise<void> {
    await this.run(
      `INSERT INTO reminder_marks (user_id, book_id, checkpoint, fired_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id, book_id, checkpoint) DO UPDATE SET fired_at = $4`,
      [mark.userId, mark.bookId, mark.checkpoint, mark.firedAt],
    );
  }

  async claimReminderMark(mark: ReminderMark, previousFiredAt: Date | null): Promise<boolean> {
    const { rowCount } =
      previousFiredAt === null
        ? await this.run(
            `INSERT INTO reminder_marks (user_id, book_id, checkpoint, fired_at)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (user_id, book_id, checkpoint) DO NOTHING`,
            [mark.userId, mark.bookId, mark.checkpoint, mark.firedAt],
          )
        : await this.run(
            `UPDATE reminder_marks SET fired_at = $4
             WHERE user_id = $1 AND book_id = $2 AND checkpoint = $3 AND fired_at = $5`,
            [mark.userId, mark.bookId, mark.checkpoint, mark.firedAt, previousFiredAt],
          );
    return (rowCount ?? 0) > 0;
  }

  async deleteReminderMark(key: ReminderMarkKey): Promise<void> {
    await this.run(
      'DELETE FROM reminder_marks WHERE user_id = $1 AND book_id = $2 AND checkpoint = $3',
      [key.userId, key.bookId, key.checkpoint],
    );
  }
}

export class PgLibraryStore extends PgLibraryRepository implements LibraryStore {
  constructor() {
    super(async (text, values) => {
      try {
        return await pool.query(text, values);
      } catch (err) {
        throw translate(err);
      }
    });
  }

  async transaction<T>(fn: (repo: LibraryRepository) => Promise<T>): Promise<T> {
    try {
      return await withTransaction((client) =>
        fn(new PgLibraryRepository((text, values) => client.query(text, values))),
      );
    } catch (err) {
      throw translate(err);
    }
  }

  async ping(): Promise<void> {
    try {
      await pool.query('SELECT 1');
    } catch (err) {
      throw translate(err);
    }
  }
}
