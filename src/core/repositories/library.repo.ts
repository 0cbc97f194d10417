import type {
  ActiveReservationView,
  Book,
  CatalogEntry,
  ItemStatus,
  NewReservationDTO,
  RegisterUserDTO,
  ReminderMark,
  ReminderMarkKey,
  Reservation,
  User,
  WaitlistEntry,
} from '@core/interfaces/library.types.js';

/**
 * Read/write primitives over users, books, reservations, waitlist entries and
 * reminder marks. Every method runs either against committed state or, when
 * handed out by {@link LibraryStore.transaction}, inside that transaction.
 */
export interface LibraryRepository {
  findUser(userId: number): Promise<User | null>;
  /** Locks the user row until the surrounding transaction ends. */
  findUserForUpdate(userId: number): Promise<User | null>;
  upsertUser(dto: RegisterUserDTO): Promise<User>;
  setUserLocation(userId: number, location: string): Promise<void>;
  setUserBooking(userId: number, reservationId: number | null): Promise<void>;

  /** Case-insensitive exact title match within one location. */
  findBook(title: string, location: string): Promise<Book | null>;
  findBookById(bookId: number): Promise<Book | null>;
  /** Locks the book row until the surrounding transaction ends. */
  findBookForUpdate(bookId: number): Promise<Book | null>;
  listBooks(location: string, status?: ItemStatus): Promise<Book[]>;
  setBookStatus(bookId: number, status: ItemStatus): Promise<void>;
  countBooks(): Promise<number>;
  insertBook(entry: CatalogEntry): Promise<Book>;

  insertReservation(dto: NewReservationDTO): Promise<Reservation>;
  findActiveReservationByUser(userId: number): Promise<Reservation | null>;
  findActiveReservationByBook(bookId: number): Promise<Reservation | null>;
  listActiveReservations(): Promise<ActiveReservationView[]>;
  completeReservation(reservationId: number, completedAt: Date): Promise<void>;

  findWaitlistEntry(userId: number, bookId: number): Promise<WaitlistEntry | null>;
  /** Inserts or replaces the (user, book) entry with a fresh, unnotified one. */
  putWaitlistEntry(userId: number, bookId: number, queuedAt: Date): Promise<void>;
  findOldestUnnotified(bookId: number): Promise<WaitlistEntry | null>;
  listWaitlist(bookId: number): Promise<WaitlistEntry[]>;
  /** Flips an unnotified entry to notified; false when there was nothing to flip. */
  markWaitlistNotified(userId: number, bookId: number, notifiedAt: Date): Promise<boolean>;
  clearWaitlistNotified(userId: number, bookId: number): Promise<void>;
  deleteWaitlistEntry(userId: number, bookId: number): Promise<boolean>;

  findReminderMark(key: ReminderMarkKey): Promise<ReminderMark | null>;
  upsertReminderMark(mark: ReminderMark): Promise<void>;
  /**
   * Writes `mark` only while the stored firing still equals `previousFiredAt`
   * (no row at all for null). False when another sweep got there first.
   */
  claimReminderMark(mark: ReminderMark, previousFiredAt: Date | null): Promise<boolean>;
  deleteReminderMark(key: ReminderMarkKey): Promise<void>;
}

export interface LibraryStore extends LibraryRepository {
  /**
   * Runs `fn` in one atomic unit. A rejected promise rolls every write back.
   */
  transaction<T>(fn: (repo: LibraryRepository) => Promise<T>): Promise<T>;
}
