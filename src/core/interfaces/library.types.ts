export type ItemStatus = 'available' | 'booked';

export type UserStatus = ItemStatus;

export type ReservationStatus = 'active' | 'completed';

export type DurationTier = 'HOUR' | 'DAY' | 'WEEK' | 'MONTH';

export interface User {
  id: number;
  firstName: string;
  lastName: string;
  /** Null until the user picks an office. */
  location: string | null;
  currentReservationId: number | null;
  status: UserStatus;
}

export interface Book {
  id: number;
  title: string;
  author: string;
  location: string;
  shelf: string | null;
  floor: string | null;
  status: ItemStatus;
}

export interface Reservation {
  id: number;
  userId: number;
  bookId: number;
  bookTitle: string;
  location: string;
  startAt: Date;
  duration: DurationTier;
  endAt: Date;
  status: ReservationStatus;
  completedAt: Date | null;
}

/** Active reservation joined with the holder's name, as the reminder sweep reads it. */
export interface ActiveReservationView extends Reservation {
  firstName: string;
  lastName: string;
}

export interface WaitlistEntry {
  userId: number;
  bookId: number;
  queuedAt: Date;
  notified: boolean;
  notifiedAt: Date | null;
}

export interface ReminderMarkKey {
  userId: number;
  bookId: number;
  checkpoint: string;
}

export interface ReminderMark extends ReminderMarkKey {
  firedAt: Date;
}

export interface RegisterUserDTO {
  id: number;
  firstName: string;
  lastName: string;
}

export interface NewReservationDTO {
  userId: number;
  bookId: number;
  startAt: Date;
  duration: DurationTier;
  endAt: Date;
}

export interface CatalogEntry {
  title: string;
  author: string;
  location: string;
  shelf?: string | null;
  floor?: string | null;
}
