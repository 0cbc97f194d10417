import { ConflictError } from './conflict.error.js';

export class ActiveReservationExistsError extends ConflictError {
  constructor(
    public readonly userId: number,
    public readonly reservationId: number,
    public readonly bookId: number,
  ) {
    super('User already holds an active reservation', { reservationId, bookId }, 'ACTIVE_RESERVATION_EXISTS');
  }
}
