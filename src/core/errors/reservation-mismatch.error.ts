import { BaseError } from './base-error.js';

export class ReservationMismatchError extends BaseError {
  constructor(
    public readonly userId: number,
    public readonly bookId: number,
    public readonly heldBookId: number,
  ) {
    super('RESERVATION_MISMATCH', 409, 'Active reservation references another book');
  }
}
