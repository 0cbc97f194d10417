import { BaseError } from './base-error.js';

export class NoActiveReservationError extends BaseError {
  constructor(public readonly userId: number) {
    super('NO_ACTIVE_RESERVATION', 404, 'User has no active reservation');
  }
}
