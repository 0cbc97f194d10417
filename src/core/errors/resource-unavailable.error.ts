import { ConflictError } from './conflict.error.js';

export class ResourceUnavailableError extends ConflictError {
  constructor(
    public readonly bookId: number,
    message = 'Book is not available',
  ) {
    super(message, { bookId }, 'RESOURCE_UNAVAILABLE');
  }
}
