import { BaseError } from './base-error.js';

export class ConflictError extends BaseError {
  constructor(
    message = 'Conflict',
    public readonly data?: unknown,
    code = 'CONFLICT',
  ) {
    super(code, 409, message);
  }
}
