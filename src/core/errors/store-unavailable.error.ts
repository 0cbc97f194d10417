import { BaseError } from './base-error.js';

export class StoreUnavailableError extends BaseError {
  constructor(message = 'Store unavailable', options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', 503, message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
