import { BaseError } from './base-error.js';

export type DeliveryTarget = { kind: 'user'; userId: number } | { kind: 'group' };

export class DeliveryFailureError extends BaseError {
  constructor(
    public readonly target: DeliveryTarget,
    message = 'Message delivery failed',
    options?: { cause?: unknown },
  ) {
    super('DELIVERY_FAILURE', 502, message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
