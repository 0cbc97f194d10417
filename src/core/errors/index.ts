export * from './base-error.js';
export * from './validation.error.js';
export * from './not-found.error.js';
export * from './conflict.error.js';
export * from './resource-unavailable.error.js';
export * from './active-reservation-exists.error.js';
export * from './no-active-reservation.error.js';
export * from './reservation-mismatch.error.js';
export * from './delivery-failure.error.js';
export * from './store-unavailable.error.js';
