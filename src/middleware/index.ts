export * from './error.middleware.js';
