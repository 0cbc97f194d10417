export * from './controllers/webhook.controller.js';
export * from './controllers/webhook.validator.js';
export { default as healthRoutes } from './routes/health.routes.js';
export { default as webhookRoutes } from './routes/webhook.routes.js';
export { default as devRoutes } from './routes/dev.routes.js';
export { default as apiRouter } from './routes/index.js';
export type { ApiDeps } from './routes/index.js';
