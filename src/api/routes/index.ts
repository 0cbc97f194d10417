import { Router } from 'express';

import type { WebhookDeps } from '../controllers/webhook.controller.js';

import devRoutes, { type DevRouteDeps } from './dev.routes.js';
import healthRoutes, { type HealthDeps } from './health.routes.js';
import webhookRoutes from './webhook.routes.js';

export interface ApiDeps {
  webhook: WebhookDeps;
  dev: DevRouteDeps;
  health: HealthDeps;
  devRoutesEnabled: boolean;
}

export default function apiRouter(deps: ApiDeps): Router {
  const v1Router = Router();
  v1Router.use(healthRoutes(deps.health));
  v1Router.use('/webhook', webhookRoutes(deps.webhook));
  if (deps.devRoutesEnabled) {
    v1Router.use(devRoutes(deps.dev));
  }

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}
