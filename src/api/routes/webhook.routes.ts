import { Router } from 'express';

import { createWebhookHandler, type WebhookDeps } from '../controllers/webhook.controller.js';

export default function webhookRoutes(deps: WebhookDeps): Router {
  const router = Router();
  router.post('/telegram', createWebhookHandler(deps));
  return router;
}
