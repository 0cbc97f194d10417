import { Router, type Request, type Response } from 'express';

import { logger } from '@utils/logger.js';

export interface HealthDeps {
  checks: Record<string, () => Promise<unknown>>;
}

export default function healthRoutes(deps: HealthDeps): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const results: Record<string, 'ok' | 'down'> = {};
    for (const [name, check] of Object.entries(deps.checks)) {
      try {
        await check();
        results[name] = 'ok';
      } catch (err) {
        logger.warn({ check: name, err }, '[health] check failed');
        results[name] = 'down';
      }
    }
    const healthy = Object.values(results).every((r) => r === 'ok');
    res.status(healthy ? 200 : 503).json({ status: healthy ? 'ok' : 'degraded', checks: results });
  });

  return router;
}
