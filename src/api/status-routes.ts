import { Router, Request, Response } from 'express';
import { PriceMonitor } from '../services/price-monitor.js';

/**
 * GET /status         - current monitoring status
 * GET /status/health  - liveness probe
 */
export function createStatusRouter(monitor: PriceMonitor): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(monitor.getStatus());
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  return router;
}
