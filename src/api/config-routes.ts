import { Router, Request, Response } from 'express';
import { PriceMonitor } from '../services/price-monitor.js';
import { sendError } from './http-errors.js';

export function createConfigRouter(monitor: PriceMonitor): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(monitor.getConfig());
  });

  /**
   * PUT /config
   * Replaces the whole configuration document. Validated before anything is written.
   */
  router.put('/', async (req: Request, res: Response) => {
    try {
      res.json(await monitor.updateConfig(req.body));
    } catch (error) {
      sendError(res, error, 'PUT /config');
    }
  });

  return router;
}
