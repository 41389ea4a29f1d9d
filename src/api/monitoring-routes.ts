import { promises as fs } from 'fs';
import { Router, Request, Response } from 'express';
import { PriceMonitor } from '../services/price-monitor.js';
import { sendError, sendValidationError } from './http-errors.js';

const DEFAULT_LOG_LINES = 100;

/**
 * Return the last `lines` lines of a log file; a missing file has no lines
 */
export async function tailLogFile(logFile: string, lines: number): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(logFile, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const all = content.split('\n').filter(line => line.length > 0);
  return all.slice(-lines);
}

export function createMonitoringRouter(monitor: PriceMonitor, logFile: string): Router {
  const router = Router();

  router.post('/start', (_req: Request, res: Response) => {
    try {
      monitor.startMonitoring();
      res.json({ message: 'Monitoring started successfully' });
    } catch (error) {
      sendError(res, error, 'POST /monitoring/start');
    }
  });

  router.post('/stop', async (_req: Request, res: Response) => {
    try {
      await monitor.stopMonitoring();
      res.json({ message: 'Monitoring stopped successfully' });
    } catch (error) {
      sendError(res, error, 'POST /monitoring/stop');
    }
  });

  /**
   * POST /monitoring/check-now
   * Runs one sweep immediately, whether or not the loop is running
   */
  router.post('/check-now', async (_req: Request, res: Response) => {
    try {
      res.json(await monitor.checkAllProducts());
    } catch (error) {
      sendError(res, error, 'POST /monitoring/check-now');
    }
  });

  router.get('/price-history', (_req: Request, res: Response) => {
    res.json(monitor.getPriceHistory());
  });

  router.get('/logs', async (req: Request, res: Response) => {
    const raw = req.query.lines;
    const lines = raw === undefined ? DEFAULT_LOG_LINES : Number(raw);
    if (!Number.isInteger(lines) || lines < 1) {
      sendValidationError(res, 'lines must be a positive integer');
      return;
    }

    try {
      res.json({ logs: await tailLogFile(logFile, lines) });
    } catch (error) {
      sendError(res, error, 'GET /monitoring/logs');
    }
  });

  return router;
}
