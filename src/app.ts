import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createConfigRouter } from './api/config-routes.js';
import { sendError, sendValidationError } from './api/http-errors.js';
import { createMonitoringRouter } from './api/monitoring-routes.js';
import { createProductRouter } from './api/product-routes.js';
import { createStatusRouter } from './api/status-routes.js';
import { PriceMonitor } from './services/price-monitor.js';

export interface AppOptions {
  apiPrefix: string;
  allowedOrigins: string[];
  logFile: string;
  version: string;
}

/**
 * Build the HTTP API around an already-constructed monitor
 */
export function createApp(monitor: PriceMonitor, options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: options.allowedOrigins, credentials: true }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', version: options.version });
  });

  app.use(`${options.apiPrefix}/status`, createStatusRouter(monitor));
  app.use(`${options.apiPrefix}/config`, createConfigRouter(monitor));
  app.use(`${options.apiPrefix}/products`, createProductRouter(monitor));
  app.use(`${options.apiPrefix}/monitoring`, createMonitoringRouter(monitor, options.logFile));

  // Body parser failures and anything a route did not handle
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendValidationError(res, 'Malformed JSON body');
      return;
    }
    sendError(res, error, `${req.method} ${req.path}`);
  });

  return app;
}
