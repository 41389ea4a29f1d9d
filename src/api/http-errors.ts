import { Response } from 'express';
import { PriceMonitorError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { reportError } from '../utils/sentry.js';

/**
 * Answer with the status carried by a PriceMonitorError, or 500 for anything else
 */
export function sendError(res: Response, error: unknown, route: string): void {
  if (error instanceof PriceMonitorError && error.statusCode < 500) {
    logger.warn(`API request rejected in ${route}`, { error: error.message, status: error.statusCode });
    res.status(error.statusCode).json({ success: false, message: error.message });
    return;
  }

  logger.error(`API error in ${route}`, { error: errorMessage(error) });
  reportError(error, { route });
  res.status(500).json({ success: false, message: 'Internal server error' });
}

export function sendValidationError(res: Response, message: string): void {
  res.status(400).json({ success: false, message });
}
