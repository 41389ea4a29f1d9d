import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}: ${String(message)}${extra}`;
});

/**
 * Application logger
 *
 * Writes human-readable lines to the console and JSON lines to a size-rotated
 * log file (10MB x 5) that the monitoring API tails.
 */
export const logger = winston.createLogger({
  level: config.app.logLevel,
  format: combine(timestamp(), errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), consoleFormat),
    }),
    new winston.transports.File({
      filename: config.paths.logFile,
      format: json(),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      tailable: true,
    }),
  ],
});
