import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import { Config, LogLevel } from '../types/index.js';

dotenvConfig();

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug'];

function getEnvVar(key: string): string {
  return process.env[key]?.trim() || '';
}

function getNumericEnvVar(key: string, fallback: number): number {
  const raw = getEnvVar(key);
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function getLogLevel(): LogLevel {
  const raw = getEnvVar('LOG_LEVEL').toLowerCase() || 'info';
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

const dataDir = getEnvVar('DATA_DIR') || 'data';
const logDir = path.join(dataDir, 'logs');

export const config: Config = {
  app: {
    name: 'Price Drop Monitor',
    version: '1.0.0',
    port: getNumericEnvVar('API_PORT', 8000),
    apiPrefix: getEnvVar('API_PREFIX') || '/api/v1',
    allowedOrigins: (
      getEnvVar('ALLOWED_ORIGINS') ||
      'http://localhost:3000,http://localhost:8000,http://127.0.0.1:3000,http://127.0.0.1:8000'
    )
      .split(',')
      .map(o => o.trim())
      .filter(Boolean),
    logLevel: getLogLevel(),
  },
  paths: {
    configFile: path.join(dataDir, 'config.json'),
    priceHistoryFile: path.join(dataDir, 'price_history.json'),
    logFile: path.join(logDir, 'app.log'),
  },
  monitoring: {
    defaultCheckIntervalMinutes: getNumericEnvVar('DEFAULT_CHECK_INTERVAL', 300), // 5 hours
    minCheckIntervalMinutes: getNumericEnvVar('MIN_CHECK_INTERVAL', 60),
    maxCheckIntervalMinutes: getNumericEnvVar('MAX_CHECK_INTERVAL', 1440), // 24 hours
    crawlDelayMs: getNumericEnvVar('CRAWL_DELAY_MS', 5000),
  },
  scraper: {
    timeoutMs: getNumericEnvVar('SCRAPER_TIMEOUT_MS', 30000),
    maxRetries: getNumericEnvVar('SCRAPER_MAX_RETRIES', 3),
    maxBackoffMs: getNumericEnvVar('SCRAPER_MAX_BACKOFF_MS', 10000),
    userAgent:
      getEnvVar('SCRAPER_USER_AGENT') ||
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  },
  email: {
    sendgridApiKey: getEnvVar('SENDGRID_API_KEY'),
    senderEmail: getEnvVar('ALERT_SENDER_EMAIL'),
    recipientEmail: getEnvVar('ALERT_RECIPIENT_EMAIL'),
    smtpServer: getEnvVar('SMTP_SERVER') || 'smtp.gmail.com',
    smtpPort: getNumericEnvVar('SMTP_PORT', 587),
  },
  gemini: {
    apiKey: getEnvVar('GEMINI_API_KEY'),
    model: getEnvVar('GEMINI_MODEL') || 'gemini-2.0-flash',
  },
};
