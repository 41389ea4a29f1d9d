#!/usr/bin/env node

import './utils/sentry.js';
import { createApp } from './app.js';
import { SendGridClient } from './email/sendgrid-client.js';
import { LlmPriceReader } from './scraper/llm-price-reader.js';
import { PageFetcher } from './scraper/page-fetcher.js';
import { PriceExtractor } from './scraper/price-extractor.js';
import { NotificationService } from './services/notification-service.js';
import { PriceMonitor } from './services/price-monitor.js';
import { ConfigStore } from './storage/config-store.js';
import { PriceHistoryStore } from './storage/price-history-store.js';
import { config } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info(`Starting ${config.app.name} v${config.app.version}`);

  const extractor = new PriceExtractor(
    new PageFetcher({ timeoutMs: config.scraper.timeoutMs, userAgent: config.scraper.userAgent }),
    config.gemini.apiKey ? new LlmPriceReader(config.gemini.apiKey, config.gemini.model) : null,
    { maxRetries: config.scraper.maxRetries, maxBackoffMs: config.scraper.maxBackoffMs }
  );

  const notifier = new NotificationService(new SendGridClient(config.email.sendgridApiKey), {
    senderEmail: config.email.senderEmail,
    recipientEmail: config.email.recipientEmail,
  });

  const monitor = await PriceMonitor.create({
    configStore: new ConfigStore({
      filePath: config.paths.configFile,
      defaultCheckIntervalMinutes: config.monitoring.defaultCheckIntervalMinutes,
      minCheckIntervalMinutes: config.monitoring.minCheckIntervalMinutes,
      maxCheckIntervalMinutes: config.monitoring.maxCheckIntervalMinutes,
      smtpServer: config.email.smtpServer,
      smtpPort: config.email.smtpPort,
    }),
    historyStore: new PriceHistoryStore(config.paths.priceHistoryFile),
    extractor,
    notifier,
    crawlDelayMs: config.monitoring.crawlDelayMs,
  });

  const app = createApp(monitor, {
    apiPrefix: config.app.apiPrefix,
    allowedOrigins: config.app.allowedOrigins,
    logFile: config.paths.logFile,
    version: config.app.version,
  });

  const server = app.listen(config.app.port, () => {
    logger.info('API server started', { port: config.app.port, apiPrefix: config.app.apiPrefix });
  });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down...', { signal });
    if (monitor.isRunning()) {
      await monitor.stopMonitoring();
    }
    server.close(() => process.exit(0));
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch(error => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
