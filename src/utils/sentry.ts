import * as Sentry from '@sentry/node';
import { config } from './config.js';

// Only enabled when a DSN is provided
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    release: `price-drop-monitor@${config.app.version}`,
    tracesSampleRate: 0.2,
    sampleRate: 1.0,
  });
}

/**
 * Forward an unexpected error to Sentry with extra context.
 * No-op when Sentry is not configured.
 */
export function reportError(error: unknown, context: Record<string, unknown> = {}): void {
  if (!sentryEnabled) {
    return;
  }

  Sentry.withScope(scope => {
    scope.setExtras(context);
    Sentry.captureException(error);
  });
}
