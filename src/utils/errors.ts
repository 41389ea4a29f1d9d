/**
 * Error taxonomy for the price monitor.
 *
 * Each error carries the HTTP status the API layer answers with.
 */
export class PriceMonitorError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Invalid persisted or submitted configuration */
export class ConfigurationError extends PriceMonitorError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Index-based product operation on an absent index */
export class NotFoundError extends PriceMonitorError {
  constructor(message = 'Product not found') {
    super(message, 404);
  }
}

export class AlreadyRunningError extends PriceMonitorError {
  constructor(message = 'Monitoring is already running') {
    super(message, 400);
  }
}

export class NotRunningError extends PriceMonitorError {
  constructor(message = 'Monitoring is not running') {
    super(message, 400);
  }
}

/**
 * Raised inside the extractor for a failed attempt. Never crosses the
 * extraction port: callers receive an ExtractionResult instead.
 */
export class PriceExtractionError extends PriceMonitorError {
  readonly retryable: boolean;

  constructor(message: string, retryable = true) {
    super(message);
    this.retryable = retryable;
  }
}

/** Raised inside the notification channel; never crosses the notification port */
export class NotificationError extends PriceMonitorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
