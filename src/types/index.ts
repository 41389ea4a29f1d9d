// Configuration document models (persisted as config.json)
export interface Product {
  name: string;
  url: string;
  target_price: number;
}

export interface ProductUpdate {
  name?: string | null;
  url?: string | null;
  target_price?: number | null;
}

/**
 * `smtp_server` and `smtp_port` are kept for document compatibility only:
 * alerts are delivered through SendGrid and never read them.
 */
export interface EmailNotificationSettings {
  enabled: boolean;
  smtp_server: string;
  smtp_port: number;
  sender_email: string;
  recipient_email: string;
}

/** Stored and validated, but no desktop alerts are delivered by this service */
export interface DesktopNotificationSettings {
  enabled: boolean;
}

export interface MonitorConfig {
  products: Product[];
  check_interval_minutes: number;
  email_notifications: EmailNotificationSettings;
  desktop_notifications: DesktopNotificationSettings;
}

// Price history document (persisted as price_history.json)
export interface PriceHistoryEntry {
  timestamp: string;
  price: number;
}

export type PriceHistory = Record<string, PriceHistoryEntry[]>;

// Check results
export interface PriceCheckSuccess {
  name: string;
  current_price: number;
  target_price: number;
  price_met: boolean;
}

export interface PriceCheckFailure {
  name: string;
  error: string;
}

export type CheckResult = PriceCheckSuccess | PriceCheckFailure;

export interface MonitorStatus {
  is_running: boolean;
  last_check: string | null;
  total_products: number;
  check_interval_minutes: number;
}

// Scraper Types
export type ExtractionSource = 'structured-data' | 'html' | 'llm';

export type ExtractionResult =
  | { success: true; price: number; source: ExtractionSource }
  | { success: false; reason: string };

export interface PriceExtractionPort {
  extract(url: string, signal?: AbortSignal): Promise<ExtractionResult>;
}

// Notification Types
export interface PriceAlert {
  productName: string;
  currentPrice: number;
  targetPrice: number;
  url: string;
}

export interface NotificationResult {
  success: boolean;
  skipped?: boolean;
  error?: string;
}

export interface NotificationPort {
  notify(alert: PriceAlert, config: MonitorConfig): Promise<NotificationResult>;
}

// Configuration Types
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug';

export interface Config {
  app: {
    name: string;
    version: string;
    port: number;
    apiPrefix: string;
    allowedOrigins: string[];
    logLevel: LogLevel;
  };
  paths: {
    configFile: string;
    priceHistoryFile: string;
    logFile: string;
  };
  monitoring: {
    defaultCheckIntervalMinutes: number;
    minCheckIntervalMinutes: number;
    maxCheckIntervalMinutes: number;
    crawlDelayMs: number;
  };
  scraper: {
    timeoutMs: number;
    maxRetries: number;
    maxBackoffMs: number;
    userAgent: string;
  };
  email: {
    sendgridApiKey: string;
    senderEmail: string;
    recipientEmail: string;
    smtpServer: string;
    smtpPort: number;
  };
  gemini: {
    apiKey: string;
    model: string;
  };
}
