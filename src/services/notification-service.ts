import { EmailAddresses, SendGridClient } from '../email/sendgrid-client.js';
import { MonitorConfig, NotificationPort, NotificationResult, PriceAlert } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface EmailOverrides {
  senderEmail: string;
  recipientEmail: string;
}

/**
 * Delivers price alerts. Best-effort: every failure is logged and reported in
 * the result, never thrown.
 */
export class NotificationService implements NotificationPort {
  constructor(
    private readonly email: SendGridClient,
    private readonly overrides: EmailOverrides
  ) {}

  async notify(alert: PriceAlert, config: MonitorConfig): Promise<NotificationResult> {
    if (!config.email_notifications.enabled) {
      logger.debug('Email notifications disabled, skipping alert', { product: alert.productName });
      return { success: true, skipped: true };
    }

    try {
      const addresses = this.resolveAddresses(config);
      if ('missing' in addresses) {
        const error = `Missing email settings: ${addresses.missing.join(', ')}`;
        logger.error('Cannot send price alert email', { product: alert.productName, error });
        return { success: false, error };
      }

      await this.email.sendPriceAlert(alert, addresses);
      return { success: true };
    } catch (error) {
      logger.error('Failed to send email notification', {
        product: alert.productName,
        error: errorMessage(error),
      });
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Environment settings take priority over the configuration document
   */
  private resolveAddresses(config: MonitorConfig): EmailAddresses | { missing: string[] } {
    const from = this.overrides.senderEmail || config.email_notifications.sender_email;
    const to = this.overrides.recipientEmail || config.email_notifications.recipient_email;

    const missing: string[] = [];
    if (!from) missing.push('sender_email');
    if (!to) missing.push('recipient_email');
    if (!this.email.isConfigured()) missing.push('SENDGRID_API_KEY');

    return missing.length > 0 ? { missing } : { from, to };
  }
}
