import sgMail from '@sendgrid/mail';
import { PriceAlert } from '../types/index.js';
import { NotificationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface EmailAddresses {
  from: string;
  to: string;
}

/**
 * Escape HTML special characters
 */
function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function formatPriceAlertText(alert: PriceAlert): string {
  const savings = alert.targetPrice - alert.currentPrice;
  return [
    `Good news! The price for ${alert.productName} has dropped to your target.`,
    '',
    `Current price: $${alert.currentPrice.toFixed(2)}`,
    `Target price: $${alert.targetPrice.toFixed(2)}`,
    `You save: $${savings.toFixed(2)}`,
    '',
    `Product URL: ${alert.url}`,
  ].join('\n');
}

function formatPriceAlertHtml(alert: PriceAlert): string {
  const savings = alert.targetPrice - alert.currentPrice;
  const url = escapeHtml(alert.url);
  return `<p>Good news! The price for <strong>${escapeHtml(alert.productName)}</strong> has dropped to your target.</p>
<table>
  <tr><td>Current price</td><td>$${alert.currentPrice.toFixed(2)}</td></tr>
  <tr><td>Target price</td><td>$${alert.targetPrice.toFixed(2)}</td></tr>
  <tr><td>You save</td><td>$${savings.toFixed(2)}</td></tr>
</table>
<p><a href="${url}">${url}</a></p>`;
}

/**
 * SendGrid email client for price alerts
 */
export class SendGridClient {
  private readonly configured: boolean;

  constructor(apiKey: string) {
    this.configured = apiKey.length > 0;
    if (this.configured) {
      sgMail.setApiKey(apiKey);
    }
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async sendPriceAlert(alert: PriceAlert, addresses: EmailAddresses): Promise<void> {
    if (!this.configured) {
      throw new NotificationError('SendGrid API key is not configured (SENDGRID_API_KEY)');
    }

    logger.info('Sending price alert email', { product: alert.productName, to: addresses.to });

    try {
      await sgMail.send({
        to: addresses.to,
        from: addresses.from,
        subject: `Price Alert: ${alert.productName}`,
        text: formatPriceAlertText(alert),
        html: formatPriceAlertHtml(alert),
      });
    } catch (error) {
      throw new NotificationError(`SendGrid rejected the price alert: ${errorMessage(error)}`);
    }

    logger.info('Price alert email sent successfully', { product: alert.productName });
  }
}
