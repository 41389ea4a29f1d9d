import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NotificationError } from '../utils/errors.js';
import { SendGridClient, formatPriceAlertText } from './sendgrid-client.js';

const { send, setApiKey } = vi.hoisted(() => ({
  send: vi.fn(),
  setApiKey: vi.fn(),
}));

vi.mock('@sendgrid/mail', () => ({
  default: { send, setApiKey },
}));

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const ALERT = {
  productName: 'Espresso <Pro>',
  currentPrice: 45.99,
  targetPrice: 55.99,
  url: 'https://shop.example.com/espresso?ref=a&b=1',
};

const ADDRESSES = { from: 'alerts@example.com', to: 'me@example.com' };

describe('formatPriceAlertText', () => {
  it('lists the prices and savings', () => {
    expect(formatPriceAlertText(ALERT).split('\n')).toEqual([
      'Good news! The price for Espresso <Pro> has dropped to your target.',
      '',
      'Current price: $45.99',
      'Target price: $55.99',
      'You save: $10.00',
      '',
      'Product URL: https://shop.example.com/espresso?ref=a&b=1',
    ]);
  });
});

describe('SendGridClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sets the API key only when one is given', () => {
    expect(new SendGridClient('test-key').isConfigured()).toBe(true);
    expect(setApiKey).toHaveBeenCalledWith('test-key');

    setApiKey.mockClear();
    expect(new SendGridClient('').isConfigured()).toBe(false);
    expect(setApiKey).not.toHaveBeenCalled();
  });

  it('sends the alert with escaped HTML', async () => {
    send.mockResolvedValue([{ statusCode: 202 }, {}]);

    await new SendGridClient('test-key').sendPriceAlert(ALERT, ADDRESSES);

    expect(send).toHaveBeenCalledTimes(1);
    const message = send.mock.calls[0][0];
    expect(message).toMatchObject({
      to: 'me@example.com',
      from: 'alerts@example.com',
      subject: 'Price Alert: Espresso <Pro>',
      text: formatPriceAlertText(ALERT),
    });
    expect(message.html).toContain('<strong>Espresso &lt;Pro&gt;</strong>');
    expect(message.html).toContain('href="https://shop.example.com/espresso?ref=a&amp;b=1"');
  });

  it('refuses to send without an API key', async () => {
    await expect(new SendGridClient('').sendPriceAlert(ALERT, ADDRESSES)).rejects.toThrow(NotificationError);
    expect(send).not.toHaveBeenCalled();
  });

  it('wraps SendGrid errors', async () => {
    send.mockRejectedValue(new Error('Forbidden'));

    await expect(new SendGridClient('test-key').sendPriceAlert(ALERT, ADDRESSES)).rejects.toThrow(
      'SendGrid rejected the price alert: Forbidden'
    );
  });
});
