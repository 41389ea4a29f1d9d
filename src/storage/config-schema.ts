import { z } from 'zod';

export interface IntervalBounds {
  minCheckIntervalMinutes: number;
  maxCheckIntervalMinutes: number;
}

export interface NotificationDefaults {
  smtpServer: string;
  smtpPort: number;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const httpUrl = z
  .string({ required_error: 'url is required' })
  .trim()
  .refine(isHttpUrl, 'url must be an absolute http(s) URL');

const positivePrice = z
  .number({ required_error: 'target_price is required', invalid_type_error: 'target_price must be a number' })
  .positive('Target price must be positive');

export const productSchema = z.object({
  name: z.string({ required_error: 'name is required' }).trim().min(1, 'name must not be empty'),
  url: httpUrl,
  target_price: positivePrice,
});

/** Partial update: null or absent fields keep their current value */
export const productUpdateSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty').nullish(),
  url: httpUrl.nullish(),
  target_price: positivePrice.nullish(),
});

export function createMonitorConfigSchema(bounds: IntervalBounds, defaults: NotificationDefaults) {
  const { minCheckIntervalMinutes: min, maxCheckIntervalMinutes: max } = bounds;
  const intervalMessage = `Check interval must be between ${min} and ${max} minutes`;

  return z.object({
    products: z.array(productSchema, { required_error: 'Missing required field: products' }),
    check_interval_minutes: z
      .number({
        required_error: 'Missing required field: check_interval_minutes',
        invalid_type_error: 'check_interval_minutes must be a number',
      })
      .int('check_interval_minutes must be a whole number of minutes')
      .min(min, intervalMessage)
      .max(max, intervalMessage),
    email_notifications: z
      .object({
        enabled: z.boolean().default(false),
        smtp_server: z.string().default(defaults.smtpServer),
        smtp_port: z.number().int().positive().default(defaults.smtpPort),
        sender_email: z.string().default(''),
        recipient_email: z.string().default(''),
      })
      .default({}),
    desktop_notifications: z
      .object({
        enabled: z.boolean().default(false),
      })
      .default({}),
  });
}

/** Flatten zod issues into one readable message */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const isMissingField = issue.message.startsWith('Missing required field');
      return issue.path.length > 0 && !isMissingField
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message;
    })
    .join('; ');
}
