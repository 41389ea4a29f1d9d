import { MonitorConfig } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  createMonitorConfigSchema,
  formatIssues,
  IntervalBounds,
  NotificationDefaults,
} from './config-schema.js';
import { readJsonFile, writeJsonFileAtomic } from './json-file.js';

export interface ConfigStoreOptions extends IntervalBounds, NotificationDefaults {
  filePath: string;
  defaultCheckIntervalMinutes: number;
}

/**
 * Durable store for the monitor configuration document.
 *
 * The document is validated at this boundary; everything past it works on the
 * typed MonitorConfig only.
 */
export class ConfigStore {
  private readonly schema: ReturnType<typeof createMonitorConfigSchema>;

  constructor(private readonly options: ConfigStoreOptions) {
    this.schema = createMonitorConfigSchema(options, options);
  }

  /**
   * Load the configuration. A missing file is replaced by a persisted default;
   * an unreadable or invalid file is a ConfigurationError.
   */
  async load(): Promise<MonitorConfig> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.options.filePath);
    } catch (error) {
      logger.error('Failed to read configuration', {
        filePath: this.options.filePath,
        error: errorMessage(error),
      });
      throw new ConfigurationError(`Failed to read configuration: ${errorMessage(error)}`);
    }

    if (raw === undefined) {
      logger.info('No configuration found, creating default', { filePath: this.options.filePath });
      return this.save(this.createDefault());
    }

    const config = this.validate(raw);
    logger.info('Configuration loaded', {
      products: config.products.length,
      checkIntervalMinutes: config.check_interval_minutes,
    });
    return config;
  }

  /**
   * Validate and atomically persist a configuration document.
   * Nothing is written when validation fails.
   */
  async save(input: unknown): Promise<MonitorConfig> {
    const config = this.validate(input);

    try {
      await writeJsonFileAtomic(this.options.filePath, config);
    } catch (error) {
      logger.error('Failed to save configuration', {
        filePath: this.options.filePath,
        error: errorMessage(error),
      });
      throw new ConfigurationError(`Failed to save configuration: ${errorMessage(error)}`);
    }

    logger.info('Configuration saved successfully');
    return config;
  }

  validate(input: unknown): MonitorConfig {
    const result = this.schema.safeParse(input);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error));
    }
    return result.data;
  }

  createDefault(): MonitorConfig {
    return {
      products: [],
      check_interval_minutes: this.options.defaultCheckIntervalMinutes,
      email_notifications: {
        enabled: false,
        smtp_server: this.options.smtpServer,
        smtp_port: this.options.smtpPort,
        sender_email: '',
        recipient_email: '',
      },
      desktop_notifications: {
        enabled: false,
      },
    };
  }
}
