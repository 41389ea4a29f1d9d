import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors.js';
import { ConfigStore } from './config-store.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const KETTLE = { name: 'Kettle', url: 'https://shop.example.com/kettle', target_price: 39.5 };

describe('ConfigStore', () => {
  let dir: string;
  let filePath: string;
  let store: ConfigStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-store-'));
    filePath = path.join(dir, 'config.json');
    store = new ConfigStore({
      filePath,
      defaultCheckIntervalMinutes: 60,
      minCheckIntervalMinutes: 1,
      maxCheckIntervalMinutes: 1440,
      smtpServer: 'smtp.test.local',
      smtpPort: 2525,
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function readDisk(): Promise<unknown> {
    return JSON.parse(await fs.readFile(filePath, 'utf-8'));
  }

  describe('load', () => {
    it('creates and persists a default config when none exists', async () => {
      const config = await store.load();

      const expected = {
        products: [],
        check_interval_minutes: 60,
        email_notifications: {
          enabled: false,
          smtp_server: 'smtp.test.local',
          smtp_port: 2525,
          sender_email: '',
          recipient_email: '',
        },
        desktop_notifications: { enabled: false },
      };
      expect(config).toEqual(expected);
      expect(await readDisk()).toEqual(expected);
    });

    it('fills absent notification sections with defaults', async () => {
      await fs.writeFile(filePath, JSON.stringify({ products: [KETTLE], check_interval_minutes: 30 }));

      const config = await store.load();

      expect(config.products).toEqual([KETTLE]);
      expect(config.check_interval_minutes).toBe(30);
      expect(config.email_notifications.enabled).toBe(false);
      expect(config.email_notifications.smtp_server).toBe('smtp.test.local');
      expect(config.desktop_notifications).toEqual({ enabled: false });
    });

    it('rejects unreadable JSON', async () => {
      await fs.writeFile(filePath, '{not json');

      await expect(store.load()).rejects.toThrow(ConfigurationError);
      await expect(store.load()).rejects.toThrow(/^Failed to read configuration: /);
    });

    it('rejects a persisted config that fails validation', async () => {
      await fs.writeFile(filePath, JSON.stringify({ products: [], check_interval_minutes: 0 }));

      await expect(store.load()).rejects.toThrow(
        'check_interval_minutes: Check interval must be between 1 and 1440 minutes'
      );
    });
  });

  describe('save', () => {
    it('persists and returns the validated config', async () => {
      const saved = await store.save({ products: [KETTLE], check_interval_minutes: 15 });

      expect(saved.products).toEqual([KETTLE]);
      expect(await readDisk()).toEqual(saved);
    });

    it('trims product names and urls', async () => {
      const saved = await store.save({
        products: [{ name: '  Kettle ', url: ' https://shop.example.com/kettle ', target_price: 39.5 }],
        check_interval_minutes: 15,
      });

      expect(saved.products[0]).toEqual(KETTLE);
    });

    it.each([0, 1441])('rejects interval %i outside the bounds', async interval => {
      await expect(store.save({ products: [], check_interval_minutes: interval })).rejects.toThrow(
        'check_interval_minutes: Check interval must be between 1 and 1440 minutes'
      );
    });

    it('accepts the interval bounds themselves', async () => {
      await expect(store.save({ products: [], check_interval_minutes: 1 })).resolves.toMatchObject({
        check_interval_minutes: 1,
      });
      await expect(store.save({ products: [], check_interval_minutes: 1440 })).resolves.toMatchObject({
        check_interval_minutes: 1440,
      });
    });

    it('requires the products list', async () => {
      await expect(store.save({ check_interval_minutes: 60 })).rejects.toThrow(
        new ConfigurationError('Missing required field: products')
      );
    });

    it('requires the check interval', async () => {
      await expect(store.save({ products: [] })).rejects.toThrow('Missing required field: check_interval_minutes');
    });

    it('rejects products with invalid urls', async () => {
      await expect(
        store.save({
          products: [{ name: 'Kettle', url: 'not-a-url', target_price: 10 }],
          check_interval_minutes: 60,
        })
      ).rejects.toThrow('products.0.url: url must be an absolute http(s) URL');
    });

    it('rejects non-positive target prices', async () => {
      await expect(
        store.save({
          products: [{ ...KETTLE, target_price: -5 }],
          check_interval_minutes: 60,
        })
      ).rejects.toThrow('products.0.target_price: Target price must be positive');
    });

    it('writes nothing when validation fails', async () => {
      await store.save({ products: [KETTLE], check_interval_minutes: 60 });
      const before = await fs.readFile(filePath, 'utf-8');

      await expect(store.save({ products: [KETTLE], check_interval_minutes: 0 })).rejects.toThrow(
        ConfigurationError
      );

      expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
    });

    it('leaves no temporary files behind', async () => {
      await store.save({ products: [KETTLE], check_interval_minutes: 60 });
      await store.save({ products: [], check_interval_minutes: 90 });

      expect(await fs.readdir(dir)).toEqual(['config.json']);
    });
  });
});
