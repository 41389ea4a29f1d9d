import { PriceHistory, PriceHistoryEntry } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { readJsonFile, writeJsonFileAtomic } from './json-file.js';

function isHistoryEntry(value: unknown): value is PriceHistoryEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'price' in value &&
    typeof value.price === 'number'
  );
}

/**
 * Append-only price history, keyed by product URL.
 *
 * Appends stay in memory until flush(); the whole document is rewritten once
 * per sweep. History is diagnostic, so read and write failures are logged and
 * never propagated.
 */
export class PriceHistoryStore {
  private history: PriceHistory = {};

  constructor(private readonly filePath: string) {}

  async load(): Promise<PriceHistory> {
    try {
      const raw = await readJsonFile(this.filePath);
      this.history = raw === undefined ? {} : this.parse(raw);
      logger.info('Price history loaded', { urls: Object.keys(this.history).length });
    } catch (error) {
      logger.warn('Failed to load price history, starting empty', {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      this.history = {};
    }
    return this.snapshot();
  }

  append(url: string, price: number, now: Date = new Date()): void {
    const entries = this.history[url] ?? [];
    entries.push({ timestamp: now.toISOString(), price });
    this.history[url] = entries;
  }

  async flush(): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, this.history);
      logger.info('Price history saved successfully');
    } catch (error) {
      logger.error('Failed to save price history', {
        filePath: this.filePath,
        error: errorMessage(error),
      });
    }
  }

  snapshot(): PriceHistory {
    return structuredClone(this.history);
  }

  private parse(raw: unknown): PriceHistory {
    if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new Error('Price history document must be an object keyed by URL');
    }

    const history: PriceHistory = {};
    for (const [url, entries] of Object.entries(raw)) {
      if (!Array.isArray(entries)) {
        logger.warn('Skipping malformed price history', { url });
        continue;
      }
      history[url] = entries.filter(isHistoryEntry);
    }
    return history;
  }
}
