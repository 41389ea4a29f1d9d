import { ConfigStore } from '../storage/config-store.js';
import { PriceHistoryStore } from '../storage/price-history-store.js';
import {
  CheckResult,
  ExtractionResult,
  MonitorConfig,
  MonitorStatus,
  NotificationPort,
  PriceExtractionPort,
  PriceHistory,
  Product,
  ProductUpdate,
} from '../types/index.js';
import {
  AlreadyRunningError,
  NotFoundError,
  NotRunningError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { reportError } from '../utils/sentry.js';
import { sleep } from '../utils/sleep.js';

export interface PriceMonitorOptions {
  configStore: ConfigStore;
  historyStore: PriceHistoryStore;
  extractor: PriceExtractionPort;
  notifier: NotificationPort;
  /** Politeness delay between consecutive product checks */
  crawlDelayMs: number;
  now?: () => Date;
}

interface MonitorLoop {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Turn low-level failure messages into something a user can act on
 */
export function describeCheckError(message: string): string {
  if (message.includes('net::ERR_ABORTED') || message.includes('frame was detached')) {
    return 'Site blocked the request - try again later';
  }
  if (/timeout|timed out/i.test(message)) {
    return 'Request timed out - site may be slow';
  }
  return message;
}

/**
 * Price monitor orchestrator
 *
 * Owns the product configuration, the recurring check loop (Stopped/Running)
 * and manual checks. Config mutations are validated and persisted before the
 * live reference is replaced; the products array is never mutated in place,
 * so a sweep can iterate the reference it started with.
 *
 * Products are addressed by list position. Callers must re-read the list
 * before an indexed update or delete: a stale index targets the wrong product.
 */
export class PriceMonitor {
  private config: MonitorConfig;
  private loop: MonitorLoop | null = null;
  private writeQueue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  private constructor(
    private readonly options: PriceMonitorOptions,
    config: MonitorConfig
  ) {
    this.config = config;
    this.now = options.now ?? (() => new Date());
  }

  static async create(options: PriceMonitorOptions): Promise<PriceMonitor> {
    const config = await options.configStore.load();
    await options.historyStore.load();
    return new PriceMonitor(options, config);
  }

  // Configuration management

  getConfig(): MonitorConfig {
    return structuredClone(this.config);
  }

  updateConfig(input: unknown): Promise<MonitorConfig> {
    return this.enqueueWrite(async () => {
      this.config = await this.options.configStore.save(input);
      return structuredClone(this.config);
    });
  }

  // Product management

  listProducts(): Product[] {
    return structuredClone(this.config.products);
  }

  async addProduct(product: Product): Promise<Product> {
    const { config, value: index } = await this.mutateProducts(products => {
      products.push(product);
      return products.length - 1;
    });
    logger.info('Product added', { name: product.name, index });
    return structuredClone(config.products[index]);
  }

  async updateProduct(index: number, updates: ProductUpdate): Promise<Product> {
    const { config } = await this.mutateProducts(products => {
      const existing = this.productAt(products, index);
      products[index] = {
        name: updates.name ?? existing.name,
        url: updates.url ?? existing.url,
        target_price: updates.target_price ?? existing.target_price,
      };
    });
    logger.info('Product updated', { index });
    return structuredClone(config.products[index]);
  }

  async deleteProduct(index: number): Promise<Product> {
    const { value: removed } = await this.mutateProducts(products => {
      this.productAt(products, index);
      const [product] = products.splice(index, 1);
      return product;
    });
    logger.info('Product removed', { name: removed.name, index });
    return removed;
  }

  // Price checking

  async checkSingleProduct(product: Product, signal?: AbortSignal): Promise<CheckResult> {
    const { name, url, target_price } = product;
    logger.info(`Checking price for: ${name}`);

    try {
      let extraction: ExtractionResult;
      try {
        extraction = await this.options.extractor.extract(url, signal);
      } catch (error) {
        extraction = { success: false, reason: errorMessage(error) };
      }

      if (!extraction.success) {
        logger.warn(`Could not extract price for ${name}`, { url, reason: extraction.reason });
        return { name, error: `Could not extract price - ${describeCheckError(extraction.reason)}` };
      }

      const currentPrice = extraction.price;
      this.options.historyStore.append(url, currentPrice, this.now());

      const priceMet = currentPrice <= target_price;
      logger.info(`${name}: Current price $${currentPrice.toFixed(2)}, Target: $${target_price.toFixed(2)}`, {
        source: extraction.source,
        priceMet,
      });

      if (priceMet) {
        await this.sendAlert(product, currentPrice);
      }

      return { name, current_price: currentPrice, target_price, price_met: priceMet };
    } catch (error) {
      const message = describeCheckError(errorMessage(error));
      logger.error(`Error checking price for ${name}`, { url, error: message });
      return { name, error: message };
    }
  }

  /**
   * Check every product once, in list order. Stops early when the signal
   * aborts; history is flushed once at the end either way.
   */
  async checkAllProducts(signal?: AbortSignal): Promise<CheckResult[]> {
    const products = this.config.products;
    const results: CheckResult[] = [];

    for (const [index, product] of products.entries()) {
      if (index > 0) {
        await sleep(this.options.crawlDelayMs, signal);
      }
      if (signal?.aborted) {
        logger.info('Price check sweep cancelled', { checked: results.length, total: products.length });
        break;
      }

      results.push(await this.checkSingleProduct(product, signal));
    }

    await this.options.historyStore.flush();
    return results;
  }

  getPriceHistory(): PriceHistory {
    return this.options.historyStore.snapshot();
  }

  // Monitoring control

  isRunning(): boolean {
    return this.loop !== null;
  }

  startMonitoring(): void {
    if (this.loop) {
      throw new AlreadyRunningError();
    }

    const loop: MonitorLoop = { controller: new AbortController(), done: Promise.resolve() };
    this.loop = loop;
    loop.done = this.runLoop(loop);

    logger.info('Price monitoring started', {
      products: this.config.products.length,
      checkIntervalMinutes: this.config.check_interval_minutes,
    });
  }

  /**
   * Stop the loop and wait for it to finish. No sweep is in flight once this resolves.
   */
  async stopMonitoring(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      throw new NotRunningError();
    }

    this.loop = null;
    loop.controller.abort();
    await loop.done;

    logger.info('Price monitoring stopped');
  }

  getStatus(): MonitorStatus {
    const isRunning = this.isRunning();
    return {
      is_running: isRunning,
      last_check: isRunning ? this.now().toISOString() : null,
      total_products: this.config.products.length,
      check_interval_minutes: this.config.check_interval_minutes,
    };
  }

  private async runLoop(loop: MonitorLoop): Promise<void> {
    const { signal } = loop.controller;
    logger.info('Starting monitoring loop');

    try {
      while (!signal.aborted) {
        await this.checkAllProducts(signal);
        if (signal.aborted) break;

        // Read at each cycle: an interval change applies after the current wait
        const waitMinutes = this.config.check_interval_minutes;
        logger.info(`Waiting ${waitMinutes} minutes until next check...`);
        await sleep(waitMinutes * 60 * 1000, signal);
      }
      logger.info('Monitoring loop cancelled');
    } catch (error) {
      logger.error('Error in monitoring loop, monitoring stopped', { error: errorMessage(error) });
      reportError(error, { component: 'monitoring-loop' });
    } finally {
      if (this.loop === loop) {
        this.loop = null;
      }
    }
  }

  private async sendAlert(product: Product, currentPrice: number): Promise<void> {
    logger.info(`Price alert triggered for ${product.name}!`);

    try {
      const result = await this.options.notifier.notify(
        {
          productName: product.name,
          currentPrice,
          targetPrice: product.target_price,
          url: product.url,
        },
        this.config
      );
      if (!result.success) {
        logger.warn('Price alert was not delivered', { product: product.name, error: result.error });
      }
    } catch (error) {
      logger.error('Notification failed', { product: product.name, error: errorMessage(error) });
    }
  }

  private productAt(products: Product[], index: number): Product {
    if (!Number.isInteger(index) || index < 0 || index >= products.length) {
      throw new NotFoundError();
    }
    return products[index];
  }

  /**
   * Copy the product list, mutate the copy, validate and persist the whole
   * config, then swap the live reference.
   */
  private mutateProducts<T>(
    mutate: (products: Product[]) => T
  ): Promise<{ config: MonitorConfig; value: T }> {
    return this.enqueueWrite(async () => {
      const draft = structuredClone(this.config);
      const value = mutate(draft.products);
      this.config = await this.options.configStore.save(draft);
      return { config: this.config, value };
    });
  }

  /**
   * Serialize config writes so two concurrent mutations cannot both start
   * from the same snapshot.
   */
  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // Failures reach the caller through `run`; the queue only needs to settle
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
