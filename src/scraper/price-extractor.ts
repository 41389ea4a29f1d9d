import { JSDOM } from 'jsdom';
import { ExtractionResult, PriceExtractionPort } from '../types/index.js';
import { PriceExtractionError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { extractPriceFromDocument } from './price-selectors.js';

export interface PageSource {
  fetch(url: string, signal?: AbortSignal): Promise<string>;
}

export interface LlmPriceSource {
  readPrice(url: string, pageText: string): Promise<number | null>;
}

export interface PriceExtractorOptions {
  maxRetries: number;
  maxBackoffMs: number;
}

type ExtractionSuccess = Extract<ExtractionResult, { success: true }>;

/**
 * Price extraction from product pages using multiple strategies
 *
 * Each attempt fetches the page, tries the deterministic strategies and falls
 * back to the LLM when one is configured. Failed attempts are retried with
 * exponential backoff; the result is always an ExtractionResult, never a
 * rejection.
 */
export class PriceExtractor implements PriceExtractionPort {
  constructor(
    private readonly pages: PageSource,
    private readonly llm: LlmPriceSource | null,
    private readonly options: PriceExtractorOptions
  ) {}

  async extract(url: string, signal?: AbortSignal): Promise<ExtractionResult> {
    let lastReason = 'No attempts made';

    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      if (signal?.aborted) break;

      try {
        const result = await this.extractOnce(url, signal);
        logger.info('Price extracted', { url, price: result.price, source: result.source, attempt });
        return result;
      } catch (error) {
        lastReason = errorMessage(error);
        const retryable = !(error instanceof PriceExtractionError) || error.retryable;

        if (!retryable || attempt >= this.options.maxRetries) {
          logger.warn('Price extraction attempt failed', { url, attempt, error: lastReason });
          break;
        }

        // Exponential backoff: 2s, 4s, 8s... capped
        const delay = Math.min(Math.pow(2, attempt) * 1000, this.options.maxBackoffMs);
        logger.warn('Price extraction attempt failed, retrying', {
          url,
          attempt,
          maxRetries: this.options.maxRetries,
          delayMs: delay,
          error: lastReason,
        });
        await sleep(delay, signal);
      }
    }

    if (signal?.aborted) {
      return { success: false, reason: 'aborted' };
    }

    logger.error('Failed to extract price', { url, reason: lastReason });
    return { success: false, reason: lastReason };
  }

  private async extractOnce(url: string, signal?: AbortSignal): Promise<ExtractionSuccess> {
    const html = await this.pages.fetch(url, signal);
    const document = new JSDOM(html).window.document;

    const match = extractPriceFromDocument(document, html);
    if (match) {
      logger.debug('Deterministic extraction successful', { url, strategy: match.strategy });
      return { success: true, price: match.price, source: match.source };
    }

    if (this.llm) {
      logger.info('Falling back to LLM extraction', { url });
      try {
        const price = await this.llm.readPrice(url, document.body.textContent ?? '');
        if (price !== null) {
          return { success: true, price, source: 'llm' };
        }
      } catch (error) {
        logger.warn('LLM extraction failed', { url, error: errorMessage(error) });
      }
    }

    throw new PriceExtractionError('No price found on page');
  }
}
