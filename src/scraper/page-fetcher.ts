import axios, { AxiosInstance } from 'axios';
import { PriceExtractionError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PageFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

// Markers of robot-check interstitials served instead of the product page
const BLOCK_MARKERS = [
  'Enter the characters you see below',
  'api-services-support@amazon.com',
  'g-recaptcha',
  'cf-challenge',
];

/**
 * Fetches product pages over HTTP with browser-like headers.
 * Failures are raised as PriceExtractionError tagged retryable or not.
 */
export class PageFetcher {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(options: PageFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.client = axios.create({
      timeout: options.timeoutMs,
      responseType: 'text',
      maxRedirects: 5,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        DNT: '1',
        'Upgrade-Insecure-Requests': '1',
      },
    });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    let html: string;
    try {
      const response = await this.client.get<string>(url, { signal });
      html = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      throw this.toExtractionError(error);
    }

    if (BLOCK_MARKERS.some(marker => html.includes(marker))) {
      throw new PriceExtractionError('Site blocked the request with a robot check page');
    }

    logger.debug('Page fetched', { url, htmlLength: html.length });
    return html;
  }

  private toExtractionError(error: unknown): PriceExtractionError {
    if (axios.isCancel(error)) {
      return new PriceExtractionError('Request aborted', false);
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        // 4xx are permanent except timeouts and rate limiting
        const retryable = status >= 500 || status === 408 || status === 429;
        return new PriceExtractionError(`Request failed with status ${status}`, retryable);
      }

      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new PriceExtractionError(`Request timeout after ${this.timeoutMs}ms`);
      }

      return new PriceExtractionError(error.message || 'Network error');
    }

    return new PriceExtractionError(errorMessage(error));
  }
}
