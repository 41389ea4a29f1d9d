import { ExtractionSource } from '../types/index.js';
import { parsePrice } from './price-parser.js';

export interface SelectorMatch {
  price: number;
  source: ExtractionSource;
  strategy: string;
}

// Retail price blocks, most specific first
const RETAIL_PRICE_SELECTORS = [
  '#corePrice_feature_div .a-price .a-offscreen',
  '#corePriceDisplay_desktop_feature_div .a-price .a-offscreen',
  '#priceblock_dealprice',
  '#priceblock_ourprice',
  '#price_inside_buybox',
  '.a-price .a-offscreen',
];

const COMMON_PRICE_SELECTORS = [
  '[data-price]',
  '.product-price',
  '.sale-price',
  '.price-current',
  '.price-now',
  '.selling-price',
  '.final-price',
  '.special-price',
  '.price',
];

const HTML_PRICE_PATTERNS = [
  /"priceAmount":\s*([0-9]+(?:\.[0-9]+)?)/,
  /\$\s?([0-9][0-9,]*(?:\.[0-9]{1,2})?)/,
];

function positive(price: number | null): number | null {
  return price !== null && price > 0 ? price : null;
}

/**
 * Recursively find a Product node in JSON-LD
 */
function findProductInJsonLd(data: unknown): Record<string, unknown> | null {
  if (!data || typeof data !== 'object') return null;

  if (Array.isArray(data)) {
    for (const item of data) {
      const result = findProductInJsonLd(item);
      if (result) return result;
    }
    return null;
  }

  const obj = data as Record<string, unknown>;
  const type = obj['@type'];
  if (type === 'Product' || (Array.isArray(type) && type.includes('Product'))) {
    return obj;
  }

  for (const value of Object.values(obj)) {
    const result = findProductInJsonLd(value);
    if (result) return result;
  }

  return null;
}

function priceFromOffer(offers: unknown): number | null {
  const offer: unknown = Array.isArray(offers) ? offers[0] : offers;
  if (!offer || typeof offer !== 'object') return null;

  const { price, lowPrice } = offer as Record<string, unknown>;
  const value = price ?? lowPrice;
  if (typeof value === 'number') return positive(value);
  if (typeof value === 'string') return positive(parsePrice(value));
  return null;
}

function extractFromJsonLd(document: Document): number | null {
  const scripts = document.querySelectorAll('script[type="application/ld+json"]');

  for (const script of Array.from(scripts)) {
    let data: unknown;
    try {
      data = JSON.parse(script.textContent || '');
    } catch {
      continue;
    }

    const product = findProductInJsonLd(data);
    const price = product ? priceFromOffer(product.offers) : null;
    if (price !== null) return price;
  }

  return null;
}

function extractFromMicrodata(document: Document): number | null {
  const priceElement = document.querySelector('[itemprop="price"]');
  if (priceElement) {
    const price = positive(parsePrice(priceElement.getAttribute('content') || priceElement.textContent));
    if (price !== null) return price;
  }

  const metaPrice = document.querySelector(
    'meta[property="product:price:amount"], meta[property="og:price:amount"]'
  );
  return metaPrice ? positive(parsePrice(metaPrice.getAttribute('content'))) : null;
}

function extractFromSelectors(document: Document, selectors: string[]): number | null {
  for (const selector of selectors) {
    for (const element of Array.from(document.querySelectorAll(selector))) {
      const price = positive(parsePrice(element.getAttribute('data-price') || element.textContent));
      if (price !== null) return price;
    }
  }
  return null;
}

/**
 * Split price markup: <span class="a-price-whole">1,299<span>.</span></span><span class="a-price-fraction">99</span>
 */
function extractFromSplitPrice(document: Document): number | null {
  const whole = document.querySelector('.a-price-whole');
  if (!whole) return null;

  const wholeDigits = (whole.textContent || '').replace(/[^\d]/g, '');
  if (!wholeDigits) return null;

  const fraction = whole.parentElement?.querySelector('.a-price-fraction')?.textContent?.replace(/[^\d]/g, '');
  return positive(parseFloat(fraction ? `${wholeDigits}.${fraction}` : wholeDigits));
}

function extractFromPatterns(html: string): number | null {
  for (const pattern of HTML_PRICE_PATTERNS) {
    const match = pattern.exec(html);
    const price = positive(parsePrice(match?.[1]));
    if (price !== null) return price;
  }
  return null;
}

/**
 * Deterministic price extraction, structured data first, then markup heuristics.
 */
export function extractPriceFromDocument(document: Document, html: string): SelectorMatch | null {
  const strategies: Array<[string, ExtractionSource, () => number | null]> = [
    ['json-ld', 'structured-data', () => extractFromJsonLd(document)],
    ['microdata', 'structured-data', () => extractFromMicrodata(document)],
    ['retail-selectors', 'html', () => extractFromSelectors(document, RETAIL_PRICE_SELECTORS)],
    ['split-price', 'html', () => extractFromSplitPrice(document)],
    ['common-selectors', 'html', () => extractFromSelectors(document, COMMON_PRICE_SELECTORS)],
    ['patterns', 'html', () => extractFromPatterns(html)],
  ];

  for (const [strategy, source, run] of strategies) {
    const price = run();
    if (price !== null) {
      return { price, source, strategy };
    }
  }

  return null;
}
