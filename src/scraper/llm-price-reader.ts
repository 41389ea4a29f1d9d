import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { logger } from '../utils/logger.js';
import { parsePrice } from './price-parser.js';

const MAX_PAGE_TEXT = 15000;

/**
 * Strip markdown code fences the model sometimes wraps around JSON
 */
function stripCodeFence(text: string): string {
  let body = text.trim();
  if (body.startsWith('```json')) {
    body = body.slice(7);
  } else if (body.startsWith('```')) {
    body = body.slice(3);
  }
  if (body.endsWith('```')) {
    body = body.slice(0, -3);
  }
  return body.trim();
}

/**
 * Read a `{"price": ...}` answer. Non-positive or unparseable prices are null.
 */
export function parseLlmPriceAnswer(text: string): number | null {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch {
    logger.debug('LLM answer is not JSON', { answer: text.slice(0, 200) });
    return null;
  }

  if (typeof data !== 'object' || data === null || !('price' in data)) return null;

  const { price } = data;
  const value = typeof price === 'number' ? price : typeof price === 'string' ? parsePrice(price) : null;
  return value !== null && value > 0 ? value : null;
}

/**
 * LLM fallback for pages the deterministic strategies cannot read (Gemini)
 */
export class LlmPriceReader {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
  }

  async readPrice(url: string, pageText: string): Promise<number | null> {
    const prompt = `Extract the current selling price of the product on this page.

IMPORTANT: Return ONLY JSON of the form {"price": "<price as shown>"}, no markdown, no explanations.
Use {"price": null} if the page shows no price.

Page URL: ${url}

Page text:
${pageText.slice(0, MAX_PAGE_TEXT)}`;

    const result = await this.model.generateContent(prompt);
    const price = parseLlmPriceAnswer(result.response.text());

    logger.debug('LLM price answer', { url, price });
    return price;
  }
}
