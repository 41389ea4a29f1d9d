/**
 * Parse a price from display text such as "$1,299.99", "NZ$ 49.00" or "1.234,56 €".
 * When the text holds several prices the first one is used.
 * Returns null when no number can be recovered.
 */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;

  // First numeric token only: "Was $29.99 Now $19.99" must not merge into one number
  const token = /\d[\d.,]*/.exec(text);
  if (!token) return null;

  const cleaned = token[0].replace(/[.,]+$/, '');

  // Determine format based on comma/period positions
  let normalized: string;

  if (cleaned.includes(',') && cleaned.includes('.')) {
    if (cleaned.lastIndexOf(',') < cleaned.lastIndexOf('.')) {
      // 1,234.56
      normalized = cleaned.replace(/,/g, '');
    } else {
      // 1.234,56
      normalized = cleaned.replace(/\./g, '').replace(',', '.');
    }
  } else if (cleaned.includes(',')) {
    const parts = cleaned.split(',');

    if (parts.length === 2 && parts[1].length === 2) {
      // 2,99 (decimal comma)
      normalized = cleaned.replace(',', '.');
    } else {
      // 2,399 or 1,234,567 (thousands separators)
      normalized = cleaned.replace(/,/g, '');
    }
  } else {
    normalized = cleaned;
  }

  const price = parseFloat(normalized);
  return isNaN(price) ? null : price;
}
