import { detectBrand } from './brand-vocabulary.js';
import type { TextSignals } from './types.js';

// 2-4 alphanumerics, optional dash, 3-6 digits (e.g. "CW2288-111", "DD1391100")
const STYLE_CODE_RE = /\b[A-Za-z0-9]{2,4}-?\d{3,6}\b/;
const BARCODE_RE = /^\d{8,14}$/;
const PRICE_RE = /(?:[$£€]|\bUSD\s?)\s?\d+(?:[.,]\d{2})?/i;

const SIZE_PATTERNS: RegExp[] = [
  /\b(?:size|sz)\b\.?\s*[:#]?\s*[\w.]+/i,
  /\b(?:us|uk|eu|mens?|womens?|[mw])\s?\d{1,2}(?:\.5)?\b/i,
  /\b(?:xxs|xs|s|m|l|xl|xxl|xxxl|[2-5]xl)\b(?![-\w])/i,
  /\b(?:small|medium|large|x-large|xx-large)\b/i,
  /\b\d{2}\s?[xX]\s?\d{2}\b/,                   // waist x inseam, "32x30"
  /\b(?:waist|inseam)\b/i,
];

// Bare numeric size only when the whole snippet is a number like "10" or "10.5"
const BARE_NUMERIC_SIZE_RE = /^\d{1,2}(?:\.5)?$/;

function isStyleCode(text: string): boolean {
  const match = STYLE_CODE_RE.exec(text);
  if (!match) return false;
  // A pure 3-6 digit number is not a style code; it needs a letter prefix or a dash
  const code = match[0];
  return /[A-Za-z]/.test(code) || code.includes('-');
}

function isSize(text: string): boolean {
  if (BARE_NUMERIC_SIZE_RE.test(text)) return true;
  return SIZE_PATTERNS.some((re) => re.test(text));
}

/**
 * Sort recognized text snippets into semantic buckets. A snippet may land in
 * several buckets; order within a bucket follows input order.
 */
export function classifyTextSignals(texts: readonly string[]): TextSignals {
  const signals: TextSignals = { brands: [], sizes: [], styleCodes: [], barcodes: [], prices: [] };

  for (const raw of texts) {
    if (typeof raw !== 'string') continue;
    const text = raw.trim();
    if (!text) continue;

    const brand = detectBrand(text);
    if (brand) signals.brands.push(text);

    if (BARCODE_RE.test(text)) {
      signals.barcodes.push(text);
    } else if (isStyleCode(text)) {
      signals.styleCodes.push(text);
    }

    if (isSize(text)) signals.sizes.push(text);
    if (PRICE_RE.test(text)) signals.prices.push(text);
  }

  return signals;
}

/**
 * Most frequent entry of a bucket; ties go to whichever appeared first.
 */
export function dominantSignal(values: readonly string[]): string | null {
  if (values.length === 0) return null;
  const counts = new Map<string, number>();
  for (const value of values) {
    const key = value.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  let best = values[0];
  let bestCount = 0;
  for (const value of values) {
    const count = counts.get(value.toLowerCase()) ?? 0;
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
