/**
 * Identification aggregation
 *
 * Merges the vision provider's guess with classified text signals into one
 * canonical Identification. Weak or missing guesses are never embellished:
 * we fall back to what the text actually says, at a deliberately low confidence.
 */

import { detectBrand } from './brand-vocabulary.js';
import { dominantSignal } from './text-signals.js';
import { ITEM_CATEGORIES } from './types.js';
import type { Identification, ItemCategory, RawIdentificationGuess, TextSignals } from './types.js';

export const MIN_VISION_CONFIDENCE = 0.6;
export const TEXT_ONLY_CONFIDENCE = 0.4;
export const CATEGORY_ONLY_CONFIDENCE = 0.2;

const UNKNOWN: Identification = {
  productName: 'Unknown Item',
  brand: '',
  productLine: '',
  variant: '',
  styleCode: '',
  colorway: '',
  size: '',
  category: 'other',
  method: 'category-based',
  confidence: 0,
  upc: null,
};

export const UNKNOWN_IDENTIFICATION: Identification = Object.freeze(UNKNOWN);

export function inputErrorIdentification(reason: string): Identification {
  const identification: Identification = { ...UNKNOWN_IDENTIFICATION, productName: 'Input Error', error: reason };
  return Object.freeze(identification);
}

// Checked in order; first hit wins
const CATEGORY_KEYWORDS: { category: ItemCategory; keywords: string[] }[] = [
  { category: 'sneakers', keywords: ['sneaker', 'shoe', 'jordan', 'air max', 'air force', 'yeezy', 'dunk', 'trainer', 'footwear', 'boot'] },
  { category: 'electronics', keywords: ['electronic', 'phone', 'iphone', 'laptop', 'tablet', 'ipad', 'camera', 'headphone', 'console', 'gaming', 'watch series', 'speaker'] },
  { category: 'clothing', keywords: ['clothing', 'shirt', 'hoodie', 'jacket', 'jeans', 'pants', 'dress', 'sweater', 'coat', 'shorts', 'apparel', 'outerwear'] },
  { category: 'accessories', keywords: ['accessor', 'bag', 'handbag', 'wallet', 'belt', 'hat', 'cap', 'sunglasses', 'jewelry', 'watch', 'scarf'] },
  { category: 'toys', keywords: ['toy', 'lego', 'hot wheels', 'action figure', 'doll', 'puzzle', 'board game'] },
  { category: 'collectibles', keywords: ['collectible', 'funko', 'trading card', 'pokemon', 'vintage', 'antique', 'coin', 'figurine'] },
  { category: 'books', keywords: ['book', 'novel', 'hardcover', 'paperback', 'textbook'] },
  { category: 'sports', keywords: ['sport', 'golf', 'bike', 'fitness', 'baseball', 'football', 'basketball', 'tennis', 'outdoor'] },
  { category: 'home', keywords: ['home', 'kitchen', 'mug', 'cup', 'pyrex', 'decor', 'lamp', 'garden', 'furniture', 'cookware'] },
];

export function parseCategory(value: string | undefined | null): ItemCategory | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  const exact = ITEM_CATEGORIES.find((category) => category === normalized);
  if (exact) return exact;
  return null;
}

/**
 * Keyword heuristic from free text to the closed category set. An explicit
 * hint that already names a category wins.
 */
export function inferCategory(text: string, hint?: string | null): ItemCategory {
  const hinted = parseCategory(hint);
  if (hinted) return hinted;

  // keywords match at word starts: "shoe" hits "shoes", "hat" misses "that"
  const haystack = ` ${`${hint ?? ''} ${text}`.toLowerCase().replace(/[^a-z0-9]+/g, ' ')} `;
  for (const { category, keywords } of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => haystack.includes(` ${keyword}`))) {
      return category;
    }
  }
  return 'other';
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function mentionsUnknown(value: string | undefined): boolean {
  return typeof value === 'string' && value.toLowerCase().includes('unknown');
}

export function isUsableGuess(guess: RawIdentificationGuess | null | undefined): guess is RawIdentificationGuess {
  if (!guess) return false;
  if (mentionsUnknown(guess.productName) || mentionsUnknown(guess.brand)) return false;
  if (typeof guess.confidence !== 'number' || guess.confidence < MIN_VISION_CONFIDENCE) return false;
  return true;
}

function hasAnySignal(signals: TextSignals): boolean {
  return (
    signals.brands.length > 0 ||
    signals.sizes.length > 0 ||
    signals.styleCodes.length > 0 ||
    signals.barcodes.length > 0
  );
}

function fromGuess(guess: RawIdentificationGuess, signals: TextSignals, categoryHint?: string | null): Identification {
  const productName = (guess.productName ?? '').trim();
  const category =
    parseCategory(guess.category) ?? inferCategory(`${guess.category ?? ''} ${productName}`, categoryHint);

  const identification: Identification = {
    productName,
    brand: (guess.brand ?? '').trim(),
    productLine: (guess.productLine ?? '').trim(),
    variant: (guess.variant ?? '').trim(),
    styleCode: (guess.styleCode ?? '').trim(),
    colorway: (guess.colorway ?? '').trim(),
    size: (guess.size ?? '').trim(),
    category,
    method: guess.method ?? (hasAnySignal(signals) ? 'visual-and-text' : 'visual-only'),
    confidence: clamp01(guess.confidence ?? 0),
    upc: signals.barcodes[0] ?? null,
  };
  return Object.freeze(identification);
}

function fromText(signals: TextSignals, categoryHint?: string | null): Identification {
  const brandSnippet = dominantSignal(signals.brands);
  const brand = brandSnippet ? detectBrand(brandSnippet)?.name ?? brandSnippet : '';
  const size = dominantSignal(signals.sizes) ?? '';
  const styleCode = dominantSignal(signals.styleCodes) ?? '';
  const upc = signals.barcodes[0] ?? null;

  if (!brand && !size && !styleCode && !upc) {
    const category = inferCategory('', categoryHint);
    if (category === 'other') return UNKNOWN_IDENTIFICATION;
    const categoryOnly: Identification = { ...UNKNOWN_IDENTIFICATION, category, confidence: CATEGORY_ONLY_CONFIDENCE };
    return Object.freeze(categoryOnly);
  }

  const productName = [brand, styleCode].filter(Boolean).join(' ') || 'Unknown Item';
  const identification: Identification = {
    productName,
    brand,
    productLine: '',
    variant: '',
    styleCode,
    colorway: '',
    size,
    category: inferCategory(brandSnippet ?? '', categoryHint),
    method: 'text-only',
    confidence: TEXT_ONLY_CONFIDENCE,
    upc,
  };
  return Object.freeze(identification);
}

/**
 * Build the canonical Identification for one analysis run.
 *
 * The vision guess is taken verbatim when it is present, does not claim to be
 * "unknown" and carries confidence ≥ 0.6; otherwise the result is text-only at
 * confidence 0.4 (or category-based / unknown when the text is silent too).
 */
export function aggregateIdentification(
  guess: RawIdentificationGuess | null | undefined,
  signals: TextSignals,
  categoryHint?: string | null
): Identification {
  if (isUsableGuess(guess)) {
    return fromGuess(guess, signals, categoryHint);
  }
  return fromText(signals, categoryHint);
}
