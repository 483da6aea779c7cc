/**
 * Brand vocabulary
 *
 * Known resale brands with their price premium multipliers.
 * Data: src/data/brands.json (order matters: sub-brands such as Jordan are
 * listed ahead of their parent brand so free-text detection prefers them).
 */

import brandData from '../../data/brands.json';

export interface BrandEntry {
  name: string;
  multiplier: number;
}

const BRANDS: readonly BrandEntry[] = Object.freeze(
  brandData.brands.map((entry) => Object.freeze({ name: entry.name, multiplier: entry.multiplier }))
);

export function normalizeBrandName(brand: string): string {
  return brand.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

/**
 * First vocabulary brand contained in the text (case-insensitive), or null.
 */
export function detectBrand(text: string): BrandEntry | null {
  const haystack = ` ${normalizeBrandName(text)} `;
  if (!haystack.trim()) return null;
  for (const entry of BRANDS) {
    if (haystack.includes(` ${normalizeBrandName(entry.name)} `)) {
      return entry;
    }
  }
  return null;
}

/**
 * Premium multiplier for a brand; 1.0 for anything not in the vocabulary.
 */
export function brandMultiplier(brand: string): number {
  return detectBrand(brand)?.multiplier ?? 1.0;
}
