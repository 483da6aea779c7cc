import { z } from 'zod';
import { cfg } from '../../config.js';
import { createLogger, errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { withTimeout } from '../pricing/cancellation.js';

export interface BarcodeProduct {
  upc: string;
  title: string;
  brand: string;
  category: string;
  source: 'upcitemdb' | 'openfoodfacts';
}

export interface BarcodeLookupProvider {
  lookup(code: string): Promise<BarcodeProduct | null>;
}

const UPCITEMDB_URL = 'https://api.upcitemdb.com/prod/trial/lookup';
const OPEN_FOOD_FACTS_URL = 'https://world.openfoodfacts.org/api/v0/product';

const UpcItemDbResponse = z.object({
  code: z.string().optional(),
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        brand: z.string().default(''),
        category: z.string().default(''),
      })
    )
    .default([]),
});

const OpenFoodFactsResponse = z.object({
  status: z.number(),
  product: z
    .object({
      product_name: z.string().default(''),
      brands: z.string().default(''),
      categories: z.string().default(''),
    })
    .optional(),
});

export function normalizeBarcode(code: string): string | null {
  const digits = code.replace(/[\s-]/g, '');
  return /^\d{8,14}$/.test(digits) ? digits : null;
}

export interface HttpBarcodeLookupOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * UPCitemdb trial endpoint first, Open Food Facts second. Each call is
 * bounded by the barcode timeout; failures fall through to the next service.
 */
export class HttpBarcodeLookup implements BarcodeLookupProvider {
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: HttpBarcodeLookupOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? cfg.barcode.timeoutMs;
    this.log = options.logger ?? createLogger('barcode');
  }

  private async getJson(label: string, url: string): Promise<unknown> {
    return withTimeout(this.timeoutMs, label, async (signal) => {
      const response = await fetch(url, { headers: { Accept: 'application/json' }, signal });
      if (!response.ok) {
        throw new Error(`${label} responded ${response.status}`);
      }
      return response.json();
    });
  }

  private async fromUpcItemDb(upc: string): Promise<BarcodeProduct | null> {
    const parsed = UpcItemDbResponse.safeParse(
      await this.getJson('upcitemdb', `${UPCITEMDB_URL}?upc=${encodeURIComponent(upc)}`)
    );
    if (!parsed.success) return null;
    const item = parsed.data.items.find((candidate) => candidate.title.trim());
    if (!item) return null;
    return {
      upc,
      title: item.title.trim(),
      brand: item.brand.trim(),
      category: item.category.trim(),
      source: 'upcitemdb',
    };
  }

  private async fromOpenFoodFacts(upc: string): Promise<BarcodeProduct | null> {
    const parsed = OpenFoodFactsResponse.safeParse(
      await this.getJson('openfoodfacts', `${OPEN_FOOD_FACTS_URL}/${encodeURIComponent(upc)}.json`)
    );
    if (!parsed.success || parsed.data.status !== 1 || !parsed.data.product) return null;
    const { product } = parsed.data;
    if (!product.product_name.trim()) return null;
    return {
      upc,
      title: product.product_name.trim(),
      // "Brand A, Brand B" → first listed
      brand: product.brands.split(',')[0].trim(),
      category: product.categories.split(',')[0].trim(),
      source: 'openfoodfacts',
    };
  }

  async lookup(code: string): Promise<BarcodeProduct | null> {
    const upc = normalizeBarcode(code);
    if (!upc) {
      this.log.warn('Ignoring malformed barcode', { code });
      return null;
    }

    const services: [string, (value: string) => Promise<BarcodeProduct | null>][] = [
      ['upcitemdb', (value) => this.fromUpcItemDb(value)],
      ['openfoodfacts', (value) => this.fromOpenFoodFacts(value)],
    ];

    for (const [name, lookup] of services) {
      try {
        const product = await lookup(upc);
        if (product) {
          this.log.info(`Barcode ${upc} found via ${name}`);
          return product;
        }
      } catch (err) {
        this.log.warn(`Barcode lookup via ${name} failed`, { error: errorMessage(err) });
      }
    }

    this.log.info(`Barcode ${upc} not found`);
    return null;
  }
}
