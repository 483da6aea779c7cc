/**
 * eBay sold listings scraped through SearchAPI.io (`engine=ebay` with the sold
 * and completed filters). Secondary source behind the Finding API.
 */

import { z } from 'zod';
import { cfg } from '../../../config.js';
import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import type { SoldListing, SoldListingQuery } from '../types.js';
import { conditionGroup, parsePrice } from './types.js';
import type { ConditionGroup, SoldListingSource } from './types.js';

const ENDPOINT = 'https://www.searchapi.io/api/v1/search';

// Conservative 1 call/second
const MIN_CALL_INTERVAL_MS = 1000;

const ITEM_CONDITION: Record<ConditionGroup, string> = {
  new: '1000',
  used: '3000',
  parts: '7000',
};

const SearchApiItem = z.object({
  title: z.string().optional(),
  price: z
    .union([
      z.number(),
      z.string(),
      z.object({
        value: z.union([z.number(), z.string()]).optional(),
        raw: z.string().optional(),
      }),
    ])
    .optional(),
  extracted_price: z.number().optional(),
  condition: z.string().optional(),
  sold_date: z.string().optional(),
  bids: z.number().optional(),
  buying_format: z.string().optional(),
  watchers: z.number().optional(),
  shipping: z.union([z.string(), z.number()]).optional(),
});

type SearchApiItem = z.infer<typeof SearchApiItem>;

const SearchApiResponse = z.object({
  error: z.string().optional(),
  organic_results: z.array(z.unknown()).optional(),
});

export interface SearchApiOptions {
  apiKey?: string;
  minIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

function itemPrice(item: SearchApiItem): number | null {
  if (item.extracted_price !== undefined) return parsePrice(item.extracted_price);
  const { price } = item;
  if (price === undefined) return null;
  if (typeof price === 'number' || typeof price === 'string') return parsePrice(price);
  return parsePrice(price.value ?? price.raw);
}

function itemShipping(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) && value >= 0 ? value : undefined;
  if (/free/i.test(value)) return 0;
  return parsePrice(value) ?? undefined;
}

/** "Sold  Oct 3, 2024" → Date; null when there is no usable date. */
export function parseSoldDate(raw: string | undefined): Date | null {
  if (!raw) return null;
  const ms = Date.parse(raw.replace(/^\s*sold\s*/i, '').trim());
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Convert one organic result. Results without a sold date are stamped with
 * `fetchedAt`: the engine returns sold items newest first.
 */
export function toSoldListing(item: SearchApiItem, fetchedAt: Date): SoldListing | null {
  const price = itemPrice(item);
  if (price === null) return null;

  const listing: SoldListing = {
    title: (item.title ?? '').trim(),
    price,
    conditionLabel: item.condition ?? '',
    soldDate: parseSoldDate(item.sold_date) ?? fetchedAt,
    isAuction: item.bids !== undefined || /auction/i.test(item.buying_format ?? ''),
    source: 'searchapi',
  };
  const shipping = itemShipping(item.shipping);
  if (shipping !== undefined) listing.shippingCost = shipping;
  if (item.watchers !== undefined && item.watchers >= 0) listing.watcherCount = item.watchers;
  return listing;
}

function abortedError(): Error {
  return new Error('SearchAPI request aborted');
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.reject(abortedError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortedError());
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class SearchApiSource implements SoldListingSource {
  readonly name = 'searchapi';
  private readonly apiKey: string;
  private readonly minIntervalMs: number;
  private readonly log: Logger;
  private readonly now: () => number;
  // earliest time the next call may go out; each caller reserves its slot before waiting
  private nextSlot = 0;

  constructor(options: SearchApiOptions = {}) {
    this.apiKey = options.apiKey ?? cfg.searchApi.key;
    this.minIntervalMs = options.minIntervalMs ?? MIN_CALL_INTERVAL_MS;
    this.log = options.logger ?? createLogger('searchapi');
    this.now = options.now ?? Date.now;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  buildUrl(query: SoldListingQuery): string {
    const params = new URLSearchParams({
      engine: 'ebay',
      ebay_domain: 'ebay.com',
      q: query.keywords,
      _show_sold: '1',
      LH_Complete: '1',
      LH_Sold: '1',
      LH_ItemCondition: ITEM_CONDITION[conditionGroup(query.conditionGrade)],
    });
    return `${ENDPOINT}?${params.toString()}`;
  }

  private rateLimitDelay(signal: AbortSignal): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    return sleep(slot - now, signal);
  }

  async search(query: SoldListingQuery, signal: AbortSignal): Promise<SoldListing[]> {
    if (!this.isConfigured()) {
      throw new Error('SEARCHAPI_KEY is not configured');
    }

    await this.rateLimitDelay(signal);

    this.log.info(`Searching sold items for "${query.keywords}"`);
    const response = await fetch(this.buildUrl(query), {
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new Error(`SearchAPI error ${response.status}: ${errorText.slice(0, 200)}`);
    }

    const parsed = SearchApiResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Malformed SearchAPI response');
    }
    if (parsed.data.error) {
      throw new Error(`SearchAPI error: ${parsed.data.error}`);
    }

    const fetchedAt = new Date(this.now());
    const rawItems = parsed.data.organic_results ?? [];
    const listings: SoldListing[] = [];
    for (const raw of rawItems) {
      const item = SearchApiItem.safeParse(raw);
      if (!item.success) continue;
      const listing = toSoldListing(item.data, fetchedAt);
      if (listing) listings.push(listing);
    }

    this.log.info(`Parsed ${listings.length} of ${rawItems.length} sold items`);
    return listings;
  }
}
