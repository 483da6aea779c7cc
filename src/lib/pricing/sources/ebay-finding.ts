import { z } from 'zod';
import { cfg } from '../../../config.js';
import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import type { SoldListing, SoldListingQuery } from '../types.js';
import { conditionGroup, parsePrice } from './types.js';
import type { ConditionGroup, SoldListingSource } from './types.js';

const PRODUCTION_URL = 'https://svcs.ebay.com/services/search/FindingService/v1';
const SANDBOX_URL = 'https://svcs.sandbox.ebay.com/services/search/FindingService/v1';

const CONDITION_IDS: Record<ConditionGroup, string[]> = {
  new: ['1000', '1500', '1750'],
  used: ['2000', '2500', '3000', '4000', '5000', '6000'],
  parts: ['7000'],
};

// Finding API wraps every scalar in a single-element array
const first = <T extends z.ZodTypeAny>(schema: T) => z.array(schema).min(1).optional();

const FindingItem = z.object({
  title: first(z.string()),
  sellingStatus: first(
    z.object({
      currentPrice: first(z.object({ __value__: z.string() })),
      sellingState: first(z.string()),
    })
  ),
  condition: first(z.object({ conditionDisplayName: first(z.string()) })),
  listingInfo: first(
    z.object({
      endTime: first(z.string()),
      listingType: first(z.string()),
      watchCount: first(z.string()),
    })
  ),
  shippingInfo: first(z.object({ shippingServiceCost: first(z.object({ __value__: z.string() })) })),
});

type FindingItem = z.infer<typeof FindingItem>;

const FindingResponse = z.object({
  findCompletedItemsResponse: z
    .array(
      z.object({
        ack: first(z.string()),
        searchResult: first(z.object({ item: z.array(z.unknown()).optional() })),
      })
    )
    .min(1),
});

export interface EbayFindingOptions {
  appId?: string;
  sandbox?: boolean;
  logger?: Logger;
}

/** Convert one Finding API item; null when it lacks a positive price or an end time. */
export function toSoldListing(item: FindingItem): SoldListing | null {
  const price = parsePrice(item.sellingStatus?.[0].currentPrice?.[0].__value__);
  if (price === null) return null;

  const endTime = item.listingInfo?.[0].endTime?.[0];
  const soldAt = endTime ? Date.parse(endTime) : NaN;
  if (Number.isNaN(soldAt)) return null;

  const state = item.sellingStatus?.[0].sellingState?.[0];
  if (state && state !== 'EndedWithSales') return null;

  const listingType = item.listingInfo?.[0].listingType?.[0] ?? '';
  const watchers = Number(item.listingInfo?.[0].watchCount?.[0]);
  const shipping = Number(item.shippingInfo?.[0].shippingServiceCost?.[0].__value__);

  const listing: SoldListing = {
    title: (item.title?.[0] ?? '').trim(),
    price,
    conditionLabel: item.condition?.[0].conditionDisplayName?.[0] ?? '',
    soldDate: new Date(soldAt),
    isAuction: listingType.startsWith('Auction'),
    source: 'ebay-finding',
  };
  if (Number.isFinite(watchers) && item.listingInfo?.[0].watchCount) listing.watcherCount = watchers;
  if (Number.isFinite(shipping) && item.shippingInfo?.[0].shippingServiceCost) listing.shippingCost = shipping;
  return listing;
}

/**
 * eBay Finding API `findCompletedItems` (sold items only, US located).
 * Auth is the application id, not an OAuth token.
 */
export class EbayFindingSource implements SoldListingSource {
  readonly name = 'ebay-finding';
  private readonly appId: string;
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(options: EbayFindingOptions = {}) {
    this.appId = options.appId ?? cfg.ebay.appId;
    this.baseUrl = (options.sandbox ?? cfg.ebay.sandbox) ? SANDBOX_URL : PRODUCTION_URL;
    this.log = options.logger ?? createLogger('ebay-finding');
  }

  isConfigured(): boolean {
    return this.appId.length > 0;
  }

  buildUrl(query: SoldListingQuery): URL {
    const url = new URL(this.baseUrl);
    url.searchParams.set('OPERATION-NAME', 'findCompletedItems');
    url.searchParams.set('SERVICE-VERSION', '1.0.0');
    url.searchParams.set('SECURITY-APPNAME', this.appId);
    url.searchParams.set('RESPONSE-DATA-FORMAT', 'JSON');
    url.searchParams.set('REST-PAYLOAD', '');
    url.searchParams.set('keywords', query.keywords);
    url.searchParams.set('paginationInput.entriesPerPage', '100');
    url.searchParams.set('sortOrder', 'EndTimeSoonest');

    let filterIndex = 0;
    url.searchParams.set(`itemFilter(${filterIndex}).name`, 'SoldItemsOnly');
    url.searchParams.set(`itemFilter(${filterIndex}).value`, 'true');
    filterIndex++;

    url.searchParams.set(`itemFilter(${filterIndex}).name`, 'LocatedIn');
    url.searchParams.set(`itemFilter(${filterIndex}).value`, 'US');
    filterIndex++;

    url.searchParams.set(`itemFilter(${filterIndex}).name`, 'Condition');
    CONDITION_IDS[conditionGroup(query.conditionGrade)].forEach((id, idx) => {
      url.searchParams.set(`itemFilter(${filterIndex}).value(${idx})`, id);
    });

    return url;
  }

  async search(query: SoldListingQuery, signal: AbortSignal): Promise<SoldListing[]> {
    if (!this.isConfigured()) {
      throw new Error('EBAY_APP_ID is not configured');
    }

    this.log.info(`Searching completed items for "${query.keywords}"`);
    const response = await fetch(this.buildUrl(query).toString(), {
      headers: { Accept: 'application/json' },
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      if (response.status === 500 && errorText.includes('exceeded the number of times')) {
        throw new Error('eBay Finding API rate limit exceeded');
      }
      throw new Error(`eBay Finding API error: ${response.status} ${response.statusText}`);
    }

    const parsed = FindingResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Malformed eBay Finding API response');
    }

    const envelope = parsed.data.findCompletedItemsResponse[0];
    if (envelope.ack?.[0] === 'Failure') {
      throw new Error('eBay Finding API returned Failure');
    }

    const rawItems = envelope.searchResult?.[0].item ?? [];
    const listings: SoldListing[] = [];
    for (const raw of rawItems) {
      const item = FindingItem.safeParse(raw);
      if (!item.success) continue;
      const listing = toSoldListing(item.data);
      if (listing) listings.push(listing);
    }

    this.log.info(`Parsed ${listings.length} of ${rawItems.length} completed items`);
    return listings;
  }
}
