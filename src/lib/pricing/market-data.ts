/**
 * MarketDataAggregator
 *
 * Owns the per-process market cache. For one (identification, grade) pair it
 * queries every configured sold-listing source, merges and dedupes the
 * results, keeps the trailing window, and builds a frozen MarketSnapshot.
 *
 * Snapshots are cached for the TTL (24h by default), including fallback ones,
 * so repeated lookups stay stable while sources flap. Expired entries are
 * dropped lazily when they are looked up.
 */

import { cfg } from '../../config.js';
import { createLogger, errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { TimeoutError, raceAbort, throwIfCancelled, withTimeout } from './cancellation.js';
import { mapConditionLabel } from './condition-assessor.js';
import { getConditionGrade } from './condition-grades.js';
import { estimateDemand } from './demand.js';
import { UNKNOWN_IDENTIFICATION } from './identification.js';
import type { SoldListingSource } from './sources/types.js';
import { analyzeTrend } from './trend.js';
import type {
  ConditionGradeId,
  Identification,
  MarketSnapshot,
  PriceBucket,
  SoldListing,
  SoldListingQuery,
  SourceReport,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const FALLBACK_SOURCE = 'fallback';

export interface MarketDataOptions {
  sources: readonly SoldListingSource[];
  logger?: Logger;
  ttlMs?: number;
  windowDays?: number;
  fallbackPrice?: number;
  sourceTimeoutMs?: number;
  now?: () => Date;
}

export interface SnapshotRequestOptions {
  signal?: AbortSignal;
}

interface CacheEntry {
  snapshot: MarketSnapshot;
  capturedAt: number;
}

// Marked stale by invalidate() so a refresh already under way does not store its result.
interface RefreshTicket {
  stale: boolean;
}

interface PendingRefresh {
  promise: Promise<MarketSnapshot>;
  ticket: RefreshTicket;
}

type MarketIdentity = Pick<Identification, 'brand' | 'productLine' | 'productName' | 'size'>;

const PLACEHOLDER_NAMES = new Set([UNKNOWN_IDENTIFICATION.productName, 'Input Error']);

function normalizeKeyPart(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

/** Model used for search and caching: the product line, else a real product name. */
function marketModel(identification: MarketIdentity): string {
  const line = identification.productLine.trim();
  if (line) return line;
  const name = identification.productName.trim();
  return PLACEHOLDER_NAMES.has(name) ? '' : name;
}

export function makeMarketCacheKey(identification: MarketIdentity, grade: ConditionGradeId): string {
  const parts = [identification.brand, marketModel(identification), identification.size].map(normalizeKeyPart);
  return `${parts.join('|')}_${grade}`;
}

export function buildSoldListingQuery(identification: MarketIdentity, grade: ConditionGradeId): SoldListingQuery {
  const brand = identification.brand.trim();
  const model = marketModel(identification);
  const size = identification.size.trim();
  // skip the brand when the model already starts with it ("Nike Air Max 90")
  const repeatsBrand = brand !== '' && model.toLowerCase().startsWith(brand.toLowerCase());
  const keywordParts = repeatsBrand ? [model, size] : [brand, model, size];
  return {
    keywords: keywordParts.filter(Boolean).join(' '),
    brand,
    model,
    size,
    conditionGrade: grade,
  };
}

function isValidListing(listing: SoldListing): boolean {
  return Number.isFinite(listing.price) && listing.price > 0 && !Number.isNaN(listing.soldDate.getTime());
}

function dedupeKey(listing: SoldListing): string {
  const day = listing.soldDate.toISOString().slice(0, 10);
  return `${listing.title.trim().toLowerCase()}|${listing.price.toFixed(2)}|${day}`;
}

/** First occurrence wins, so callers pass listings in source priority order. */
export function dedupeListings(listings: readonly SoldListing[]): SoldListing[] {
  const seen = new Set<string>();
  const unique: SoldListing[] = [];
  for (const listing of listings) {
    const key = dedupeKey(listing);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(listing);
  }
  return unique;
}

export function filterToWindow(listings: readonly SoldListing[], now: Date, windowDays: number): SoldListing[] {
  const end = now.getTime();
  const start = end - windowDays * DAY_MS;
  return listings.filter((listing) => {
    const soldAt = listing.soldDate.getTime();
    return soldAt >= start && soldAt <= end;
  });
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

export function bucketByGrade(listings: readonly SoldListing[]): Partial<Record<ConditionGradeId, PriceBucket>> {
  const prices = new Map<ConditionGradeId, number[]>();
  for (const listing of listings) {
    const grade = mapConditionLabel(listing.conditionLabel);
    const bucket = prices.get(grade) ?? [];
    bucket.push(listing.price);
    prices.set(grade, bucket);
  }

  const distribution: Partial<Record<ConditionGradeId, PriceBucket>> = {};
  for (const [grade, values] of prices) {
    distribution[grade] = Object.freeze({ count: values.length, averagePrice: roundCents(mean(values)) });
  }
  return distribution;
}

function freezeListing(listing: SoldListing): SoldListing {
  return Object.freeze({ ...listing, soldDate: new Date(listing.soldDate.getTime()) });
}

export class MarketDataAggregator {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, PendingRefresh>();
  private readonly sources: readonly SoldListingSource[];
  private readonly log: Logger;
  private readonly ttlMs: number;
  private readonly windowDays: number;
  private readonly fallbackPrice: number;
  private readonly sourceTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: MarketDataOptions) {
    this.sources = options.sources;
    this.log = options.logger ?? createLogger('market-data');
    this.ttlMs = options.ttlMs ?? cfg.market.cacheTtlHours * HOUR_MS;
    this.windowDays = options.windowDays ?? cfg.market.windowDays;
    this.fallbackPrice = options.fallbackPrice ?? cfg.market.fallbackPrice;
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? cfg.market.sourceTimeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Cached snapshot for the identification and grade, refreshed from the
   * sources when missing or expired. Never rejects because a source failed;
   * rejects with AnalysisCancelledError when `signal` aborts first. Concurrent
   * callers for the same key share one fetch.
   */
  async getMarketSnapshot(
    identification: Identification,
    grade: ConditionGradeId,
    options: SnapshotRequestOptions = {}
  ): Promise<MarketSnapshot> {
    throwIfCancelled(options.signal);
    const key = makeMarketCacheKey(identification, grade);

    const cached = this.cache.get(key);
    if (cached) {
      if (this.now().getTime() - cached.capturedAt < this.ttlMs) {
        this.log.debug(`Cache hit for ${key}`);
        return cached.snapshot;
      }
      this.log.debug(`Cache entry expired for ${key}`);
      this.cache.delete(key);
    }

    let pending = this.inFlight.get(key);
    if (!pending) {
      const ticket: RefreshTicket = { stale: false };
      const promise = this.refresh(key, buildSoldListingQuery(identification, grade), identification, ticket).finally(
        () => {
          if (this.inFlight.get(key)?.ticket === ticket) this.inFlight.delete(key);
        }
      );
      pending = { promise, ticket };
      this.inFlight.set(key, pending);
    } else {
      this.log.debug(`Joining in-flight fetch for ${key}`);
    }

    return raceAbort(pending.promise, options.signal);
  }

  /**
   * Drop one cache entry, or all of them. Returns how many were removed.
   * Fetches still running for the dropped keys finish for their callers but
   * are not cached; the next request starts a fresh fetch.
   */
  invalidate(key?: string): number {
    if (key === undefined) {
      const count = this.cache.size;
      this.cache.clear();
      for (const pending of this.inFlight.values()) pending.ticket.stale = true;
      this.inFlight.clear();
      return count;
    }
    const pending = this.inFlight.get(key);
    if (pending) {
      pending.ticket.stale = true;
      this.inFlight.delete(key);
    }
    return this.cache.delete(key) ? 1 : 0;
  }

  size(): number {
    return this.cache.size;
  }

  private async collect(query: SoldListingQuery): Promise<{ listings: SoldListing[]; reports: SourceReport[] }> {
    const canSearch = query.keywords.length > 0;
    const active = canSearch ? this.sources.filter((source) => source.isConfigured()) : [];

    const settled = await Promise.allSettled(
      active.map((source) =>
        withTimeout(this.sourceTimeoutMs, source.name, (signal) => source.search(query, signal))
      )
    );

    const listings: SoldListing[] = [];
    const reports: SourceReport[] = [];
    for (const source of this.sources) {
      const index = active.indexOf(source);
      if (index === -1) {
        reports.push({ name: source.name, status: 'skipped', listings: 0 });
        continue;
      }

      const result = settled[index];
      if (result.status === 'fulfilled') {
        const valid = result.value.filter(isValidListing);
        listings.push(...valid);
        reports.push({ name: source.name, status: 'ok', listings: valid.length });
        continue;
      }

      const error = errorMessage(result.reason);
      const status = result.reason instanceof TimeoutError ? 'timeout' : 'failed';
      this.log.warn(`Source ${source.name} ${status}`, { error });
      reports.push({ name: source.name, status, listings: 0, error });
    }

    return { listings, reports };
  }

  private fallbackListing(query: SoldListingQuery, now: Date): SoldListing {
    return {
      title: `${query.keywords || 'Unidentified item'} (estimated)`,
      price: this.fallbackPrice,
      conditionLabel: getConditionGrade(query.conditionGrade).label,
      soldDate: now,
      isAuction: false,
      source: FALLBACK_SOURCE,
    };
  }

  private async refresh(
    key: string,
    query: SoldListingQuery,
    identification: Identification,
    ticket: RefreshTicket
  ): Promise<MarketSnapshot> {
    const { listings: merged, reports } = await this.collect(query);
    const now = this.now();

    const unique = dedupeListings(merged);
    const windowed = filterToWindow(unique, now, this.windowDays);
    const isFallback = windowed.length === 0;
    if (isFallback) {
      this.log.warn(`No sold listings for "${query.keywords}"; using fallback price`, {
        fallbackPrice: this.fallbackPrice,
      });
    } else {
      this.log.info(`Built snapshot for "${query.keywords}"`, {
        merged: merged.length,
        unique: unique.length,
        inWindow: windowed.length,
      });
    }

    const listings = Object.freeze((isFallback ? [this.fallbackListing(query, now)] : windowed).map(freezeListing));
    const prices = listings.map((listing) => listing.price);
    const demand = estimateDemand(listings);

    const snapshot: MarketSnapshot = {
      key,
      query: query.keywords,
      conditionGrade: query.conditionGrade,
      listings,
      soldCount: listings.length,
      priceDistribution: Object.freeze(bucketByGrade(listings)),
      averagePrice: roundCents(mean(prices)),
      priceRange: Object.freeze({ low: Math.min(...prices), high: Math.max(...prices) }),
      trend: Object.freeze(analyzeTrend(listings, { now, category: identification.category })),
      demand: Object.freeze(demand),
      competitionLevel: demand.competitionLevel,
      sources: Object.freeze(reports.map((report) => Object.freeze(report))),
      isFallback,
      lastUpdated: now,
    };
    Object.freeze(snapshot);

    if (ticket.stale) {
      this.log.debug(`Cache invalidated during fetch for ${key}; not storing`);
    } else {
      this.cache.set(key, { snapshot, capturedAt: now.getTime() });
    }
    return snapshot;
  }
}
