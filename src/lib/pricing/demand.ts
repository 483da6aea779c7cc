import type { CompetitionLevel, DemandIndicators, SearchVolume, SoldListing } from './types.js';

export const DEFAULT_WATCHERS = 5.0;
export const AUCTION_DURATION_DAYS = 7;
export const FIXED_PRICE_DURATION_DAYS = 21;

export function classifySearchVolume(count: number): SearchVolume {
  if (count >= 50) return 'high';
  if (count >= 10) return 'medium';
  return 'low';
}

export function classifyCompetition(count: number): CompetitionLevel {
  if (count > 50) return 'saturated';
  if (count > 20) return 'high';
  if (count > 5) return 'moderate';
  return 'low';
}

/**
 * Coarse demand read-out for a set of sold listings.
 *
 * Sale duration is a typical-duration heuristic weighted by the auction share,
 * not something measured from listing timestamps.
 */
export function estimateDemand(listings: readonly SoldListing[]): DemandIndicators {
  const watcherCounts = listings
    .map((listing) => listing.watcherCount)
    .filter((count): count is number => typeof count === 'number' && Number.isFinite(count) && count >= 0);

  const averageWatchers = watcherCounts.length > 0
    ? watcherCounts.reduce((acc, count) => acc + count, 0) / watcherCounts.length
    : DEFAULT_WATCHERS;

  let averageSaleDurationDays = (AUCTION_DURATION_DAYS + FIXED_PRICE_DURATION_DAYS) / 2;
  if (listings.length > 0) {
    const auctionShare = listings.filter((listing) => listing.isAuction).length / listings.length;
    averageSaleDurationDays = auctionShare * AUCTION_DURATION_DAYS + (1 - auctionShare) * FIXED_PRICE_DURATION_DAYS;
  }

  return {
    averageWatchers: Math.round(averageWatchers * 10) / 10,
    averageSaleDurationDays: Math.round(averageSaleDurationDays * 10) / 10,
    searchVolume: classifySearchVolume(listings.length),
    competitionLevel: classifyCompetition(listings.length),
  };
}
