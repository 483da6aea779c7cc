/* trend.ts – direction/strength of recent sold prices plus a seasonal side note */

import type { ItemCategory, SeasonalAnnotation, SoldListing, TrendAnalysis } from './types.js';

export const MIN_TREND_SAMPLES = 5;

const DAY_MS = 24 * 60 * 60 * 1000;

// November and December (0-based months)
const HOLIDAY_MONTHS = new Set([10, 11]);
const HOLIDAY_CATEGORIES = new Set<ItemCategory>(['electronics', 'toys', 'collectibles', 'accessories']);

export interface TrendOptions {
  now?: Date;
  category?: ItemCategory;
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

export function getSeasonalFactors(category: ItemCategory): string {
  switch (category) {
    case 'electronics':
      return 'Peak: Nov-Jan (holidays), Back-to-school (Aug)';
    case 'toys':
    case 'collectibles':
      return 'Peak: Nov-Dec (holidays)';
    case 'clothing':
    case 'sneakers':
      return 'Seasonal patterns by item type';
    case 'sports':
      return 'Peak: spring and early summer';
    default:
      return 'Standard patterns';
  }
}

export function seasonalAnnotation(category: ItemCategory, now: Date): SeasonalAnnotation {
  return {
    isHolidaySeason: HOLIDAY_MONTHS.has(now.getUTCMonth()) && HOLIDAY_CATEGORIES.has(category),
    note: getSeasonalFactors(category),
  };
}

/**
 * Map a percent change between the earlier and later halves to a trend.
 * Boundaries are inclusive on the moving side: +10 is strong, +3 is moderate.
 */
export function classifyTrend(percentChange: number): Pick<TrendAnalysis, 'direction' | 'strength'> {
  if (percentChange >= 10) return { direction: 'increasing', strength: 'strong' };
  if (percentChange >= 3) return { direction: 'increasing', strength: 'moderate' };
  if (percentChange <= -10) return { direction: 'decreasing', strength: 'strong' };
  if (percentChange <= -3) return { direction: 'decreasing', strength: 'moderate' };
  return { direction: 'stable', strength: 'weak' };
}

function describeTimeframe(sorted: readonly SoldListing[]): string {
  const first = sorted[0].soldDate.getTime();
  const last = sorted[sorted.length - 1].soldDate.getTime();
  const days = Math.max(1, Math.round((last - first) / DAY_MS));
  return `${days} day${days === 1 ? '' : 's'}`;
}

/**
 * Compare the average price of the earlier half of sales with the later half.
 * Fewer than five sales is reported as stable/weak without attempting a split.
 */
export function analyzeTrend(listings: readonly SoldListing[], options: TrendOptions = {}): TrendAnalysis {
  const now = options.now ?? new Date();
  const seasonal = seasonalAnnotation(options.category ?? 'other', now);

  if (listings.length < MIN_TREND_SAMPLES) {
    return {
      direction: 'stable',
      strength: 'weak',
      percentChange: 0,
      timeframe: 'insufficient data',
      seasonal,
    };
  }

  const sorted = [...listings].sort((a, b) => a.soldDate.getTime() - b.soldDate.getTime());
  const mid = Math.floor(sorted.length / 2);
  const earlierAvg = average(sorted.slice(0, mid).map((l) => l.price));
  const laterAvg = average(sorted.slice(mid).map((l) => l.price));

  // multiply before dividing so whole-number inputs land exactly on the thresholds
  const percentChange = earlierAvg > 0 ? ((laterAvg - earlierAvg) * 100) / earlierAvg : 0;

  return {
    ...classifyTrend(percentChange),
    percentChange: Math.round(percentChange * 100) / 100,
    timeframe: describeTimeframe(sorted),
    seasonal,
  };
}
