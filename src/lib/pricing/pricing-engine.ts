/**
 * Pricing engine
 *
 * adjusted    = average × condition × competition × category × brand
 * recommended = max(adjusted, floor)            (floor never below $1)
 * quickSale   = recommended × quickSaleFactor   (clamped to 0.85-0.90)
 * maxProfit   = recommended × 1.15
 *
 * All three tiers are rounded to cents. With a floor of at least $1 the cent
 * rounding keeps quickSale < recommended < maxProfit. Justifications only restate inputs.
 */

import { cfg } from '../../config.js';
import type { AppConfig } from '../../config.js';
import { brandMultiplier, detectBrand } from './brand-vocabulary.js';
import { isPremiumGrade } from './condition-grades.js';
import { gradeDataQuality, marketSampleCount } from './confidence.js';
import type {
  CompetitionLevel,
  ConditionGrade,
  Identification,
  ItemCategory,
  MarketSnapshot,
  NetProceeds,
  PriceMultipliers,
  PricingRecommendation,
} from './types.js';

export const COMPETITION_MULTIPLIERS: Readonly<Record<CompetitionLevel, number>> = Object.freeze({
  low: 1.1,
  moderate: 1.0,
  high: 0.95,
  saturated: 0.9,
});

const CATEGORY_MULTIPLIERS: Readonly<Partial<Record<ItemCategory, number>>> = Object.freeze({
  electronics: 0.9,
  clothing: 0.95,
  home: 0.85,
});

export const MIN_QUICK_SALE_FACTOR = 0.85;
export const MAX_QUICK_SALE_FACTOR = 0.9;
export const MAX_PROFIT_FACTOR = 1.15;
export const MIN_PRICE_FLOOR = 1;

// sparse data: show a ±30% band around the recommendation instead of the observed spread
const SPARSE_RANGE_LOW = 0.7;
const SPARSE_RANGE_HIGH = 1.3;

export interface FeeSchedule {
  finalValueFeeRate: number;
  perOrderFee: number;
  shippingCost: number;
}

export interface PricingSettings {
  floor: number;
  quickSaleFactor: number;
  fees: FeeSchedule;
}

export interface PricingInput {
  snapshot: MarketSnapshot;
  condition: ConditionGrade;
  identification: Pick<Identification, 'brand' | 'category'>;
}

export function defaultPricingSettings(pricing: AppConfig['pricing'] = cfg.pricing): PricingSettings {
  return {
    floor: pricing.floor,
    quickSaleFactor: pricing.quickSaleFactor,
    fees: {
      finalValueFeeRate: pricing.finalValueFeeRate,
      perOrderFee: pricing.perOrderFee,
      shippingCost: pricing.shippingCost,
    },
  };
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function categoryMultiplier(category: ItemCategory): number {
  return CATEGORY_MULTIPLIERS[category] ?? 1.0;
}

export function clampQuickSaleFactor(factor: number): number {
  if (!Number.isFinite(factor)) return MIN_QUICK_SALE_FACTOR;
  return Math.max(MIN_QUICK_SALE_FACTOR, Math.min(MAX_QUICK_SALE_FACTOR, factor));
}

export function clampPriceFloor(floor: number): number {
  if (!Number.isFinite(floor)) return MIN_PRICE_FLOOR;
  return Math.max(MIN_PRICE_FLOOR, floor);
}

/** What the seller keeps after the final value fee, the per-order fee and shipping. */
export function estimateNetProceeds(price: number, fees: FeeSchedule): number {
  return roundCents(price - price * fees.finalValueFeeRate - fees.perOrderFee - fees.shippingCost);
}

function describeTrend(snapshot: MarketSnapshot): string {
  const { trend } = snapshot;
  if (trend.timeframe === 'insufficient data') {
    return 'Not enough recent sales to read a price trend';
  }
  if (trend.direction === 'stable') {
    return `Prices have been stable over ${trend.timeframe}`;
  }
  const sign = trend.percentChange > 0 ? '+' : '';
  return `Prices are ${trend.direction} (${trend.strength}, ${sign}${trend.percentChange}% over ${trend.timeframe})`;
}

function buildJustifications(
  input: PricingInput,
  multipliers: PriceMultipliers,
  floor: number,
  flooredUp: boolean
): string[] {
  const { snapshot, condition, identification } = input;
  const lines: string[] = [];

  if (snapshot.isFallback) {
    lines.push(`No recent sold listings found; starting from a conservative ${money(snapshot.averagePrice)} estimate`);
  } else {
    const plural = snapshot.soldCount === 1 ? '' : 's';
    lines.push(`Based on ${snapshot.soldCount} recent sold listing${plural} averaging ${money(snapshot.averagePrice)}`);
  }

  lines.push(`Condition ${condition.label} (×${multipliers.condition.toFixed(2)})`);
  lines.push(`Competition is ${snapshot.competitionLevel} (×${multipliers.competition.toFixed(2)})`);

  if (multipliers.category !== 1) {
    lines.push(`Category adjustment for ${identification.category} (×${multipliers.category.toFixed(2)})`);
  }
  if (multipliers.brand !== 1) {
    const brand = detectBrand(identification.brand)?.name ?? identification.brand;
    lines.push(`Brand adjustment for ${brand} (×${multipliers.brand.toFixed(2)})`);
  }

  lines.push(describeTrend(snapshot));
  if (snapshot.trend.seasonal.isHolidaySeason) {
    lines.push('Holiday season: demand for this category usually peaks now');
  }
  if (flooredUp) {
    lines.push(`Raised to the ${money(floor)} minimum price`);
  }
  return lines;
}

export function computePricing(
  input: PricingInput,
  settings: PricingSettings = defaultPricingSettings()
): PricingRecommendation {
  const { snapshot, condition, identification } = input;

  const multipliers: PriceMultipliers = {
    condition: condition.multiplier,
    competition: COMPETITION_MULTIPLIERS[snapshot.competitionLevel],
    category: categoryMultiplier(identification.category),
    brand: brandMultiplier(identification.brand),
  };

  const adjusted =
    snapshot.averagePrice * multipliers.condition * multipliers.competition * multipliers.category * multipliers.brand;
  const floor = clampPriceFloor(settings.floor);
  const flooredUp = !(adjusted >= floor);
  const recommendedPrice = roundCents(flooredUp ? floor : adjusted);
  const quickSalePrice = roundCents(recommendedPrice * clampQuickSaleFactor(settings.quickSaleFactor));
  const maxProfitPrice = roundCents(recommendedPrice * MAX_PROFIT_FACTOR);

  const quality = gradeDataQuality(marketSampleCount(snapshot));
  const priceRange =
    quality === 'limited' || quality === 'insufficient'
      ? { low: roundCents(recommendedPrice * SPARSE_RANGE_LOW), high: roundCents(recommendedPrice * SPARSE_RANGE_HIGH) }
      : { low: snapshot.priceRange.low, high: snapshot.priceRange.high };

  const netProceeds: NetProceeds = {
    quickSale: estimateNetProceeds(quickSalePrice, settings.fees),
    recommended: estimateNetProceeds(recommendedPrice, settings.fees),
    maxProfit: estimateNetProceeds(maxProfitPrice, settings.fees),
  };

  return {
    recommendedPrice,
    quickSalePrice,
    maxProfitPrice,
    strategy: isPremiumGrade(condition.id) ? 'premium' : 'competitive',
    justifications: buildJustifications(input, multipliers, floor, flooredUp),
    priceRange,
    multipliers,
    netProceeds,
  };
}
