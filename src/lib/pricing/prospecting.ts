/**
 * Sourcing view of a priced item: the most to pay for it, what a flip would
 * earn and whether it is worth buying.
 *
 * maxBuy    = sellPrice × clamp(0.5 + condition + demand + category, 0.2, 0.7), at least $2
 * targetBuy = maxBuy × 0.75
 * profit    = net proceeds at the recommended price − cost (asking price, else targetBuy)
 * roi       = profit / cost × 100
 */

import type { FeeSchedule } from './pricing-engine.js';
import type {
  CompetitionLevel,
  ConditionGrade,
  ConditionGradeId,
  Identification,
  ItemCategory,
  MarketSnapshot,
  PricingRecommendation,
  SearchVolume,
  TrendDirection,
} from './types.js';

export type ProspectDecision = 'buy' | 'investigate';
export type RiskLevel = 'low' | 'medium' | 'high';
export type DemandLevel = SearchVolume;

export interface ProspectInput {
  snapshot: MarketSnapshot;
  pricing: PricingRecommendation;
  condition: ConditionGrade;
  identification: Pick<Identification, 'productName' | 'category' | 'confidence'>;
  fees: FeeSchedule;
  /** What the seller is asking; the decision is made against this when given. */
  askingPrice?: number;
}

export interface ProspectAnalysis {
  averageSoldPrice: number;
  estimatedSellPrice: number;
  maxBuyPrice: number;
  targetBuyPrice: number;
  /** Lowest sale price that recovers the max buy price after fees and shipping. */
  breakEvenPrice: number;
  costBasis: number;
  potentialProfit: number;
  expectedRoi: number;
  decision: ProspectDecision;
  riskLevel: RiskLevel;
  reasons: string[];
  sourcingTips: string[];
  demandLevel: DemandLevel;
  competitionLevel: CompetitionLevel;
  marketTrend: TrendDirection;
  sellTimeEstimate: string;
  seasonalFactors: string;
  quickFlipPotential: boolean;
  holidayDemand: boolean;
}

const BASE_BUY_MULTIPLIER = 0.5;
const MIN_BUY_MULTIPLIER = 0.2;
const MAX_BUY_MULTIPLIER = 0.7;
export const MIN_MAX_BUY_PRICE = 2;
export const TARGET_BUY_FACTOR = 0.75;

const CONDITION_BUY_ADJUSTMENTS: Readonly<Partial<Record<ConditionGradeId, number>>> = Object.freeze({
  'new-with-tags': 0.15,
  'new-without-tags': 0.15,
  'new-other': 0.15,
  'like-new': 0.15,
  excellent: 0.15,
  'very-good': 0.05,
  acceptable: -0.15,
  'for-parts-not-working': -0.15,
});

const DEMAND_BUY_ADJUSTMENTS: Readonly<Record<DemandLevel, number>> = Object.freeze({
  high: 0.1,
  medium: 0,
  low: -0.15,
});

const CATEGORY_BUY_ADJUSTMENTS: Readonly<Partial<Record<ItemCategory, number>>> = Object.freeze({
  electronics: 0.05,
});

const BUY_MIN_ROI = 75;
const BUY_MIN_PROFIT = 8;
const BUY_MIN_CONFIDENCE = 0.7;
const MODERATE_MIN_ROI = 40;
const MODERATE_MIN_PROFIT = 4;

const QUICK_FLIP_MAX_DAYS = 7;
const HOLIDAY_KEYWORDS = ['gaming', 'toy', 'electronics', 'gift', 'jewelry', 'watch'];

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function maxBuyMultiplier(condition: ConditionGradeId, demand: DemandLevel, category: ItemCategory): number {
  const multiplier =
    BASE_BUY_MULTIPLIER +
    (CONDITION_BUY_ADJUSTMENTS[condition] ?? 0) +
    DEMAND_BUY_ADJUSTMENTS[demand] +
    (CATEGORY_BUY_ADJUSTMENTS[category] ?? 0);
  return Math.max(MIN_BUY_MULTIPLIER, Math.min(MAX_BUY_MULTIPLIER, multiplier));
}

export function calculateMaxBuyPrice(sellPrice: number, multiplier: number): number {
  return roundCents(Math.max(MIN_MAX_BUY_PRICE, sellPrice * multiplier));
}

/** A synthetic fallback snapshot is no evidence of demand. */
export function prospectDemandLevel(snapshot: MarketSnapshot): DemandLevel {
  return snapshot.isFallback ? 'low' : snapshot.demand.searchVolume;
}

export function estimateSellTime(averageSaleDurationDays: number): string {
  if (averageSaleDurationDays <= 3) return '1-3 days';
  if (averageSaleDurationDays <= 7) return '3-7 days';
  if (averageSaleDurationDays <= 14) return '1-2 weeks';
  return '2-4 weeks';
}

export function hasHolidayDemand(category: string, productName: string): boolean {
  const text = `${category} ${productName}`.toLowerCase();
  return HOLIDAY_KEYWORDS.some((keyword) => text.includes(keyword));
}

function breakEven(maxBuyPrice: number, fees: FeeSchedule): number {
  const kept = Math.max(0.01, 1 - fees.finalValueFeeRate);
  return roundCents((maxBuyPrice + fees.perOrderFee + fees.shippingCost) / kept);
}

interface Verdict {
  decision: ProspectDecision;
  riskLevel: RiskLevel;
  reasons: string[];
  sourcingTips: string[];
}

function decide(
  roi: number,
  profit: number,
  confidence: number,
  demand: DemandLevel,
  input: ProspectInput,
  maxBuyPrice: number
): Verdict {
  const { snapshot, askingPrice } = input;
  const reasons: string[] = [];
  const sourcingTips: string[] = [];
  const overMaxBuy = askingPrice !== undefined && askingPrice > maxBuyPrice;
  let decision: ProspectDecision = 'investigate';
  let riskLevel: RiskLevel = 'medium';

  const strongDeal = roi >= BUY_MIN_ROI && profit >= BUY_MIN_PROFIT && confidence >= BUY_MIN_CONFIDENCE;
  if (strongDeal && !snapshot.isFallback && !overMaxBuy) {
    decision = 'buy';
    riskLevel = 'low';
    reasons.push(`Excellent ROI: ${roi.toFixed(1)}%`);
    reasons.push(`Good profit: ${money(profit)}`);
    reasons.push('High confidence identification');
    sourcingTips.push('Strong buy at the target price');
    sourcingTips.push('List quickly for best results');
  } else if (roi >= MODERATE_MIN_ROI && profit >= MODERATE_MIN_PROFIT) {
    reasons.push(`Moderate ROI: ${roi.toFixed(1)}%`);
    reasons.push('Decent profit potential');
    if (confidence < BUY_MIN_CONFIDENCE) reasons.push('Lower confidence: verify item details');
    sourcingTips.push('Research condition carefully');
    sourcingTips.push('Compare the asking price with the max buy price');
  } else {
    riskLevel = 'high';
    reasons.push(`Low ROI: ${roi.toFixed(1)}%`);
    reasons.push('Limited profit potential');
    sourcingTips.push('Only if significantly discounted');
    sourcingTips.push('Double-check market demand');
  }

  if (demand === 'high') {
    reasons.push('High market demand');
    sourcingTips.push('Quick flip potential');
  }
  if (snapshot.isFallback) {
    riskLevel = 'high';
    reasons.push('No recent sold listings; market value is an estimate');
    sourcingTips.push('Check recent sales before buying');
  }
  if (askingPrice !== undefined && overMaxBuy) {
    riskLevel = 'high';
    reasons.push(`Asking price ${money(askingPrice)} is above the ${money(maxBuyPrice)} max buy price`);
  }

  return { decision, riskLevel, reasons, sourcingTips };
}

export function analyzeProspect(input: ProspectInput): ProspectAnalysis {
  const { snapshot, pricing, condition, identification, fees, askingPrice } = input;
  const demandLevel = prospectDemandLevel(snapshot);

  const sellPrice = pricing.recommendedPrice;
  const maxBuyPrice = calculateMaxBuyPrice(
    sellPrice,
    maxBuyMultiplier(condition.id, demandLevel, identification.category)
  );
  const targetBuyPrice = roundCents(maxBuyPrice * TARGET_BUY_FACTOR);
  const costBasis = askingPrice ?? targetBuyPrice;
  const potentialProfit = roundCents(pricing.netProceeds.recommended - costBasis);
  const expectedRoi = costBasis > 0 ? Math.round((potentialProfit / costBasis) * 1000) / 10 : 0;

  const verdict = decide(expectedRoi, potentialProfit, identification.confidence, demandLevel, input, maxBuyPrice);
  const saleDays = snapshot.demand.averageSaleDurationDays;

  return {
    averageSoldPrice: snapshot.averagePrice,
    estimatedSellPrice: sellPrice,
    maxBuyPrice,
    targetBuyPrice,
    breakEvenPrice: breakEven(maxBuyPrice, fees),
    costBasis,
    potentialProfit,
    expectedRoi,
    ...verdict,
    demandLevel,
    competitionLevel: snapshot.competitionLevel,
    marketTrend: snapshot.trend.direction,
    sellTimeEstimate: estimateSellTime(saleDays),
    seasonalFactors: snapshot.trend.seasonal.note,
    quickFlipPotential: demandLevel === 'high' && saleDays <= QUICK_FLIP_MAX_DAYS,
    holidayDemand: hasHolidayDemand(identification.category, identification.productName),
  };
}
