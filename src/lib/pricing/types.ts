/* types.ts – shared domain types for the identification → price pipeline */

// ── Identification ───────────────────────────────────────────────────────────

export const ITEM_CATEGORIES = [
  'sneakers',
  'clothing',
  'electronics',
  'accessories',
  'home',
  'collectibles',
  'books',
  'toys',
  'sports',
  'other',
] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

export type IdentificationMethod = 'visual-and-text' | 'visual-only' | 'text-only' | 'category-based';

export interface Identification {
  productName: string;
  brand: string;
  productLine: string;            // model, e.g. "Air Force 1 Low"
  variant: string;
  styleCode: string;
  colorway: string;
  size: string;
  category: ItemCategory;
  method: IdentificationMethod;
  confidence: number;             // 0-1
  upc: string | null;
  error?: string;                 // only set on input-error identifications
}

/** What the vision provider hands back before aggregation. Every field is best effort. */
export interface RawIdentificationGuess {
  productName?: string;
  brand?: string;
  productLine?: string;
  variant?: string;
  styleCode?: string;
  colorway?: string;
  size?: string;
  category?: string;
  method?: IdentificationMethod;
  confidence?: number;
}

export interface TextSignals {
  brands: string[];
  sizes: string[];
  styleCodes: string[];
  barcodes: string[];
  prices: string[];
}

// ── Condition ────────────────────────────────────────────────────────────────

// best to worst
export const CONDITION_GRADE_IDS = [
  'new-with-tags',
  'new-without-tags',
  'new-other',
  'like-new',
  'excellent',
  'very-good',
  'good',
  'acceptable',
  'for-parts-not-working',
] as const;

export type ConditionGradeId = (typeof CONDITION_GRADE_IDS)[number];

export interface ConditionGrade {
  id: ConditionGradeId;
  label: string;                  // eBay-style display label
  multiplier: number;
  description: string;
  ebayConditionId: string;
}

export type Severity = 'minor' | 'moderate' | 'major' | 'critical';

export interface ConditionFactor {
  area: string;
  issue: string;
  severity: Severity;
  valueImpactPercent: number;
}

export interface ConditionAssessment {
  grade: ConditionGrade;
  confidence: number;
  factors: readonly ConditionFactor[];
  matchedPhrase: string | null;
}

// ── Market data ──────────────────────────────────────────────────────────────

export interface SoldListing {
  title: string;
  price: number;
  conditionLabel: string;
  soldDate: Date;
  shippingCost?: number;
  watcherCount?: number;
  isAuction: boolean;
  source: string;
}

export interface SoldListingQuery {
  keywords: string;
  brand: string;
  model: string;
  size: string;
  conditionGrade: ConditionGradeId;
}

export type TrendDirection = 'increasing' | 'stable' | 'decreasing';
export type TrendStrength = 'strong' | 'moderate' | 'weak';

export interface SeasonalAnnotation {
  isHolidaySeason: boolean;
  note: string;
}

export interface TrendAnalysis {
  direction: TrendDirection;
  strength: TrendStrength;
  percentChange: number;
  timeframe: string;
  seasonal: SeasonalAnnotation;
}

export type SearchVolume = 'high' | 'medium' | 'low';
export type CompetitionLevel = 'low' | 'moderate' | 'high' | 'saturated';

export interface DemandIndicators {
  averageWatchers: number;
  averageSaleDurationDays: number;
  searchVolume: SearchVolume;
  competitionLevel: CompetitionLevel;
}

export interface PriceBucket {
  count: number;
  averagePrice: number;
}

export type SourceStatus = 'ok' | 'failed' | 'timeout' | 'skipped';

export interface SourceReport {
  name: string;
  status: SourceStatus;
  listings: number;
  error?: string;
}

export interface MarketSnapshot {
  key: string;
  query: string;
  conditionGrade: ConditionGradeId;
  listings: readonly SoldListing[];
  soldCount: number;
  priceDistribution: Partial<Record<ConditionGradeId, PriceBucket>>;
  averagePrice: number;
  priceRange: { low: number; high: number };
  trend: TrendAnalysis;
  demand: DemandIndicators;
  competitionLevel: CompetitionLevel;
  sources: readonly SourceReport[];
  isFallback: boolean;
  lastUpdated: Date;
}

// ── Pricing & confidence ─────────────────────────────────────────────────────

export type PricingStrategy = 'premium' | 'competitive';

export interface PriceMultipliers {
  condition: number;
  competition: number;
  category: number;
  brand: number;
}

export interface NetProceeds {
  quickSale: number;
  recommended: number;
  maxProfit: number;
}

export interface PricingRecommendation {
  recommendedPrice: number;
  quickSalePrice: number;
  maxProfitPrice: number;
  strategy: PricingStrategy;
  justifications: string[];
  priceRange: { low: number; high: number };
  multipliers: PriceMultipliers;
  netProceeds: NetProceeds;
}

export type DataQuality = 'excellent' | 'good' | 'fair' | 'limited' | 'insufficient';

export interface ConfidenceReport {
  overall: number;
  identification: number;
  condition: number;
  dataQuality: number;
  dataQualityGrade: DataQuality;
  reviewReasons: string[];
}
