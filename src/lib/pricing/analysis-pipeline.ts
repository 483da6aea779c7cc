/**
 * analysis-pipeline.ts – one analysis request from photos/barcode to a price.
 *
 *   1 validate input        5 assess condition
 *   2 barcode lookup        6 market snapshot
 *   3 classify text         7 pricing
 *   4 identify              8 confidence
 *
 * Stages run strictly in sequence; only the sold-listing sources inside the
 * market stage fan out. Provider failures resolve to sentinels and never abort
 * the run. The caller's AbortSignal is checked between stages and while
 * waiting on providers.
 */

import { cfg } from '../../config.js';
import type { AppConfig } from '../../config.js';
import { createLogger, errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { HttpBarcodeLookup } from '../providers/barcode-lookup.js';
import type { BarcodeLookupProvider, BarcodeProduct } from '../providers/barcode-lookup.js';
import { OpenAIVisionProvider } from '../providers/openai-vision.js';
import type { ConditionDescription, ConditionProvider, IdentificationProvider } from '../providers/openai-vision.js';
import { raceAbort, throwIfCancelled } from './cancellation.js';
import { UNKNOWN_CONDITION, assessCondition } from './condition-assessor.js';
import { marketSampleCount, scoreConfidence } from './confidence.js';
import { aggregateIdentification, inputErrorIdentification, isUsableGuess } from './identification.js';
import { MarketDataAggregator } from './market-data.js';
import type { SnapshotRequestOptions } from './market-data.js';
import { computePricing, defaultPricingSettings } from './pricing-engine.js';
import type { PricingSettings } from './pricing-engine.js';
import { analyzeProspect } from './prospecting.js';
import type { ProspectAnalysis } from './prospecting.js';
import { EbayFindingSource } from './sources/ebay-finding.js';
import { SearchApiSource } from './sources/searchapi.js';
import { classifyTextSignals } from './text-signals.js';
import type {
  ConditionAssessment,
  ConditionGradeId,
  ConfidenceReport,
  Identification,
  MarketSnapshot,
  PricingRecommendation,
  RawIdentificationGuess,
  TextSignals,
} from './types.js';

export const TOTAL_STEPS = 8;

// barcode databases name the exact product, so their record outranks a weak photo guess
export const BARCODE_MATCH_CONFIDENCE = 0.85;

export interface AnalysisRequest {
  images?: string[];
  barcode?: string;
  texts?: string[];
  categoryHint?: string;
  conditionNotes?: string;
}

export interface AnalysisProgress {
  step: number;
  totalSteps: number;
  status: string;
}

export interface AnalysisOptions {
  signal?: AbortSignal;
  onProgress?: (progress: AnalysisProgress) => void;
}

export interface MarketDataSource {
  getMarketSnapshot(
    identification: Identification,
    grade: ConditionGradeId,
    options?: SnapshotRequestOptions
  ): Promise<MarketSnapshot>;
}

export interface AnalysisDeps {
  identifier: IdentificationProvider;
  conditionProvider: ConditionProvider;
  barcodeLookup: BarcodeLookupProvider;
  market: MarketDataSource;
  pricing?: PricingSettings;
  logger?: Logger;
}

export interface PricedItem {
  market: MarketSnapshot;
  pricing: PricingRecommendation;
  confidence: ConfidenceReport;
}

export interface ProspectedItem extends PricedItem {
  prospect: ProspectAnalysis;
}

export interface ProspectOptions extends Omit<AnalysisOptions, 'onProgress'> {
  askingPrice?: number;
}

export interface AnalysisSuccess extends PricedItem {
  ok: true;
  identification: Identification;
  condition: ConditionAssessment;
  barcode: BarcodeProduct | null;
  textSignals: TextSignals;
}

export interface AnalysisInputError {
  ok: false;
  error: 'NO_INPUT';
  identification: Identification;
}

export type AnalysisResult = AnalysisSuccess | AnalysisInputError;

function cleanList(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((value) => value.trim()).filter(Boolean);
}

function barcodeGuess(product: BarcodeProduct): RawIdentificationGuess {
  return {
    productName: product.title,
    brand: product.brand,
    category: product.category,
    method: 'text-only',
    confidence: BARCODE_MATCH_CONFIDENCE,
  };
}

/**
 * Market, pricing and confidence for an already identified and graded item.
 * Shared by the full analysis and the price-only endpoint.
 */
export async function priceIdentifiedItem(
  identification: Identification,
  condition: ConditionAssessment,
  deps: Pick<AnalysisDeps, 'market' | 'pricing'>,
  options: Omit<AnalysisOptions, 'onProgress'> & { report?: (step: number, status: string) => void } = {}
): Promise<PricedItem> {
  const { signal } = options;
  const report = options.report ?? (() => undefined);

  report(6, 'Fetching market data');
  const market = await deps.market.getMarketSnapshot(identification, condition.grade.id, { signal });
  throwIfCancelled(signal);

  report(7, 'Calculating price');
  const pricing = computePricing(
    { snapshot: market, condition: condition.grade, identification },
    deps.pricing ?? defaultPricingSettings()
  );
  throwIfCancelled(signal);

  report(8, 'Scoring confidence');
  const confidence = scoreConfidence({
    identificationConfidence: identification.confidence,
    conditionConfidence: condition.confidence,
    sampleCount: marketSampleCount(market),
    isFallback: market.isFallback,
  });

  return { market, pricing, confidence };
}

/** Priced item plus the buy-side numbers for sourcing it. */
export async function prospectIdentifiedItem(
  identification: Identification,
  condition: ConditionAssessment,
  deps: Pick<AnalysisDeps, 'market' | 'pricing'>,
  options: ProspectOptions = {}
): Promise<ProspectedItem> {
  const { askingPrice, ...priceOptions } = options;
  const priced = await priceIdentifiedItem(identification, condition, deps, priceOptions);
  const settings = deps.pricing ?? defaultPricingSettings();
  const prospect = analyzeProspect({
    snapshot: priced.market,
    pricing: priced.pricing,
    condition: condition.grade,
    identification,
    fees: settings.fees,
    askingPrice,
  });
  return { ...priced, prospect };
}

export async function analyzeItem(
  request: AnalysisRequest,
  deps: AnalysisDeps,
  options: AnalysisOptions = {}
): Promise<AnalysisResult> {
  const { signal, onProgress } = options;
  const log = deps.logger ?? createLogger('analysis');
  const report = (step: number, status: string) => {
    onProgress?.({ step, totalSteps: TOTAL_STEPS, status });
  };

  throwIfCancelled(signal);
  report(1, 'Validating input');
  const images = cleanList(request.images);
  const barcodeInput = (request.barcode ?? '').trim();
  if (images.length === 0 && !barcodeInput) {
    log.warn('Rejecting analysis without images or barcode');
    return {
      ok: false,
      error: 'NO_INPUT',
      identification: inputErrorIdentification('Provide at least one photo or a barcode'),
    };
  }

  report(2, 'Looking up barcode');
  let barcode: BarcodeProduct | null = null;
  if (barcodeInput) {
    try {
      barcode = await raceAbort(deps.barcodeLookup.lookup(barcodeInput), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      log.warn('Barcode lookup failed', { error: errorMessage(err) });
    }
  }
  throwIfCancelled(signal);

  report(3, 'Reading text');
  const texts = cleanList(request.texts);
  if (barcodeInput) texts.push(barcodeInput);
  const textSignals = classifyTextSignals(texts);

  report(4, 'Identifying item');
  let guess: RawIdentificationGuess | null = null;
  if (images.length > 0) {
    try {
      guess = await raceAbort(deps.identifier.identify(images, texts), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      log.warn('Identification provider failed', { error: errorMessage(err) });
    }
  }
  throwIfCancelled(signal);
  if (!isUsableGuess(guess) && barcode) {
    guess = barcodeGuess(barcode);
  }
  const identification = aggregateIdentification(guess, textSignals, request.categoryHint);
  log.info(`Identified "${identification.productName}"`, {
    method: identification.method,
    confidence: identification.confidence,
  });

  report(5, 'Assessing condition');
  let description: ConditionDescription | null = null;
  if (images.length > 0) {
    try {
      description = await raceAbort(deps.conditionProvider.describeCondition(images), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      log.warn('Condition provider failed', { error: errorMessage(err) });
    }
  }
  throwIfCancelled(signal);
  const notes = (request.conditionNotes ?? '').trim();
  const condition =
    notes || description
      ? assessCondition(notes || description?.narrative, description?.factors)
      : UNKNOWN_CONDITION;

  const priced = await priceIdentifiedItem(identification, condition, deps, { signal, report });
  log.info(`Priced "${identification.productName}" at $${priced.pricing.recommendedPrice.toFixed(2)}`, {
    dataQuality: priced.confidence.dataQualityGrade,
  });

  return {
    ok: true,
    identification,
    condition,
    barcode,
    textSignals,
    ...priced,
  };
}

export interface MarketStore extends MarketDataSource {
  invalidate(key?: string): number;
  size(): number;
}

export interface Engine {
  readonly market: MarketStore;
  analyze(request: AnalysisRequest, options?: AnalysisOptions): Promise<AnalysisResult>;
  price(
    identification: Identification,
    condition: ConditionAssessment,
    options?: Omit<AnalysisOptions, 'onProgress'>
  ): Promise<PricedItem>;
  prospect(
    identification: Identification,
    condition: ConditionAssessment,
    options?: ProspectOptions
  ): Promise<ProspectedItem>;
}

export function engineFromDeps(deps: AnalysisDeps & { market: MarketStore }): Engine {
  return {
    market: deps.market,
    analyze: (request, options) => analyzeItem(request, deps, options),
    price: (identification, condition, options) => priceIdentifiedItem(identification, condition, deps, options),
    prospect: (identification, condition, options) =>
      prospectIdentifiedItem(identification, condition, deps, options),
  };
}

/** Wire the default providers and one market cache for this process. */
export function createEngine(config: AppConfig = cfg): Engine {
  const vision = new OpenAIVisionProvider({
    apiKey: config.vision.apiKey,
    model: config.vision.model,
    timeoutMs: config.vision.timeoutMs,
  });
  const market = new MarketDataAggregator({
    sources: [
      new EbayFindingSource({ appId: config.ebay.appId, sandbox: config.ebay.sandbox }),
      new SearchApiSource({ apiKey: config.searchApi.key }),
    ],
    ttlMs: config.market.cacheTtlHours * 60 * 60 * 1000,
    windowDays: config.market.windowDays,
    fallbackPrice: config.market.fallbackPrice,
    sourceTimeoutMs: config.market.sourceTimeoutMs,
  });

  return engineFromDeps({
    identifier: vision,
    conditionProvider: vision,
    barcodeLookup: new HttpBarcodeLookup({ timeoutMs: config.barcode.timeoutMs }),
    market,
    pricing: defaultPricingSettings(config.pricing),
  });
}
