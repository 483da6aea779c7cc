/* confidence.ts – overall confidence and data-quality grade for one analysis */

import type { ConfidenceReport, DataQuality, MarketSnapshot } from './types.js';

export const FULL_CONFIDENCE_SAMPLES = 50;
export const LOW_IDENTIFICATION_CONFIDENCE = 0.6;
export const LOW_CONDITION_CONFIDENCE = 0.5;

export type ReviewReason =
  | 'lowIdentificationConfidence'
  | 'lowConditionConfidence'
  | 'fallbackMarketData'
  | 'sparseMarketData';

export interface ConfidenceInput {
  identificationConfidence: number;
  conditionConfidence: number;
  sampleCount: number;
  isFallback?: boolean;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(1, value);
}

function validCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/** Same thresholds as search-volume bucketing, applied on their own. */
export function gradeDataQuality(sampleCount: number): DataQuality {
  const count = validCount(sampleCount);
  if (count >= 50) return 'excellent';
  if (count >= 20) return 'good';
  if (count >= 5) return 'fair';
  if (count >= 1) return 'limited';
  return 'insufficient';
}

/** Real sold listings behind a snapshot; the synthetic fallback counts as none. */
export function marketSampleCount(snapshot: Pick<MarketSnapshot, 'soldCount' | 'isFallback'>): number {
  return snapshot.isFallback ? 0 : snapshot.soldCount;
}

export function scoreConfidence(input: ConfidenceInput): ConfidenceReport {
  const identification = clamp01(input.identificationConfidence);
  const condition = clamp01(input.conditionConfidence);
  const sampleCount = validCount(input.sampleCount);
  const dataQuality = Math.min(1, sampleCount / FULL_CONFIDENCE_SAMPLES);
  const dataQualityGrade = gradeDataQuality(sampleCount);

  const reviewReasons: ReviewReason[] = [];
  if (identification < LOW_IDENTIFICATION_CONFIDENCE) reviewReasons.push('lowIdentificationConfidence');
  if (condition < LOW_CONDITION_CONFIDENCE) reviewReasons.push('lowConditionConfidence');
  if (input.isFallback) reviewReasons.push('fallbackMarketData');
  if (dataQualityGrade === 'limited') reviewReasons.push('sparseMarketData');

  return {
    overall: clamp01((identification + condition + dataQuality) / 3),
    identification,
    condition,
    dataQuality,
    dataQualityGrade,
    reviewReasons,
  };
}
