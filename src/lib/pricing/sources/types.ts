import type { ConditionGradeId, SoldListing, SoldListingQuery } from '../types.js';

/**
 * A provider of completed ("sold") listings.
 *
 * `search` rejects on transport, HTTP or payload errors; the aggregator turns
 * those into a failed SourceReport. Malformed individual items are dropped
 * silently by the source itself.
 */
export interface SoldListingSource {
  readonly name: string;
  isConfigured(): boolean;
  search(query: SoldListingQuery, signal: AbortSignal): Promise<SoldListing[]>;
}

export type ConditionGroup = 'new' | 'used' | 'parts';

export function conditionGroup(grade: ConditionGradeId): ConditionGroup {
  switch (grade) {
    case 'new-with-tags':
    case 'new-without-tags':
    case 'new-other':
      return 'new';
    case 'for-parts-not-working':
      return 'parts';
    default:
      return 'used';
  }
}

/** Parse "$1,234.56", "1234.5" or a number into a positive price, else null. */
export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? Math.round(value * 100) / 100 : null;
  }
  if (typeof value !== 'string') return null;
  const match = value.replace(/,/g, '').match(/\d+(?:\.\d+)?/);
  if (!match) return null;
  return parsePrice(parseFloat(match[0]));
}
