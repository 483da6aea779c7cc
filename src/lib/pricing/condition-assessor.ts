import {
  CONDITION_GRADES,
  DEFAULT_CONDITION_GRADE,
  DEFAULT_CONDITION_GRADE_ID,
  SEVERITY_WEIGHTS,
  getConditionGrade,
} from './condition-grades.js';
import type { ConditionAssessment, ConditionFactor, ConditionGradeId, Severity } from './types.js';

export const MATCHED_CONFIDENCE = 0.85;
export const EXACT_LABEL_CONFIDENCE = 0.9;
export const UNMATCHED_CONFIDENCE = 0.5;

/**
 * Phrase → grade table, most specific phrase first. The first phrase found
 * anywhere in the text decides the grade, so "new with tags" must precede
 * "new", "very good" must precede "good" and "never used" must precede "used".
 */
const CONDITION_PHRASES: readonly (readonly [string, ConditionGradeId])[] = [
  ['for parts', 'for-parts-not-working'],
  ['not working', 'for-parts-not-working'],
  ['does not work', 'for-parts-not-working'],
  ['new with tags', 'new-with-tags'],
  ['nwt', 'new-with-tags'],
  ['new in box', 'new-with-tags'],
  ['new with box', 'new-with-tags'],
  ['nib', 'new-with-tags'],
  ['deadstock', 'new-with-tags'],
  ['new without tags', 'new-without-tags'],
  ['new without box', 'new-without-tags'],
  ['nwot', 'new-without-tags'],
  ['new with defects', 'new-other'],
  ['new other', 'new-other'],
  ['open box', 'new-other'],
  ['like new', 'like-new'],
  ['mint', 'like-new'],
  ['excellent', 'excellent'],
  ['very good', 'very-good'],
  ['vgc', 'very-good'],
  ['brand new', 'new-without-tags'],
  ['never used', 'new-without-tags'],
  ['never worn', 'new-without-tags'],
  ['unused', 'new-without-tags'],
  ['unworn', 'new-without-tags'],
  ['good', 'good'],
  ['pre owned', 'good'],
  ['used', 'good'],
  ['acceptable', 'acceptable'],
  ['fair', 'acceptable'],
  ['poor', 'acceptable'],
  ['heavily worn', 'acceptable'],
  ['new', 'new-without-tags'],
];

const SEVERITIES: readonly Severity[] = ['minor', 'moderate', 'major', 'critical'];

function normalizePhrase(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

interface PhraseMatch {
  grade: ConditionGradeId;
  phrase: string;
}

function matchPhrase(text: string): PhraseMatch | null {
  const normalized = normalizePhrase(text);
  if (!normalized) return null;
  const padded = ` ${normalized} `;
  for (const [phrase, grade] of CONDITION_PHRASES) {
    if (padded.includes(` ${phrase} `)) {
      return { grade, phrase };
    }
  }
  return null;
}

/**
 * Map a listing's free-text condition label (e.g. "Pre-Owned", "New with box")
 * onto the grade ladder; unrecognized labels land on the middle grade.
 */
export function mapConditionLabel(label: string | null | undefined): ConditionGradeId {
  if (!label) return DEFAULT_CONDITION_GRADE_ID;
  return matchPhrase(label)?.grade ?? DEFAULT_CONDITION_GRADE_ID;
}

export interface RawConditionFactor {
  area?: string;
  issue?: string;
  severity?: string;
  valueImpactPercent?: number;
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Keep factors that name a known severity, clamp the impact to 0-100 and order
 * them by display weight (most severe first).
 */
export function normalizeFactors(raw: readonly RawConditionFactor[] | null | undefined): readonly ConditionFactor[] {
  if (!raw) return Object.freeze([]);
  const factors: ConditionFactor[] = [];
  for (const item of raw) {
    const severity = (item.severity ?? '').trim().toLowerCase();
    if (!isSeverity(severity)) continue;
    const impact = Number(item.valueImpactPercent ?? 0);
    factors.push(
      Object.freeze({
        area: (item.area ?? '').trim() || 'overall',
        issue: (item.issue ?? '').trim() || 'unspecified',
        severity,
        valueImpactPercent: Number.isFinite(impact) ? Math.max(0, Math.min(100, impact)) : 0,
      })
    );
  }
  factors.sort((a, b) => SEVERITY_WEIGHTS[b.severity] - SEVERITY_WEIGHTS[a.severity]);
  return Object.freeze(factors);
}

/**
 * Turn a condition narrative into a grade.
 *
 * - exact eBay label ("Very good") → confidence 0.9
 * - phrase found in the narrative → confidence 0.85
 * - non-empty but unrecognized → "good", confidence 0.5
 * - empty → "good", confidence 0
 */
export function assessCondition(
  narrative: string | null | undefined,
  factors?: readonly RawConditionFactor[] | null
): ConditionAssessment {
  const normalizedFactors = normalizeFactors(factors);
  const text = (narrative ?? '').trim();

  if (!text) {
    return Object.freeze({
      grade: DEFAULT_CONDITION_GRADE,
      confidence: 0,
      factors: normalizedFactors,
      matchedPhrase: null,
    });
  }

  const exact = CONDITION_GRADES.find((grade) => normalizePhrase(grade.label) === normalizePhrase(text));
  if (exact) {
    return Object.freeze({
      grade: exact,
      confidence: EXACT_LABEL_CONFIDENCE,
      factors: normalizedFactors,
      matchedPhrase: normalizePhrase(exact.label),
    });
  }

  const match = matchPhrase(text);
  if (!match) {
    return Object.freeze({
      grade: DEFAULT_CONDITION_GRADE,
      confidence: UNMATCHED_CONFIDENCE,
      factors: normalizedFactors,
      matchedPhrase: null,
    });
  }

  return Object.freeze({
    grade: getConditionGrade(match.grade),
    confidence: MATCHED_CONFIDENCE,
    factors: normalizedFactors,
    matchedPhrase: match.phrase,
  });
}

/** Sentinel used when the condition provider is unavailable. */
export const UNKNOWN_CONDITION: ConditionAssessment = assessCondition(null);
