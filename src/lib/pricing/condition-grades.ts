import type { ConditionGrade, ConditionGradeId, Severity } from './types.js';

/**
 * eBay-style condition ladder, best to worst. Index order is the grade order.
 */
const GRADES: ConditionGrade[] = [
  {
    id: 'new-with-tags',
    label: 'New with tags',
    multiplier: 1.0,
    description: 'Brand-new, unused and unworn, in original packaging or with original tags attached',
    ebayConditionId: '1000',
  },
  {
    id: 'new-without-tags',
    label: 'New without tags',
    multiplier: 0.95,
    description: 'Brand-new and unused, tags or original packaging missing',
    ebayConditionId: '1500',
  },
  {
    id: 'new-other',
    label: 'New other',
    multiplier: 0.9,
    description: 'New and unused, may have factory seconds or small store defects',
    ebayConditionId: '1750',
  },
  {
    id: 'like-new',
    label: 'Like new',
    multiplier: 0.85,
    description: 'Used once or twice, no visible signs of wear',
    ebayConditionId: '2000',
  },
  {
    id: 'excellent',
    label: 'Excellent',
    multiplier: 0.8,
    description: 'Light use, minimal wear only visible on close inspection',
    ebayConditionId: '2500',
  },
  {
    id: 'very-good',
    label: 'Very good',
    multiplier: 0.7,
    description: 'Moderate use with minor cosmetic wear, fully functional',
    ebayConditionId: '3000',
  },
  {
    id: 'good',
    label: 'Good',
    multiplier: 0.6,
    description: 'Visible wear from regular use, fully functional',
    ebayConditionId: '4000',
  },
  {
    id: 'acceptable',
    label: 'Acceptable',
    multiplier: 0.45,
    description: 'Heavy wear, cosmetic damage or missing non-essential parts',
    ebayConditionId: '5000',
  },
  {
    id: 'for-parts-not-working',
    label: 'For parts or not working',
    multiplier: 0.25,
    description: 'Does not function as intended or is damaged beyond normal use',
    ebayConditionId: '7000',
  },
];

export const CONDITION_GRADES: readonly ConditionGrade[] = Object.freeze(GRADES.map((grade) => Object.freeze(grade)));

const BY_ID = new Map<ConditionGradeId, ConditionGrade>(CONDITION_GRADES.map((g) => [g.id, g]));

/** Middle of the ladder; the answer whenever condition cannot be determined. */
export const DEFAULT_CONDITION_GRADE_ID: ConditionGradeId = 'good';

export function getConditionGrade(id: ConditionGradeId): ConditionGrade {
  const grade = BY_ID.get(id);
  if (!grade) {
    throw new Error(`Unknown condition grade: ${id}`);
  }
  return grade;
}

export function isConditionGradeId(value: string): value is ConditionGradeId {
  return CONDITION_GRADES.some((grade) => grade.id === value);
}

export const DEFAULT_CONDITION_GRADE: ConditionGrade = getConditionGrade(DEFAULT_CONDITION_GRADE_ID);

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = Object.freeze({
  minor: 1,
  moderate: 2,
  major: 3,
  critical: 4,
});

export function isPremiumGrade(id: ConditionGradeId): boolean {
  return id === 'new-with-tags' || id === 'like-new';
}
