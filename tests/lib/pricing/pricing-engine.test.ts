import { CONDITION_GRADES, getConditionGrade } from '../../../src/lib/pricing/condition-grades';
import {
  categoryMultiplier,
  clampPriceFloor,
  clampQuickSaleFactor,
  COMPETITION_MULTIPLIERS,
  computePricing,
  estimateNetProceeds,
  MAX_PROFIT_FACTOR,
} from '../../../src/lib/pricing/pricing-engine';
import type { PricingSettings } from '../../../src/lib/pricing/pricing-engine';
import type { CompetitionLevel, ItemCategory, MarketSnapshot, TrendAnalysis } from '../../../src/lib/pricing/types';

const STABLE: TrendAnalysis = {
  direction: 'stable',
  strength: 'weak',
  percentChange: 1.2,
  timeframe: '30 days',
  seasonal: { isHolidaySeason: false, note: 'Standard patterns' },
};

function snapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    key: 'nike|air force 1 low|10_very-good',
    query: 'Nike Air Force 1 Low 10',
    conditionGrade: 'very-good',
    listings: [],
    soldCount: 52,
    priceDistribution: {},
    averagePrice: 200,
    priceRange: { low: 120, high: 260 },
    trend: STABLE,
    demand: { averageWatchers: 5, averageSaleDurationDays: 14, searchVolume: 'high', competitionLevel: 'saturated' },
    competitionLevel: 'saturated',
    sources: [],
    isFallback: false,
    lastUpdated: new Date('2026-03-15T12:00:00Z'),
    ...overrides,
  };
}

function isCompetitionLevel(value: string): value is CompetitionLevel {
  return value in COMPETITION_MULTIPLIERS;
}

const SETTINGS: PricingSettings = {
  floor: 5,
  quickSaleFactor: 0.85,
  fees: { finalValueFeeRate: 0.1, perOrderFee: 0.3, shippingCost: 0 },
};

describe('pricing-engine', () => {
  it('multiplies average by condition and competition', () => {
    const result = computePricing(
      {
        snapshot: snapshot(),
        condition: getConditionGrade('very-good'),
        identification: { brand: 'Nike', category: 'sneakers' },
      },
      SETTINGS
    );

    expect(result.recommendedPrice).toBe(126);
    expect(result.quickSalePrice).toBe(107.1);
    expect(result.maxProfitPrice).toBe(144.9);
    expect(result.strategy).toBe('competitive');
    expect(result.multipliers).toEqual({ condition: 0.7, competition: 0.9, category: 1, brand: 1 });
    expect(result.priceRange).toEqual({ low: 120, high: 260 });
    expect(result.netProceeds.recommended).toBe(113.1);
    expect(result.justifications).toEqual([
      'Based on 52 recent sold listings averaging $200.00',
      'Condition Very good (×0.70)',
      'Competition is saturated (×0.90)',
      'Prices have been stable over 30 days',
    ]);
  });

  it('applies brand premiums and marks premium grades', () => {
    const result = computePricing(
      {
        snapshot: snapshot({ averagePrice: 100, competitionLevel: 'moderate' }),
        condition: getConditionGrade('new-with-tags'),
        identification: { brand: 'jordan', category: 'sneakers' },
      },
      SETTINGS
    );
    expect(result.recommendedPrice).toBe(110);
    expect(result.strategy).toBe('premium');
    expect(result.justifications).toContain('Brand adjustment for Jordan (×1.10)');
  });

  it('applies category adjustments', () => {
    const result = computePricing(
      {
        snapshot: snapshot({ averagePrice: 100, competitionLevel: 'moderate' }),
        condition: getConditionGrade('new-with-tags'),
        identification: { brand: 'Apple', category: 'electronics' },
      },
      SETTINGS
    );
    expect(result.recommendedPrice).toBe(90);
    expect(result.justifications).toContain('Category adjustment for electronics (×0.90)');
    expect(categoryMultiplier('other')).toBe(1);
  });

  it('raises tiny prices to the floor and widens sparse ranges', () => {
    const result = computePricing(
      {
        snapshot: snapshot({ averagePrice: 4, soldCount: 3, competitionLevel: 'low' }),
        condition: getConditionGrade('good'),
        identification: { brand: '', category: 'other' },
      },
      SETTINGS
    );
    expect(result.recommendedPrice).toBe(5);
    expect(result.quickSalePrice).toBe(4.25);
    expect(result.maxProfitPrice).toBe(5.75);
    expect(result.priceRange).toEqual({ low: 3.5, high: 6.5 });
    expect(result.justifications[result.justifications.length - 1]).toBe('Raised to the $5.00 minimum price');
  });

  it('explains a fallback estimate', () => {
    const result = computePricing(
      {
        snapshot: snapshot({
          averagePrice: 20,
          soldCount: 1,
          isFallback: true,
          competitionLevel: 'low',
          priceRange: { low: 20, high: 20 },
        }),
        condition: getConditionGrade('good'),
        identification: { brand: '', category: 'other' },
      },
      SETTINGS
    );
    expect(result.recommendedPrice).toBe(13.2);
    expect(result.priceRange).toEqual({ low: 9.24, high: 17.16 });
    expect(result.justifications[0]).toBe(
      'No recent sold listings found; starting from a conservative $20.00 estimate'
    );
  });

  it('describes a moving trend and the holiday season', () => {
    const result = computePricing(
      {
        snapshot: snapshot({
          trend: {
            direction: 'increasing',
            strength: 'strong',
            percentChange: 12.5,
            timeframe: '20 days',
            seasonal: { isHolidaySeason: true, note: 'Peak: Nov-Dec (holidays)' },
          },
        }),
        condition: getConditionGrade('very-good'),
        identification: { brand: '', category: 'toys' },
      },
      SETTINGS
    );
    expect(result.justifications.slice(-2)).toEqual([
      'Prices are increasing (strong, +12.5% over 20 days)',
      'Holiday season: demand for this category usually peaks now',
    ]);
  });

  it('keeps the quick-sale factor within bounds', () => {
    expect(clampQuickSaleFactor(0.5)).toBe(0.85);
    expect(clampQuickSaleFactor(0.88)).toBe(0.88);
    expect(clampQuickSaleFactor(0.95)).toBe(0.9);
    expect(clampQuickSaleFactor(Number.NaN)).toBe(0.85);
  });

  it('keeps the floor at one dollar or more', () => {
    expect(clampPriceFloor(0)).toBe(1);
    expect(clampPriceFloor(-3)).toBe(1);
    expect(clampPriceFloor(Number.NaN)).toBe(1);
    expect(clampPriceFloor(7.5)).toBe(7.5);

    const result = computePricing(
      {
        snapshot: snapshot({ averagePrice: 0.01, competitionLevel: 'saturated' }),
        condition: getConditionGrade('for-parts-not-working'),
        identification: { brand: '', category: 'other' },
      },
      { ...SETTINGS, floor: 0 }
    );
    expect(result.recommendedPrice).toBe(1);
    expect(result.quickSalePrice).toBe(0.85);
    expect(result.maxProfitPrice).toBe(1.15);
    expect(result.justifications[result.justifications.length - 1]).toBe('Raised to the $1.00 minimum price');
  });

  it('prices max profit 15% above the recommendation', () => {
    const result = computePricing(
      {
        snapshot: snapshot({ averagePrice: 100, competitionLevel: 'high' }),
        condition: getConditionGrade('good'),
        identification: { brand: '', category: 'other' },
      },
      SETTINGS
    );
    expect(MAX_PROFIT_FACTOR).toBe(1.15);
    expect(result.quickSalePrice).toBe(48.45);
    expect(result.recommendedPrice).toBe(57);
    expect(result.maxProfitPrice).toBe(65.55);
  });

  it('keeps quick sale < recommended < max profit across the whole ladder', () => {
    const averages = [0.01, 0.99, 3, 4.99, 20, 57.33, 100, 999.99];
    const competition = Object.keys(COMPETITION_MULTIPLIERS).filter(isCompetitionLevel);
    const categories: ItemCategory[] = ['other', 'electronics', 'home'];

    for (const averagePrice of averages) {
      for (const level of competition) {
        for (const grade of CONDITION_GRADES) {
          for (const category of categories) {
            for (const floor of [0, 5]) {
              for (const quickSaleFactor of [0.85, 0.9]) {
                const result = computePricing(
                  {
                    snapshot: snapshot({ averagePrice, competitionLevel: level }),
                    condition: grade,
                    identification: { brand: '', category },
                  },
                  { ...SETTINGS, floor, quickSaleFactor }
                );
                const ladder = `${averagePrice}/${level}/${grade.id}/${category}/${floor}/${quickSaleFactor}`;
                expect([ladder, result.quickSalePrice < result.recommendedPrice]).toEqual([ladder, true]);
                expect([ladder, result.recommendedPrice < result.maxProfitPrice]).toEqual([ladder, true]);
              }
            }
          }
        }
      }
    }
  });

  it('estimates net proceeds after fees and shipping', () => {
    expect(estimateNetProceeds(100, { finalValueFeeRate: 0.1325, perOrderFee: 0.3, shippingCost: 0 })).toBe(86.45);
    expect(estimateNetProceeds(50, { finalValueFeeRate: 0.1, perOrderFee: 0.3, shippingCost: 8 })).toBe(36.7);
  });
});
