import { classifyCompetition, classifySearchVolume, estimateDemand } from '../../../src/lib/pricing/demand';
import type { SoldListing } from '../../../src/lib/pricing/types';

function sold(overrides: Partial<SoldListing> = {}): SoldListing {
  return {
    title: 'Stanley Quencher 40oz',
    price: 30,
    conditionLabel: 'Pre-Owned',
    soldDate: new Date('2026-03-01T00:00:00Z'),
    isAuction: false,
    source: 'test',
    ...overrides,
  };
}

describe('demand', () => {
  it('uses defaults for an empty market', () => {
    expect(estimateDemand([])).toEqual({
      averageWatchers: 5,
      averageSaleDurationDays: 14,
      searchVolume: 'low',
      competitionLevel: 'low',
    });
  });

  it('averages only the listings that report watchers', () => {
    const result = estimateDemand([sold({ watcherCount: 3 }), sold({ watcherCount: 8 }), sold()]);
    expect(result.averageWatchers).toBe(5.5);
  });

  it('weights sale duration by auction share', () => {
    expect(estimateDemand([sold({ isAuction: true }), sold()]).averageSaleDurationDays).toBe(14);
    expect(estimateDemand([sold({ isAuction: true }), sold(), sold()]).averageSaleDurationDays).toBe(16.3);
    expect(estimateDemand([sold({ isAuction: true })]).averageSaleDurationDays).toBe(7);
  });

  it('buckets search volume at 10 and 50', () => {
    expect(classifySearchVolume(9)).toBe('low');
    expect(classifySearchVolume(10)).toBe('medium');
    expect(classifySearchVolume(49)).toBe('medium');
    expect(classifySearchVolume(50)).toBe('high');
  });

  it('buckets competition at 5, 20 and 50', () => {
    expect(classifyCompetition(0)).toBe('low');
    expect(classifyCompetition(5)).toBe('low');
    expect(classifyCompetition(6)).toBe('moderate');
    expect(classifyCompetition(20)).toBe('moderate');
    expect(classifyCompetition(21)).toBe('high');
    expect(classifyCompetition(50)).toBe('high');
    expect(classifyCompetition(51)).toBe('saturated');
  });

  it('classifies from the listing count', () => {
    const listings = Array.from({ length: 12 }, () => sold());
    expect(estimateDemand(listings)).toMatchObject({ searchVolume: 'medium', competitionLevel: 'moderate' });
  });
});
