import { describe, it, expect } from 'vitest';
import { SeasonalCalendar } from '../engine/seasonal.calendar.js';
import { catalog } from './helpers.js';

const calendar = new SeasonalCalendar(catalog);

describe('SeasonalCalendar factors', () => {
  it('reads segment rows and falls back to the general row', () => {
    expect(calendar.segmentFactor('student', 9)).toBe(1.5);
    expect(calendar.segmentFactor('astronaut', 12)).toBe(1.4);
  });

  it('defaults a business without a row to 1', () => {
    expect(calendar.businessFactor('ice_cream', 7)).toBe(1.5);
    expect(calendar.businessFactor('laundry', 7)).toBe(1);
  });

  it('multiplies overlapping weather periods', () => {
    expect(calendar.weatherFactor('ice_cream', 5)).toBeCloseTo(1.08, 10);
    expect(calendar.weatherFactor('ice_cream', 1)).toBe(0.4);
  });

  it('takes the strongest holiday and never goes below 1', () => {
    expect(calendar.holidayFactor('cafe', 2)).toBe(1.5);
    expect(calendar.holidayFactor('pharmacy', 2)).toBe(1);
  });

  it('blends the four factors', () => {
    // 0.9·0.3 + 1.5·0.4 + 0.6·0.2 + 1·0.1
    expect(calendar.combinedAdjustment('ice_cream', 'general', 7)).toBeCloseTo(1.09, 10);
  });

  it('rejects months outside 1..12', () => {
    expect(() => calendar.segmentFactor('general', 13)).toThrow(RangeError);
    expect(() => calendar.businessFactor('cafe', 0)).toThrow(RangeError);
  });
});

describe('SeasonalCalendar.outlook', () => {
  it('summarizes a strongly seasonal business', () => {
    const outlook = calendar.outlook('ice_cream', 'general', 4);

    expect(outlook.seasonalityLevel).toBe('high');
    expect(outlook.seasonalityIndex).toBe(2.21);
    expect(outlook.bestMonths).toEqual([4, 5, 7]);
    expect(outlook.worstMonths).toEqual([12, 2, 1]);
    expect(outlook.peakSeasonPotential).toBe(1.26);
    expect(outlook.lowSeasonChallenge).toBe(0.57);
    expect(outlook.meanFactor).toBeCloseTo(0.96, 1);
    expect(outlook.recommendations).toEqual([
      'Plan cash reserves for the low season',
      'Diversify products to smooth seasonal swings',
      'Make the most of peak months',
      'Peak months 4, 5, 7: increase marketing and stock',
      'Low months 12, 2, 1: cut costs and schedule maintenance',
    ]);
    expect(outlook.monthAdvice).toBe('Current month is strong: focus on sales');
  });

  it('gives advice for the current month', () => {
    expect(calendar.outlook('ice_cream', 'general', 1).monthAdvice).toBe('Current month is weak: keep costs tight');
    expect(calendar.outlook('ice_cream', 'general', 9).monthAdvice).toBe(
      'Current month is average: keep operations steady',
    );
  });
});

describe('SeasonalCalendar.forecastDemand', () => {
  it('wraps into the next year with a trend uplift', () => {
    const points = calendar.forecastDemand('cafe', 'general', 11, 100, 3);

    expect(points.map((p) => [p.month, p.yearOffset])).toEqual([
      [11, 0],
      [12, 0],
      [1, 1],
    ]);
    // (0.27 + 0.36 + 0.2 + 0.13) × 1.02
    expect(points[2].seasonalFactor).toBe(0.96);
    expect(points[2].forecastedDemand).toBe(97.9);
    expect(points[2].demandLevel).toBe('normal');
  });
});
