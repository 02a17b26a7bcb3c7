/**
 * Seasonal Calendar
 *
 * Month multipliers by customer segment and business, plus weather and
 * holiday effects. Months are 1..12.
 */

import type { SiteCatalog } from '../catalog/catalog.loader.js';
import { ownValue, round, type BusinessId } from '../contracts/site-decision.types.js';

export type SeasonalityLevel = 'low' | 'moderate' | 'high';

export interface SeasonalOutlook {
  businessId: BusinessId;
  customerTarget: string;
  seasonalityLevel: SeasonalityLevel;
  seasonalityIndex: number;
  meanFactor: number;
  bestMonths: number[];
  worstMonths: number[];
  yearlyProfile: Record<number, number>;
  recommendations: string[];
  monthAdvice: string;
  peakSeasonPotential: number;
  lowSeasonChallenge: number;
}

export interface DemandForecastPoint {
  month: number;
  yearOffset: number;
  seasonalFactor: number;
  forecastedDemand: number;
  demandLevel: 'high' | 'normal' | 'low';
}

const MIN_COMBINED = 0.3;
const MAX_COMBINED = 2.0;
const ANNUAL_TREND = 0.02;

function assertMonth(month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer in 1..12, got ${month}`);
  }
  return month;
}

export class SeasonalCalendar {
  constructor(private readonly catalog: SiteCatalog) {}

  /**
   * Segment multiplier; unknown segments use the general row.
   */
  segmentFactor(customerTarget: string, month: number): number {
    const m = assertMonth(month);
    const rows = this.catalog.seasonal.segments;
    const row = ownValue(rows, customerTarget) ?? rows.general;
    return row?.[m - 1] ?? 1.0;
  }

  businessFactor(businessId: BusinessId, month: number): number {
    const m = assertMonth(month);
    return ownValue(this.catalog.seasonal.businesses, businessId)?.[m - 1] ?? 1.0;
  }

  weatherFactor(businessId: BusinessId, month: number): number {
    const m = assertMonth(month);
    let factor = 1.0;
    for (const period of Object.values(this.catalog.seasonal.weather)) {
      if (period.months.includes(m)) factor *= ownValue(period.impacts, businessId) ?? 1.0;
    }
    return factor;
  }

  /**
   * Strongest holiday impact in the month, never below 1.
   */
  holidayFactor(businessId: BusinessId, month: number): number {
    const m = assertMonth(month);
    let factor = 1.0;
    for (const holiday of Object.values(this.catalog.seasonal.holidays)) {
      if (holiday.months.includes(m)) factor = Math.max(factor, ownValue(holiday.impacts, businessId) ?? 1.0);
    }
    return factor;
  }

  combinedAdjustment(businessId: BusinessId, customerTarget: string, month: number): number {
    const combined =
      this.segmentFactor(customerTarget, month) * 0.3 +
      this.businessFactor(businessId, month) * 0.4 +
      this.weatherFactor(businessId, month) * 0.2 +
      this.holidayFactor(businessId, month) * 0.1;
    return Math.max(MIN_COMBINED, Math.min(MAX_COMBINED, combined));
  }

  yearlyProfile(businessId: BusinessId, customerTarget = 'general'): Record<number, number> {
    const profile: Record<number, number> = {};
    for (let m = 1; m <= 12; m++) profile[m] = this.combinedAdjustment(businessId, customerTarget, m);
    return profile;
  }

  /**
   * Months sorted by factor, strongest first. Ties keep calendar order.
   */
  peakMonths(businessId: BusinessId, customerTarget = 'general'): Array<{ month: number; factor: number }> {
    const profile = this.yearlyProfile(businessId, customerTarget);
    return Object.entries(profile)
      .map(([month, factor]) => ({ month: Number(month), factor }))
      .sort((a, b) => b.factor - a.factor);
  }

  outlook(businessId: BusinessId, customerTarget = 'general', currentMonth: number): SeasonalOutlook {
    const profile = this.yearlyProfile(businessId, customerTarget);
    const peaks = this.peakMonths(businessId, customerTarget);
    const values = Object.values(profile);
    const max = Math.max(...values);
    const min = Math.min(...values);
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const index = max / min;

    const level: SeasonalityLevel = index < 1.3 ? 'low' : index < 1.8 ? 'moderate' : 'high';
    const bestMonths = peaks.slice(0, 3).map((p) => p.month);
    const worstMonths = peaks.slice(-3).map((p) => p.month);

    const recommendations: string[] = [];
    if (level === 'high') {
      recommendations.push(
        'Plan cash reserves for the low season',
        'Diversify products to smooth seasonal swings',
        'Make the most of peak months',
      );
    }
    recommendations.push(
      `Peak months ${bestMonths.join(', ')}: increase marketing and stock`,
      `Low months ${worstMonths.join(', ')}: cut costs and schedule maintenance`,
    );

    const current = profile[assertMonth(currentMonth)] ?? mean;
    const monthAdvice =
      current > mean * 1.2
        ? 'Current month is strong: focus on sales'
        : current < mean * 0.8
          ? 'Current month is weak: keep costs tight'
          : 'Current month is average: keep operations steady';

    return {
      businessId,
      customerTarget,
      seasonalityLevel: level,
      seasonalityIndex: round(index, 2),
      meanFactor: round(mean, 2),
      bestMonths,
      worstMonths,
      yearlyProfile: profile,
      recommendations,
      monthAdvice,
      peakSeasonPotential: round(max, 2),
      lowSeasonChallenge: round(min, 2),
    };
  }

  forecastDemand(
    businessId: BusinessId,
    customerTarget: string,
    startMonth: number,
    baseDemand = 100,
    monthsAhead = 12,
  ): DemandForecastPoint[] {
    const start = assertMonth(startMonth);
    const points: DemandForecastPoint[] = [];
    for (let i = 0; i < monthsAhead; i++) {
      const month = ((start + i - 1) % 12) + 1;
      const yearOffset = Math.floor((start + i - 1) / 12);
      const factor = this.combinedAdjustment(businessId, customerTarget, month);
      const demand = baseDemand * factor * (1 + yearOffset * ANNUAL_TREND);
      points.push({
        month,
        yearOffset,
        seasonalFactor: round(factor, 3),
        forecastedDemand: round(demand, 1),
        demandLevel: demand > baseDemand * 1.2 ? 'high' : demand < baseDemand * 0.8 ? 'low' : 'normal',
      });
    }
    return points;
  }
}
