/**
 * Market Context Builder
 *
 * Derives population density, income level, foot traffic, rent level and the
 * seasonal factor from raw area counts. Missing or invalid counts become 0.
 */

import {
  clamp01,
  type BusinessId,
  type FeatureTag,
  type IncomeLevel,
  type MarketContext,
} from '../contracts/site-decision.types.js';
import type { SeasonalCalendar } from './seasonal.calendar.js';

export interface AreaSignals {
  osmCounts: Partial<Record<FeatureTag, number>>;
  categoryCounts: Record<BusinessId, number>;
}

export interface ContextOptions {
  /** 1..12 */
  month: number;
  customerTarget?: string;
  /** Overrides the derived rent level. */
  rentLevel?: number;
}

export const PEOPLE_PER_RESIDENTIAL_BUILDING = 150;

function sanitizeCount(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

export function sanitizeOsmCounts(raw: Partial<Record<FeatureTag, number>>): Record<FeatureTag, number> {
  return {
    school: sanitizeCount(raw.school),
    hospital: sanitizeCount(raw.hospital),
    pharmacy: sanitizeCount(raw.pharmacy),
    police: sanitizeCount(raw.police),
    bus_stop: sanitizeCount(raw.bus_stop),
    subway: sanitizeCount(raw.subway),
    park: sanitizeCount(raw.park),
    office: sanitizeCount(raw.office),
    residential: sanitizeCount(raw.residential),
  };
}

export function sanitizeCategoryCounts(raw: Record<BusinessId, number>): Record<BusinessId, number> {
  const out: Record<BusinessId, number> = {};
  for (const [id, n] of Object.entries(raw)) out[id] = sanitizeCount(n);
  return out;
}

export function estimatePopulationDensity(osm: Record<FeatureTag, number>): number {
  return osm.residential * PEOPLE_PER_RESIDENTIAL_BUILDING;
}

export function estimateIncomeLevel(osm: Record<FeatureTag, number>): IncomeLevel {
  const officeRatio = osm.office / Math.max(osm.residential, 1);
  if (officeRatio > 0.3) return 'high';
  if (officeRatio > 0.1) return 'medium';
  return 'low';
}

export function estimateFootTraffic(osm: Record<FeatureTag, number>): number {
  const transit = Math.min((osm.bus_stop + 2 * osm.subway) / 5, 1);
  const destinations = Math.min((osm.school + osm.office + osm.park) / 10, 1);
  return clamp01(0.5 * transit + 0.5 * destinations);
}

export function estimateRentLevel(osm: Record<FeatureTag, number>): number {
  const activity = osm.office + 2 * osm.subway;
  if (activity <= 3) return 1;
  if (activity <= 8) return 2;
  if (activity <= 15) return 3;
  return 4;
}

export function buildMarketContext(
  signals: AreaSignals,
  calendar: SeasonalCalendar,
  options: ContextOptions,
): MarketContext {
  const osm = sanitizeOsmCounts(signals.osmCounts);
  const rent = options.rentLevel ?? estimateRentLevel(osm);
  return {
    osmCounts: osm,
    categoryCounts: sanitizeCategoryCounts(signals.categoryCounts),
    populationDensity: estimatePopulationDensity(osm),
    incomeLevel: estimateIncomeLevel(osm),
    footTrafficScore: estimateFootTraffic(osm),
    rentLevel: Math.max(1, Math.min(4, rent)),
    seasonalFactor: calendar.segmentFactor(options.customerTarget ?? 'general', options.month),
  };
}
