/**
 * Weight Resolver
 *
 * Business base table (or the default table) adjusted by market condition,
 * location type, experimental scheme or trend signals, then renormalized.
 */

import type { SiteCatalog } from '../catalog/catalog.loader.js';
import {
  FACTORS,
  ownValue,
  type BusinessId,
  type FactorName,
  type LocationType,
  type MarketCondition,
  type WeightMap,
  type WeightScheme,
} from '../contracts/site-decision.types.js';

export type Multipliers = Partial<Record<FactorName, number>>;

export type WeightImportance = 'critical' | 'high' | 'medium' | 'low' | 'minimal';

export interface MarketSignals {
  growthRate?: number;
  unemploymentRate?: number;
  rentTrend?: number;
  infrastructureInvestment?: number;
}

export const WEIGHT_SUM_TOLERANCE = 1e-6;

// ═══════════════════════════════════════════════════════════════
// PURE HELPERS
// ═══════════════════════════════════════════════════════════════

export function weightTotal(weights: WeightMap): number {
  let total = 0;
  for (const f of FACTORS) total += weights[f] ?? 0;
  return total;
}

export function applyMultipliers(weights: WeightMap, multipliers: Multipliers): WeightMap {
  const out: WeightMap = { ...weights };
  for (const f of FACTORS) {
    const w = out[f];
    const m = multipliers[f];
    if (w !== undefined && m !== undefined) out[f] = w * m;
  }
  return out;
}

/**
 * Scale to sum 1. Returns null when the total is zero.
 */
export function normalizeWeights(weights: WeightMap): WeightMap | null {
  const total = weightTotal(weights);
  if (total <= 0) return null;
  const out: WeightMap = {};
  for (const f of FACTORS) {
    const w = weights[f];
    if (w !== undefined) out[f] = w / total;
  }
  return out;
}

export function classifyWeightImportance(weights: WeightMap): Partial<Record<FactorName, WeightImportance>> {
  const out: Partial<Record<FactorName, WeightImportance>> = {};
  for (const f of FACTORS) {
    const w = weights[f];
    if (w === undefined) continue;
    if (w >= 0.2) out[f] = 'critical';
    else if (w >= 0.15) out[f] = 'high';
    else if (w >= 0.1) out[f] = 'medium';
    else if (w >= 0.05) out[f] = 'low';
    else out[f] = 'minimal';
  }
  return out;
}

// ═══════════════════════════════════════════════════════════════
// RESOLVER
// ═══════════════════════════════════════════════════════════════

export class WeightResolver {
  constructor(private readonly catalog: SiteCatalog) {}

  defaultWeights(): WeightMap {
    return { ...this.catalog.weights.default };
  }

  baseWeights(businessId: BusinessId): WeightMap {
    const table = ownValue(this.catalog.weights.businesses, businessId) ?? this.catalog.weights.default;
    return { ...table };
  }

  hasBusinessTable(businessId: BusinessId): boolean {
    return Object.hasOwn(this.catalog.weights.businesses, businessId);
  }

  resolve(
    businessId: BusinessId,
    marketCondition?: MarketCondition,
    locationType?: LocationType,
  ): WeightMap {
    let weights = this.baseWeights(businessId);
    if (marketCondition) {
      weights = applyMultipliers(weights, this.catalog.weights.marketConditions[marketCondition]);
    }
    if (locationType) {
      weights = applyMultipliers(weights, this.catalog.weights.locationTypes[locationType]);
    }
    return this.finish(weights);
  }

  resolveWithScheme(businessId: BusinessId, scheme: WeightScheme): WeightMap {
    const weights = applyMultipliers(this.baseWeights(businessId), this.catalog.weights.schemes[scheme]);
    return this.finish(weights);
  }

  /**
   * Trend-driven adjustment of the base table.
   */
  resolveDynamic(businessId: BusinessId, signals: MarketSignals): WeightMap {
    let weights = this.baseWeights(businessId);
    if ((signals.growthRate ?? 0) > 0.15) {
      weights = applyMultipliers(weights, { market_potential: 1.2, competition: 0.9 });
    }
    if ((signals.unemploymentRate ?? 0) > 0.08) {
      weights = applyMultipliers(weights, { customer: 1.1, financial_viability: 1.2 });
    }
    if ((signals.rentTrend ?? 0) > 0.1) {
      weights = applyMultipliers(weights, { financial_viability: 1.15 });
    }
    if ((signals.infrastructureInvestment ?? 0) > 0) {
      weights = applyMultipliers(weights, { transport: 1.1 });
    }
    return this.finish(weights);
  }

  private finish(weights: WeightMap): WeightMap {
    return normalizeWeights(weights) ?? this.defaultWeights();
  }
}
