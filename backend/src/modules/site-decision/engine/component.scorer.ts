/**
 * Component Scorer
 *
 * Computes the eight factor sub-scores in [0,1] for a business at a site.
 *
 * PIPELINE:
 *   raw sub-score → clamp → × seasonalFactor → business-type pass
 *   → scenario adjustments (when present) → clamp
 *
 * Each factor is computed in isolation: a calculator that throws is logged
 * and defaulted to 0 without aborting the others.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { businessCategory, type SiteCatalog } from '../catalog/catalog.loader.js';
import {
  FACTORS,
  clamp01,
  ownValue,
  readCount,
  type BusinessCategory,
  type BusinessId,
  type ComponentScores,
  type FactorName,
  type IncomeLevel,
  type MarketContext,
  type UserInputs,
} from '../contracts/site-decision.types.js';

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export interface ComponentScorerConfig {
  saturationSteepness: number;
  saturationMidpoint: number;
  /** < 1 means fiercer competition for the category. */
  intensityModifiers: Record<BusinessCategory, number>;
  incomeCapacityFactors: Record<IncomeLevel, number>;
  incomeMarketSignal: Record<IncomeLevel, number>;
  /** Price level the area comfortably pays. */
  incomePriceLevel: Record<IncomeLevel, number>;
  categoryModifiers: Partial<Record<BusinessCategory, Partial<Record<FactorName, number>>>>;
  /** Factors a scenario delta scales directly (the rest act through counts). */
  scenarioWiredFactors: readonly FactorName[];
  defaultCapacityRatio: number;
  defaultProfitMargin: number;
}

export const DEFAULT_COMPONENT_CONFIG: ComponentScorerConfig = {
  saturationSteepness: 5,
  saturationMidpoint: 0.5,
  intensityModifiers: {
    food_beverage: 0.9,
    entertainment: 0.9,
    retail: 1.0,
    service: 1.1,
    general: 1.0,
  },
  incomeCapacityFactors: { low: 0.8, medium: 1.0, high: 1.2 },
  incomeMarketSignal: { low: 0.3, medium: 0.6, high: 1.0 },
  incomePriceLevel: { low: 1, medium: 2, high: 3 },
  categoryModifiers: {
    food_beverage: { transport: 1.2, landmark: 1.1 },
    service: { transport: 0.9, customer: 1.2 },
  },
  scenarioWiredFactors: [
    'customer',
    'market_potential',
    'financial_viability',
    'safety',
    'landmark',
    'operational_feasibility',
  ],
  defaultCapacityRatio: 5,
  defaultProfitMargin: 0.5,
};

// ═══════════════════════════════════════════════════════════════
// CONTRACT
// ═══════════════════════════════════════════════════════════════

export interface ComponentDiagnostics {
  scores: ComponentScores;
  /** Factors whose calculation threw; their score is 0. */
  failed: FactorName[];
}

export interface ComponentScoring {
  score(businessId: BusinessId, inputs: UserInputs, context: MarketContext): ComponentScores;
  scoreWithDiagnostics(businessId: BusinessId, inputs: UserInputs, context: MarketContext): ComponentDiagnostics;
}

/**
 * Segment affinity: listed segment → matrix (fallback 0.4 for unlisted
 * businesses); other segments → general defaults (fallback 0.5).
 */
export function customerAffinity(catalog: SiteCatalog, businessId: BusinessId, customerTarget: string): number {
  const { segments, generalDefaults, listedSegmentFallback, unknownFallback } = catalog.affinity;
  const row = ownValue(segments, customerTarget);
  if (row) return ownValue(row, businessId) ?? listedSegmentFallback;
  return ownValue(generalDefaults, businessId) ?? unknownFallback;
}

type Calculator = (businessId: BusinessId, inputs: UserInputs, ctx: MarketContext) => number;

// ═══════════════════════════════════════════════════════════════
// SCORER
// ═══════════════════════════════════════════════════════════════

export class ComponentScorer implements ComponentScoring {
  private readonly calculators: Record<FactorName, Calculator>;

  constructor(
    private readonly catalog: SiteCatalog,
    private readonly logger: Logger = createLogger('component-scorer'),
    private readonly config: ComponentScorerConfig = DEFAULT_COMPONENT_CONFIG,
  ) {
    this.calculators = {
      customer: (b, inputs, ctx) => this.customerScore(b, inputs, ctx),
      competition: (b, _inputs, ctx) => this.competitionScore(b, ctx),
      market_potential: (_b, _inputs, ctx) => this.marketPotentialScore(ctx),
      financial_viability: (b, inputs, ctx) => this.financialScore(b, inputs, ctx),
      safety: (_b, _inputs, ctx) => Math.min(readCount(ctx, 'police') + readCount(ctx, 'hospital'), 3) / 3,
      transport: (_b, _inputs, ctx) => Math.min(readCount(ctx, 'bus_stop') + 2 * readCount(ctx, 'subway'), 5) / 5,
      landmark: (_b, _inputs, ctx) =>
        Math.min(readCount(ctx, 'school') + readCount(ctx, 'office') + readCount(ctx, 'park'), 10) / 10,
      operational_feasibility: (_b, _inputs, ctx) => this.operationalScore(ctx),
    };
  }

  score(businessId: BusinessId, inputs: UserInputs, context: MarketContext): ComponentScores {
    return this.scoreWithDiagnostics(businessId, inputs, context).scores;
  }

  scoreWithDiagnostics(businessId: BusinessId, inputs: UserInputs, context: MarketContext): ComponentDiagnostics {
    const failed: FactorName[] = [];
    const seasonal = Number.isFinite(context.seasonalFactor) && context.seasonalFactor > 0 ? context.seasonalFactor : 1;
    const modifiers = this.config.categoryModifiers[businessCategory(this.catalog, businessId)] ?? {};
    const adjustments = context.scenarioAdjustments ?? {};

    const scores: Record<FactorName, number> = {
      customer: 0,
      competition: 0,
      market_potential: 0,
      financial_viability: 0,
      safety: 0,
      transport: 0,
      landmark: 0,
      operational_feasibility: 0,
    };

    for (const factor of FACTORS) {
      let raw: number;
      try {
        raw = this.calculators[factor](businessId, inputs, context);
      } catch (err) {
        this.logger.warn({ businessId, factor, err: errorMessage(err) }, 'component calculation failed');
        failed.push(factor);
        continue;
      }

      let s = clamp01(raw) * seasonal;
      s *= modifiers[factor] ?? 1;
      const delta = adjustments[factor];
      if (delta !== undefined && this.config.scenarioWiredFactors.includes(factor)) {
        s *= 1 + delta;
      }
      scores[factor] = clamp01(s);
    }

    return { scores, failed };
  }

  // ═══════════════════════════════════════════════════════════════
  // FACTOR CALCULATORS
  // ═══════════════════════════════════════════════════════════════

  private customerScore(businessId: BusinessId, inputs: UserInputs, ctx: MarketContext): number {
    const affinity = customerAffinity(this.catalog, businessId, inputs.customerTarget);
    const multiplier = this.catalog.businesses.get(businessId)?.incomeMultipliers?.[ctx.incomeLevel] ?? 1;
    return affinity * multiplier;
  }

  competitionCapacity(businessId: BusinessId, ctx: MarketContext): number {
    const profile = this.catalog.businesses.get(businessId);
    const ratio = profile?.capacityRatio ?? this.config.defaultCapacityRatio;
    const densityFactor = Math.min(0.5 + Math.max(ctx.populationDensity, 0) / 2000, 2);
    const incomeFactor = this.config.incomeCapacityFactors[ctx.incomeLevel];
    return ratio * densityFactor * incomeFactor;
  }

  private competitionScore(businessId: BusinessId, ctx: MarketContext): number {
    const capacity = this.competitionCapacity(businessId, ctx);
    if (capacity <= 0) return 0;
    const competitors = ownValue(ctx.categoryCounts, businessId) ?? 0;
    const saturation = competitors / capacity;
    const { saturationSteepness: k, saturationMidpoint: mid } = this.config;
    const base = 1 / (1 + Math.exp(k * (saturation - mid)));
    const intensity = this.config.intensityModifiers[businessCategory(this.catalog, businessId)];
    return base * intensity;
  }

  private marketPotentialScore(ctx: MarketContext): number {
    const density = Math.min(Math.max(ctx.populationDensity, 0) / 3000, 1);
    const income = this.config.incomeMarketSignal[ctx.incomeLevel];
    const infrastructure = Math.min(
      (readCount(ctx, 'bus_stop') + readCount(ctx, 'subway') + readCount(ctx, 'office')) / 15,
      1,
    );
    return (density + income + infrastructure) / 3;
  }

  private operationalScore(ctx: MarketContext): number {
    const labor = Math.min(readCount(ctx, 'residential') / 10, 1);
    const supply = Math.min((readCount(ctx, 'bus_stop') + 2 * readCount(ctx, 'subway')) / 8, 1);
    const totalBusinesses = Object.values(ctx.categoryCounts).reduce((a, b) => a + b, 0);
    const regulatory = Math.min(totalBusinesses / 20, 1);
    return (labor + supply + regulatory) / 3;
  }

  private financialScore(businessId: BusinessId, inputs: UserInputs, ctx: MarketContext): number {
    const expected = this.config.incomePriceLevel[ctx.incomeLevel];
    const overPriced = Math.max(0, inputs.priceLevel - expected);
    const affordability = Math.max(0.4, 1 - 0.2 * overPriced);
    const revenue = clamp01(ctx.footTrafficScore) * affordability;
    const rentLevel = Math.max(1, Math.min(4, ctx.rentLevel));
    const rent = (4 - rentLevel) / 3;
    const margin = this.catalog.businesses.get(businessId)?.profitMargin ?? this.config.defaultProfitMargin;
    return Math.min(0.4 * revenue + 0.3 * rent + 0.3 * margin, 1);
  }
}
