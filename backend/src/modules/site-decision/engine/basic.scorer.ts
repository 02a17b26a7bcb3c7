/**
 * Quick Screen
 *
 * Five-factor scorer used to rank every catalog business at a site in one
 * pass. Weights are normalized over the five factors present.
 */

import type { SiteCatalog } from '../catalog/catalog.loader.js';
import {
  ownValue,
  readCount,
  round,
  type BusinessId,
  type MarketContext,
  type RiskLevel,
  type UserInputs,
  type WeightMap,
} from '../contracts/site-decision.types.js';
import { customerAffinity } from './component.scorer.js';
import { normalizeInputs, type SiteScoringEngine } from './site-scoring.engine.js';
import { aggregateScore } from './weighted.aggregator.js';

export const BASIC_FACTORS = ['customer', 'competition', 'safety', 'transport', 'landmark'] as const;

export type BasicFactor = (typeof BASIC_FACTORS)[number];

export type BasicContext = Pick<MarketContext, 'osmCounts' | 'categoryCounts'>;

export interface BasicScoreResult {
  businessId: BusinessId;
  /** 0..100, one decimal */
  score: number;
  components: Record<BasicFactor, number>;
  reasons: string[];
}

export interface ScreenEntry extends BasicScoreResult {
  name: string;
  warnings: string[];
  riskLevel: RiskLevel;
  ruleRisk: RiskLevel;
}

const BASIC_REASONS: Array<{ factor: BasicFactor; text: string }> = [
  { factor: 'competition', text: 'Few competitors in the area' },
  { factor: 'safety', text: 'Safe area (police station, hospital nearby)' },
  { factor: 'customer', text: 'Suits the target customers' },
  { factor: 'transport', text: 'Easy to reach by public transport' },
  { factor: 'landmark', text: 'Close to notable places (schools, offices, parks)' },
];

const BASIC_THRESHOLDS: Record<BasicFactor, number> = {
  competition: 0.7,
  safety: 0.6,
  customer: 0.5,
  transport: 0.5,
  landmark: 0.5,
};

export function basicComponents(
  catalog: SiteCatalog,
  businessId: BusinessId,
  inputs: UserInputs,
  context: BasicContext,
): Record<BasicFactor, number> {
  const competitors = ownValue(context.categoryCounts, businessId) ?? 0;
  return {
    customer: customerAffinity(catalog, businessId, inputs.customerTarget),
    competition: Math.max(1 - competitors / 10, 0),
    safety: Math.min(readCount(context, 'police') + readCount(context, 'hospital'), 5) / 5,
    transport: Math.min(readCount(context, 'bus_stop') + readCount(context, 'subway'), 5) / 5,
    landmark: Math.min(readCount(context, 'school') + readCount(context, 'office') + readCount(context, 'park'), 10) / 10,
  };
}

export function scoreBasic(
  catalog: SiteCatalog,
  businessId: BusinessId,
  inputs: Partial<UserInputs>,
  context: BasicContext,
  weights: WeightMap = catalog.weights.default,
): BasicScoreResult {
  const components = basicComponents(catalog, businessId, normalizeInputs(inputs), context);
  const fiveFactorWeights: WeightMap = {};
  for (const f of BASIC_FACTORS) {
    const w = weights[f];
    if (w !== undefined) fiveFactorWeights[f] = w;
  }
  const reasons = BASIC_REASONS.filter((r) => components[r.factor] > BASIC_THRESHOLDS[r.factor]).map((r) => r.text);

  return {
    businessId,
    score: round(aggregateScore(components, fiveFactorWeights), 1),
    components,
    reasons: reasons.length ? reasons : ['No standout characteristics'],
  };
}

export function screenRiskLevel(score: number, warningCount: number): RiskLevel {
  if (warningCount >= 3) return 'very_high';
  if (warningCount >= 2) return 'high';
  if (score < 40) return 'high';
  if (score < 55) return 'medium';
  if (score < 75) return 'low';
  return 'very_low';
}

/**
 * Quick-score every business (default: the whole catalog), attach rule
 * warnings and sort by score, best first.
 */
export function screenCategories(
  engine: SiteScoringEngine,
  inputs: Partial<UserInputs>,
  context: MarketContext,
  businessIds: readonly BusinessId[] = [...engine.catalog.businesses.keys()],
): ScreenEntry[] {
  const entries = businessIds.map((businessId): ScreenEntry => {
    const basic = scoreBasic(engine.catalog, businessId, inputs, context);
    const rules = engine.evaluateRules(businessId, context, undefined, inputs);
    const warnings = rules.results.filter((r) => r.severity !== 'info').map((r) => r.message);
    return {
      ...basic,
      name: engine.catalog.businesses.get(businessId)?.name ?? businessId,
      warnings,
      riskLevel: screenRiskLevel(basic.score, warnings.length),
      ruleRisk: rules.summary.overallRisk,
    };
  });
  return entries.sort((a, b) => b.score - a.score);
}
