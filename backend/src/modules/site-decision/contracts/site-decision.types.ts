/**
 * Site Decision core contracts
 *
 * Shared by every engine component. Contexts are treated as immutable by the
 * engine; scenario and simulation code work on deep copies.
 */

// ═══════════════════════════════════════════════════════════════
// FACTORS
// ═══════════════════════════════════════════════════════════════

export const FACTORS = [
  'customer',
  'competition',
  'market_potential',
  'financial_viability',
  'safety',
  'transport',
  'landmark',
  'operational_feasibility',
] as const;

export type FactorName = (typeof FACTORS)[number];

export type WeightMap = Partial<Record<FactorName, number>>;
export type ComponentScores = Partial<Record<FactorName, number>>;
export type FactorDeltas = Partial<Record<FactorName, number>>;

export function isFactorName(value: string): value is FactorName {
  return FACTORS.some((f) => f === value);
}

// ═══════════════════════════════════════════════════════════════
// AREA SIGNALS
// ═══════════════════════════════════════════════════════════════

export const FEATURE_TAGS = [
  'school',
  'hospital',
  'pharmacy',
  'police',
  'bus_stop',
  'subway',
  'park',
  'office',
  'residential',
] as const;

export type FeatureTag = (typeof FEATURE_TAGS)[number];

export type IncomeLevel = 'low' | 'medium' | 'high';

export type BusinessId = string;

export type BusinessCategory =
  | 'food_beverage'
  | 'service'
  | 'retail'
  | 'entertainment'
  | 'general';

export interface MarketContext {
  osmCounts: Partial<Record<FeatureTag, number>>;
  categoryCounts: Record<BusinessId, number>;
  populationDensity: number;
  incomeLevel: IncomeLevel;
  /** 0..1 */
  footTrafficScore: number;
  /** 1..4 */
  rentLevel: number;
  seasonalFactor: number;
  /** Written by the scenario planner on its own copy only. */
  scenarioAdjustments?: FactorDeltas;
}

export interface UserInputs {
  customerTarget: string;
  /** 1..4 */
  priceLevel: number;
}

export const BASELINE_INPUTS: UserInputs = { customerTarget: 'general', priceLevel: 2 };

export type MarketCondition = 'high_growth' | 'mature_market' | 'declining_market';
export type LocationType = 'city_center' | 'residential' | 'commercial' | 'suburban';
export type WeightScheme = 'conservative' | 'aggressive' | 'balanced';

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export interface ScoringResult {
  readonly businessId: BusinessId;
  /** 0..100 */
  readonly score: number;
  /** 0..1 */
  readonly confidence: number;
  readonly reasons: readonly string[];
  readonly warnings: readonly string[];
  readonly sensitivity: Readonly<Partial<Record<FactorName, number>>>;
  readonly recommendations: readonly string[];
  readonly components: Readonly<ComponentScores>;
  readonly weights: Readonly<WeightMap>;
  /** Factors that could not be computed and were scored 0. */
  readonly failedComponents: readonly FactorName[];
  readonly degraded: boolean;
}

export type RiskLevel = 'very_low' | 'low' | 'medium' | 'high' | 'very_high';

export function readCount(ctx: Pick<MarketContext, 'osmCounts'>, tag: FeatureTag): number {
  return ctx.osmCounts[tag] ?? 0;
}

export function cloneContext(ctx: MarketContext): MarketContext {
  return {
    ...ctx,
    osmCounts: { ...ctx.osmCounts },
    categoryCounts: { ...ctx.categoryCounts },
    scenarioAdjustments: ctx.scenarioAdjustments ? { ...ctx.scenarioAdjustments } : undefined,
  };
}

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

export function round(x: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/**
 * Own-property lookup on a plain record (ignores prototype keys).
 */
export function ownValue<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
