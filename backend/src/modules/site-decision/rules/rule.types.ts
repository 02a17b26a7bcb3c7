/**
 * Rules Engine contracts
 *
 * A rule is data: its condition is a tagged reference into a predicate
 * registry, so catalogs can be built, listed and extended without code.
 */

import type {
  BusinessId,
  ComponentScores,
  FactorName,
  FeatureTag,
  IncomeLevel,
  MarketContext,
  RiskLevel,
} from '../contracts/site-decision.types.js';

export type RuleCategory = 'market' | 'legal' | 'financial' | 'operational' | 'strategic';
export type RuleSeverity = 'info' | 'warning' | 'critical' | 'blocking';

export const SEVERITY_RANK: Record<RuleSeverity, number> = {
  blocking: 0,
  critical: 1,
  warning: 2,
  info: 3,
};

// ═══════════════════════════════════════════════════════════════
// PREDICATES
// ═══════════════════════════════════════════════════════════════

export type FeatureTerms = Partial<Record<FeatureTag, number>>;

export interface PredicateParamMap {
  always: object;
  business_in: { businesses: readonly BusinessId[] };
  /** Competitors of the evaluated business ≥ its threshold. */
  competitors_at_least: { thresholds: Readonly<Record<BusinessId, number>>; defaultThreshold: number };
  category_count_above: { category: BusinessId; threshold: number };
  score_below: { factor: FactorName; threshold: number };
  feature_below: { tag: FeatureTag; threshold: number };
  feature_above: { tag: FeatureTag; threshold: number };
  /** Σ coefficient·count > threshold */
  feature_sum_above: { terms: FeatureTerms; threshold: number };
  /** Σ coefficient·count ≤ threshold */
  feature_sum_at_most: { terms: FeatureTerms; threshold: number };
  income_is: { level: IncomeLevel };
  /** school / (residential + office), capped at 1, below threshold */
  student_ratio_below: { threshold: number };
}

export type PredicateName = keyof PredicateParamMap;

export type PredicateSpec<K extends PredicateName = PredicateName> = {
  [P in K]: { name: P } & PredicateParamMap[P];
}[K];

export interface RuleInput {
  businessId: BusinessId;
  context: MarketContext;
  scores: ComponentScores;
}

export type PredicateRegistry = {
  [K in PredicateName]: (spec: PredicateSpec<K>, input: RuleInput) => boolean;
};

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

export type RuleEvidence = 'competitors' | 'safety' | 'transport';

export interface RuleDefinition {
  id: string;
  name: string;
  category: RuleCategory;
  severity: RuleSeverity;
  /** 1..10 */
  priority: number;
  predicate: PredicateSpec;
  message: string;
  recommendation: string;
  evidence?: readonly RuleEvidence[];
}

export interface RuleCatalog {
  general: readonly RuleDefinition[];
  businessSpecific: Readonly<Record<BusinessId, readonly RuleDefinition[]>>;
  contextual: readonly RuleDefinition[];
}

export interface SupportingData {
  ruleCategory: RuleCategory;
  dataSources: string[];
  competitorCount?: number;
  safetyInfrastructure?: { police: number; hospital: number };
  transportOptions?: { busStop: number; subway: number };
}

export interface RuleResult {
  ruleId: string;
  name: string;
  severity: RuleSeverity;
  category: RuleCategory;
  priority: number;
  message: string;
  recommendation: string;
  /** 0..1 */
  confidence: number;
  supportingData: SupportingData;
}

export interface RulesSummary {
  total: number;
  bySeverity: Record<RuleSeverity, number>;
  byCategory: Record<RuleCategory, number>;
  overallRisk: RiskLevel;
  hasBlocking: boolean;
}

export interface RulesEvaluation {
  businessId: BusinessId;
  results: RuleResult[];
  summary: RulesSummary;
  failedRules: string[];
}
