/**
 * Rules Engine
 *
 * Stateless evaluator over a rule catalog built once. A rule whose predicate or
 * supporting data throws counts as not triggered and is logged; evaluation
 * continues.
 *
 * CONFIDENCE:
 *   min(categoryBase × completeness + 0.1, 1)
 *   completeness = share of the nine feature tags with a non-zero count
 *
 * ORDER: severity (blocking first), then priority descending.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import {
  FEATURE_TAGS,
  ownValue,
  readCount,
  round,
  type BusinessId,
  type ComponentScores,
  type MarketContext,
  type RiskLevel,
} from '../contracts/site-decision.types.js';
import { buildDefaultRuleCatalog } from './rule.catalog.js';
import { DEFAULT_PREDICATES, competitorCount, predicateSources, runPredicate } from './rule.predicates.js';
import {
  SEVERITY_RANK,
  type PredicateRegistry,
  type RuleCatalog,
  type RuleCategory,
  type RuleDefinition,
  type RuleInput,
  type RuleResult,
  type RuleSeverity,
  type RulesEvaluation,
  type RulesSummary,
  type SupportingData,
} from './rule.types.js';

export const CATEGORY_CONFIDENCE: Record<RuleCategory, number> = {
  legal: 0.95,
  operational: 0.9,
  market: 0.8,
  financial: 0.7,
  strategic: 0.6,
};

export interface RulesEngineOptions {
  catalog?: RuleCatalog;
  /** Overrides individual predicates in the default registry. */
  predicates?: Partial<PredicateRegistry>;
  logger?: Logger;
}

export function dataCompleteness(context: MarketContext): number {
  const present = FEATURE_TAGS.filter((tag) => readCount(context, tag) > 0).length;
  return present / FEATURE_TAGS.length;
}

export function compareRuleResults(a: RuleResult, b: RuleResult): number {
  const bySeverity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
  if (bySeverity !== 0) return bySeverity;
  return b.priority - a.priority;
}

export function overallRisk(bySeverity: Record<RuleSeverity, number>): RiskLevel {
  if (bySeverity.blocking > 0) return 'very_high';
  if (bySeverity.critical > 2) return 'high';
  if (bySeverity.critical > 0 || bySeverity.warning > 3) return 'medium';
  if (bySeverity.warning > 0) return 'low';
  return 'very_low';
}

export function summarizeRules(results: readonly RuleResult[]): RulesSummary {
  const bySeverity: Record<RuleSeverity, number> = { blocking: 0, critical: 0, warning: 0, info: 0 };
  const byCategory: Record<RuleCategory, number> = {
    market: 0,
    legal: 0,
    financial: 0,
    operational: 0,
    strategic: 0,
  };
  for (const r of results) {
    bySeverity[r.severity]++;
    byCategory[r.category]++;
  }
  return {
    total: results.length,
    bySeverity,
    byCategory,
    overallRisk: overallRisk(bySeverity),
    hasBlocking: bySeverity.blocking > 0,
  };
}

export class RulesEngine {
  private readonly catalog: RuleCatalog;
  private readonly predicates: PredicateRegistry;
  private readonly logger: Logger;

  constructor(options: RulesEngineOptions = {}) {
    this.catalog = options.catalog ?? buildDefaultRuleCatalog();
    this.predicates = { ...DEFAULT_PREDICATES, ...options.predicates };
    this.logger = options.logger ?? createLogger('rules-engine');
  }

  applicableRules(businessId: BusinessId): RuleDefinition[] {
    return [
      ...this.catalog.general,
      ...(ownValue(this.catalog.businessSpecific, businessId) ?? []),
      ...this.catalog.contextual,
    ];
  }

  evaluate(businessId: BusinessId, context: MarketContext, scores: ComponentScores): RulesEvaluation {
    const input: RuleInput = { businessId, context, scores };
    const completeness = dataCompleteness(context);
    const results: RuleResult[] = [];
    const failedRules: string[] = [];

    for (const rule of this.applicableRules(businessId)) {
      try {
        if (!runPredicate(this.predicates, rule.predicate.name, rule.predicate, input)) continue;
        results.push({
          ruleId: rule.id,
          name: rule.name,
          severity: rule.severity,
          category: rule.category,
          priority: rule.priority,
          message: rule.message,
          recommendation: rule.recommendation,
          confidence: round(Math.min(CATEGORY_CONFIDENCE[rule.category] * completeness + 0.1, 1), 3),
          supportingData: this.supportingData(rule, input),
        });
      } catch (err) {
        this.logger.warn({ businessId, ruleId: rule.id, err: errorMessage(err) }, 'rule evaluation failed');
        failedRules.push(rule.id);
      }
    }

    results.sort(compareRuleResults);

    return { businessId, results, summary: summarizeRules(results), failedRules };
  }

  private supportingData(rule: RuleDefinition, input: RuleInput): SupportingData {
    const data: SupportingData = {
      ruleCategory: rule.category,
      dataSources: predicateSources(rule.predicate.name),
    };
    const ctx = input.context;
    for (const kind of rule.evidence ?? []) {
      if (kind === 'competitors') data.competitorCount = competitorCount(input);
      if (kind === 'safety') {
        data.safetyInfrastructure = { police: readCount(ctx, 'police'), hospital: readCount(ctx, 'hospital') };
      }
      if (kind === 'transport') {
        data.transportOptions = { busStop: readCount(ctx, 'bus_stop'), subway: readCount(ctx, 'subway') };
      }
    }
    return data;
  }
}
