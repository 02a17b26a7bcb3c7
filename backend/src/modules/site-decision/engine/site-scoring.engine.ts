/**
 * Site Scoring Engine
 *
 * Entry point for scoring one business at one site:
 *   weights → component scores → aggregate → rules → sensitivity → explanation
 *
 * `scoreBusiness` always returns a well-formed result. Any failure yields a
 * degraded result (score 0, confidence 0) with an explanatory reason.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { SiteCatalog } from '../catalog/catalog.loader.js';
import {
  BASELINE_INPUTS,
  FACTORS,
  round,
  type BusinessId,
  type ComponentScores,
  type FactorName,
  type LocationType,
  type MarketCondition,
  type MarketContext,
  type ScoringResult,
  type UserInputs,
  type WeightMap,
} from '../contracts/site-decision.types.js';
import { RulesEngine } from '../rules/rules.engine.js';
import type { RulesEvaluation } from '../rules/rule.types.js';
import { analyzeSensitivity, DEFAULT_ADJUSTMENT_PCT, type SensitivityReport } from '../sim/sensitivity.analyzer.js';
import { ComponentScorer, type ComponentScoring } from './component.scorer.js';
import { aggregate, aggregateScore } from './weighted.aggregator.js';
import { WeightResolver } from './weight.resolver.js';

export interface ScoreOptions {
  /** Used as-is instead of resolving from the catalog. */
  weights?: WeightMap;
  marketCondition?: MarketCondition;
  locationType?: LocationType;
  includeSensitivity?: boolean;
}

export interface SiteScoringEngineDeps {
  catalog: SiteCatalog;
  weightResolver?: WeightResolver;
  componentScorer?: ComponentScoring;
  rulesEngine?: RulesEngine;
  logger?: Logger;
}

const MAX_RECOMMENDATIONS = 5;

const STRENGTH_REASONS: Array<{ factor: FactorName; above: number; text: string }> = [
  { factor: 'competition', above: 0.7, text: 'Few direct competitors nearby' },
  { factor: 'safety', above: 0.6, text: 'Good safety infrastructure (police, hospital)' },
  { factor: 'customer', above: 0.5, text: 'Good fit with the target customers' },
  { factor: 'transport', above: 0.5, text: 'Convenient public transport' },
  { factor: 'landmark', above: 0.5, text: 'Close to schools, offices or parks' },
  { factor: 'market_potential', above: 0.6, text: 'Strong market potential' },
  { factor: 'financial_viability', above: 0.6, text: 'Healthy financial outlook' },
];

const WEAK_FACTOR_ADVICE: Record<FactorName, string> = {
  customer: 'Reposition the offer for the customers who actually live and work here',
  competition: 'Differentiate clearly from nearby competitors',
  market_potential: 'Validate demand with a small pilot before investing fully',
  financial_viability: 'Review rent and pricing to protect margins',
  safety: 'Budget for security measures',
  transport: 'Offer delivery or parking to offset weak transit access',
  landmark: 'Invest in signage and local marketing to build visibility',
  operational_feasibility: 'Plan staffing and supply logistics early',
};

export function withoutFactors(scores: ComponentScores, factors: readonly FactorName[]): ComponentScores {
  const out: ComponentScores = { ...scores };
  for (const f of factors) delete out[f];
  return out;
}

export function normalizeInputs(inputs: Partial<UserInputs>): UserInputs {
  const price = Number.isFinite(inputs.priceLevel) ? Math.round(inputs.priceLevel ?? 2) : BASELINE_INPUTS.priceLevel;
  return {
    customerTarget: inputs.customerTarget || BASELINE_INPUTS.customerTarget,
    priceLevel: Math.max(1, Math.min(4, price)),
  };
}

export class SiteScoringEngine {
  readonly catalog: SiteCatalog;
  readonly weights: WeightResolver;
  readonly components: ComponentScoring;
  readonly rules: RulesEngine;
  private readonly logger: Logger;

  constructor(deps: SiteScoringEngineDeps) {
    this.catalog = deps.catalog;
    this.logger = deps.logger ?? createLogger('site-scoring');
    this.weights = deps.weightResolver ?? new WeightResolver(deps.catalog);
    this.components = deps.componentScorer ?? new ComponentScorer(deps.catalog, this.logger);
    this.rules = deps.rulesEngine ?? new RulesEngine({ logger: this.logger });
  }

  resolveWeights(businessId: BusinessId, options: ScoreOptions = {}): WeightMap {
    return options.weights ?? this.weights.resolve(businessId, options.marketCondition, options.locationType);
  }

  componentScores(businessId: BusinessId, inputs: Partial<UserInputs>, context: MarketContext): ComponentScores {
    return this.components.score(businessId, normalizeInputs(inputs), context);
  }

  /**
   * Score only. Throws on failure so callers can skip the unit of work.
   */
  scoreValue(businessId: BusinessId, inputs: Partial<UserInputs>, context: MarketContext, options: ScoreOptions = {}): number {
    const scores = this.componentScores(businessId, inputs, context);
    return aggregateScore(scores, this.resolveWeights(businessId, options));
  }

  scoreBusiness(
    businessId: BusinessId,
    inputs: Partial<UserInputs>,
    context: MarketContext,
    options: ScoreOptions = {},
  ): ScoringResult {
    try {
      const weights = Object.freeze({ ...this.resolveWeights(businessId, options) });
      const { scores, failed } = this.components.scoreWithDiagnostics(businessId, normalizeInputs(inputs), context);
      const { score, confidence } = aggregate(scores, weights);
      // rules and advice only see factors that were computed
      const observed = withoutFactors(scores, failed);
      const rules = this.rules.evaluate(businessId, context, observed);
      const warnings = rules.results.filter((r) => r.severity !== 'info').map((r) => r.message);
      if (failed.length) warnings.push(`Could not compute: ${failed.join(', ')}`);

      const sensitivity =
        options.includeSensitivity === false
          ? {}
          : analyzeSensitivity(scores, weights, DEFAULT_ADJUSTMENT_PCT).sensitivities;

      return Object.freeze({
        businessId,
        score: round(score, 1),
        confidence: round(confidence, 3),
        reasons: Object.freeze(this.reasons(observed)),
        warnings: Object.freeze(warnings),
        sensitivity: Object.freeze(sensitivity),
        recommendations: Object.freeze(this.recommendations(observed, weights, rules)),
        components: Object.freeze({ ...scores }),
        weights,
        failedComponents: Object.freeze([...failed]),
        degraded: false,
      });
    } catch (err) {
      this.logger.error({ businessId, err: errorMessage(err) }, 'scoring failed, returning degraded result');
      return SiteScoringEngine.degraded(businessId, err);
    }
  }

  evaluateRules(
    businessId: BusinessId,
    context: MarketContext,
    scores?: ComponentScores,
    inputs: Partial<UserInputs> = BASELINE_INPUTS,
  ): RulesEvaluation {
    if (scores) return this.rules.evaluate(businessId, context, scores);
    const diagnostics = this.components.scoreWithDiagnostics(businessId, normalizeInputs(inputs), context);
    return this.rules.evaluate(businessId, context, withoutFactors(diagnostics.scores, diagnostics.failed));
  }

  analyzeSensitivity(
    businessId: BusinessId,
    context: MarketContext,
    weights?: WeightMap,
    adjustmentPct: number = DEFAULT_ADJUSTMENT_PCT,
    inputs: Partial<UserInputs> = BASELINE_INPUTS,
  ): SensitivityReport {
    const scores = this.componentScores(businessId, inputs, context);
    return analyzeSensitivity(scores, weights ?? this.weights.resolve(businessId), adjustmentPct);
  }

  static degraded(businessId: BusinessId, err: unknown): ScoringResult {
    return Object.freeze({
      businessId,
      score: 0,
      confidence: 0,
      reasons: [`Scoring failed: insufficient or invalid data (${errorMessage(err)})`],
      warnings: [],
      sensitivity: {},
      recommendations: [],
      components: {},
      weights: {},
      failedComponents: [],
      degraded: true,
    });
  }

  private reasons(scores: ComponentScores): string[] {
    const reasons = STRENGTH_REASONS.filter((r) => (scores[r.factor] ?? 0) > r.above).map((r) => r.text);
    return reasons.length ? reasons : ['No standout strengths at this site'];
  }

  private recommendations(scores: ComponentScores, weights: WeightMap, rules: RulesEvaluation): string[] {
    const out: string[] = [];
    const push = (text: string) => {
      if (!out.includes(text)) out.push(text);
    };
    for (const r of rules.results) {
      if (r.severity !== 'info') push(r.recommendation);
    }
    for (const factor of FACTORS) {
      if ((weights[factor] ?? 0) >= 0.1 && (scores[factor] ?? 1) < 0.3) push(WEAK_FACTOR_ADVICE[factor]);
    }
    return out.slice(0, MAX_RECOMMENDATIONS);
  }
}
