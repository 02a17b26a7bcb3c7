/**
 * Named predicate registry
 */

import { FEATURE_TAGS, ownValue, readCount, type MarketContext } from '../contracts/site-decision.types.js';
import type { FeatureTerms, PredicateName, PredicateRegistry, PredicateSpec, RuleInput } from './rule.types.js';

function weightedFeatureSum(ctx: MarketContext, terms: FeatureTerms): number {
  let sum = 0;
  for (const tag of FEATURE_TAGS) {
    const coefficient = terms[tag];
    if (coefficient !== undefined) sum += coefficient * readCount(ctx, tag);
  }
  return sum;
}

export function studentRatio(ctx: MarketContext): number {
  const denominator = readCount(ctx, 'residential') + readCount(ctx, 'office');
  if (denominator === 0) return 0;
  return Math.min(readCount(ctx, 'school') / denominator, 1);
}

export function competitorCount(input: RuleInput): number {
  return ownValue(input.context.categoryCounts, input.businessId) ?? 0;
}

export const DEFAULT_PREDICATES: PredicateRegistry = {
  always: () => true,
  business_in: (spec, { businessId }) => spec.businesses.includes(businessId),
  competitors_at_least: (spec, input) =>
    competitorCount(input) >= (ownValue(spec.thresholds, input.businessId) ?? spec.defaultThreshold),
  category_count_above: (spec, { context }) => (ownValue(context.categoryCounts, spec.category) ?? 0) > spec.threshold,
  score_below: (spec, { scores }) => {
    const s = scores[spec.factor];
    return s !== undefined && s < spec.threshold;
  },
  feature_below: (spec, { context }) => readCount(context, spec.tag) < spec.threshold,
  feature_above: (spec, { context }) => readCount(context, spec.tag) > spec.threshold,
  feature_sum_above: (spec, { context }) => weightedFeatureSum(context, spec.terms) > spec.threshold,
  feature_sum_at_most: (spec, { context }) => weightedFeatureSum(context, spec.terms) <= spec.threshold,
  income_is: (spec, { context }) => context.incomeLevel === spec.level,
  student_ratio_below: (spec, { context }) => studentRatio(context) < spec.threshold,
};

export function runPredicate<K extends PredicateName>(
  registry: PredicateRegistry,
  name: K,
  spec: PredicateSpec<K>,
  input: RuleInput,
): boolean {
  const predicate = registry[name];
  return predicate(spec, input);
}

/**
 * Which inputs a predicate reads.
 */
export function predicateSources(name: PredicateName): string[] {
  switch (name) {
    case 'competitors_at_least':
    case 'category_count_above':
      return ['categoryCounts'];
    case 'score_below':
      return ['componentScores'];
    case 'income_is':
      return ['incomeLevel', 'osmCounts'];
    case 'feature_below':
    case 'feature_above':
    case 'feature_sum_above':
    case 'feature_sum_at_most':
    case 'student_ratio_below':
      return ['osmCounts'];
    case 'always':
    case 'business_in':
      return ['businessId'];
  }
}
