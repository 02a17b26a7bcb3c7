import { describe, it, expect } from 'vitest';
import { FACTORS, type ComponentScores } from '../contracts/site-decision.types.js';
import { dataCompleteness, overallRisk, RulesEngine } from '../rules/rules.engine.js';
import { createMockLogger, EXAMPLE_OSM, makeContext, unreadableCounts } from './helpers.js';

const NEUTRAL_SCORES: ComponentScores = Object.fromEntries(FACTORS.map((f) => [f, 0.5]));

describe('RulesEngine', () => {
  it('blocks an oversaturated milk tea market', () => {
    const engine = new RulesEngine({ logger: createMockLogger() });
    const ctx = makeContext({ osmCounts: EXAMPLE_OSM, categoryCounts: { milk_tea: 9 } });

    const evaluation = engine.evaluate('milk_tea', ctx, NEUTRAL_SCORES);

    expect(evaluation.results.map((r) => r.ruleId)).toEqual(['milk_tea_oversaturated', 'market_oversaturated']);
    expect(evaluation.summary.hasBlocking).toBe(true);
    expect(evaluation.summary.overallRisk).toBe('very_high');
    expect(evaluation.summary.bySeverity).toEqual({ blocking: 1, critical: 1, warning: 0, info: 0 });
    expect(evaluation.failedRules).toEqual([]);
  });

  it('derives confidence from the rule category and data completeness', () => {
    const engine = new RulesEngine({ logger: createMockLogger() });
    const ctx = makeContext({ osmCounts: EXAMPLE_OSM, categoryCounts: { milk_tea: 9 } });

    const [blocking] = engine.evaluate('milk_tea', ctx, NEUTRAL_SCORES).results;

    // market 0.8 × 4/9 + 0.1
    expect(blocking.confidence).toBe(0.456);
    expect(blocking.supportingData).toEqual({
      ruleCategory: 'market',
      dataSources: ['categoryCounts'],
      competitorCount: 9,
    });
  });

  it('orders by severity, then priority', () => {
    const engine = new RulesEngine({ logger: createMockLogger() });

    const evaluation = engine.evaluate('pharmacy', makeContext(), NEUTRAL_SCORES);

    expect(evaluation.results.map((r) => r.ruleId)).toEqual([
      'pharmacy_hospital_required',
      'poor_safety',
      'pharmacy_license_complex',
      'digital_transformation',
    ]);
    expect(evaluation.summary.overallRisk).toBe('medium');
    expect(evaluation.results[0].confidence).toBe(0.1);
  });

  it('fires score-based rules from the component scores', () => {
    const engine = new RulesEngine({ logger: createMockLogger() });
    const scores: ComponentScores = { ...NEUTRAL_SCORES, competition: 0.2, transport: 0.1 };

    const ids = engine.evaluate('grocery', makeContext({ osmCounts: { police: 1 } }), scores).results.map((r) => r.ruleId);

    expect(ids).toEqual(['high_competition', 'poor_transport']);
  });

  it('skips a rule whose predicate throws and keeps evaluating', () => {
    const logger = createMockLogger();
    const engine = new RulesEngine({
      logger,
      predicates: {
        feature_below: () => {
          throw new Error('osm counts unavailable');
        },
      },
    });

    const evaluation = engine.evaluate('pharmacy', makeContext(), NEUTRAL_SCORES);

    expect(evaluation.failedRules).toEqual(['pharmacy_hospital_required']);
    expect(evaluation.results.map((r) => r.ruleId)).toEqual([
      'poor_safety',
      'pharmacy_license_complex',
      'digital_transformation',
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('skips a rule whose supporting data throws', () => {
    const logger = createMockLogger();
    const engine = new RulesEngine({ logger });
    const ctx = makeContext({ categoryCounts: unreadableCounts() });

    const evaluation = engine.evaluate('grocery', ctx, { ...NEUTRAL_SCORES, competition: 0.1 });

    expect(evaluation.failedRules).toEqual(['market_oversaturated', 'high_competition']);
    expect(evaluation.results.map((r) => r.ruleId)).toEqual(['poor_safety']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('ignores prototype keys as business ids', () => {
    const engine = new RulesEngine({ logger: createMockLogger() });
    const evaluation = engine.evaluate('constructor', makeContext({ osmCounts: { police: 1 } }), NEUTRAL_SCORES);
    expect(evaluation.results).toEqual([]);
    expect(evaluation.summary.overallRisk).toBe('very_low');
  });
});

describe('overallRisk', () => {
  it('maps severity counts to a risk level', () => {
    expect(overallRisk({ blocking: 0, critical: 3, warning: 0, info: 0 })).toBe('high');
    expect(overallRisk({ blocking: 0, critical: 0, warning: 4, info: 0 })).toBe('medium');
    expect(overallRisk({ blocking: 0, critical: 0, warning: 1, info: 5 })).toBe('low');
    expect(overallRisk({ blocking: 0, critical: 0, warning: 0, info: 5 })).toBe('very_low');
  });
});

describe('dataCompleteness', () => {
  it('is the share of feature tags with a non-zero count', () => {
    expect(dataCompleteness(makeContext({ osmCounts: EXAMPLE_OSM }))).toBeCloseTo(4 / 9, 10);
    expect(dataCompleteness(makeContext())).toBe(0);
  });
});
