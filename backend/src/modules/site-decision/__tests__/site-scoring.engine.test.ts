import { describe, it, expect } from 'vitest';
import { FACTORS, type ComponentScores, type FactorName } from '../contracts/site-decision.types.js';
import type { ComponentScoring } from '../engine/component.scorer.js';
import { normalizeInputs, SiteScoringEngine } from '../engine/site-scoring.engine.js';
import { catalog, createMockLogger, EXAMPLE_OSM, makeContext, unreadableCounts } from './helpers.js';

const fixedScorer = (value: number, overrides: ComponentScores = {}, failed: FactorName[] = []): ComponentScoring => {
  const score = (): ComponentScores => ({ ...Object.fromEntries(FACTORS.map((f) => [f, value])), ...overrides });
  return { score, scoreWithDiagnostics: () => ({ scores: score(), failed: [...failed] }) };
};

describe('SiteScoringEngine', () => {
  it('scores an unknown business with the default table', () => {
    const engine = new SiteScoringEngine({ catalog, logger: createMockLogger() });

    const result = engine.scoreBusiness('unicorn_shop', { customerTarget: 'general', priceLevel: 2 }, makeContext());

    expect(result.degraded).toBe(false);
    for (const f of FACTORS) expect(result.weights[f]).toBeCloseTo(catalog.weights.default[f] ?? 0, 10);
    expect(result.components.customer).toBe(0.5);
    expect(result.score).toBeGreaterThanOrEqual(0);
    expect(result.score).toBeLessThanOrEqual(100);
    expect(result.confidence).toBeGreaterThanOrEqual(0.5);
    expect(result.confidence).toBeLessThanOrEqual(1);
  });

  it('returns the same result for the same inputs', () => {
    const engine = new SiteScoringEngine({ catalog, logger: createMockLogger() });
    const ctx = makeContext({ osmCounts: EXAMPLE_OSM, categoryCounts: { cafe: 3 } });

    const first = engine.scoreBusiness('cafe', { customerTarget: 'office' }, ctx);
    const second = engine.scoreBusiness('cafe', { customerTarget: 'office' }, ctx);

    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('explains rule hits and neutral scores', () => {
    const engine = new SiteScoringEngine({ catalog, componentScorer: fixedScorer(0.5), logger: createMockLogger() });
    const ctx = makeContext({ osmCounts: EXAMPLE_OSM, categoryCounts: { milk_tea: 9 } });

    const result = engine.scoreBusiness('milk_tea', {}, ctx);

    expect(result.score).toBe(50);
    expect(result.confidence).toBe(1);
    expect(result.reasons).toEqual(['No standout strengths at this site']);
    expect(result.warnings).toEqual([
      'The milk tea market here is oversaturated',
      'The market is already saturated with this type of business',
    ]);
    expect(result.recommendations).toEqual([
      'Do not open another one: pick a different business',
      'Consider a related business or another area',
    ]);
  });

  it('recommends fixes for heavily weighted weak factors', () => {
    const engine = new SiteScoringEngine({
      catalog,
      componentScorer: fixedScorer(0.5, { safety: 0.1, landmark: 0.1, operational_feasibility: 0.2 }),
      logger: createMockLogger(),
    });

    const result = engine.scoreBusiness('grocery', {}, makeContext({ osmCounts: { police: 1 } }), {
      weights: { safety: 0.5, landmark: 0.05, operational_feasibility: 0.45 },
      includeSensitivity: false,
    });

    expect(result.sensitivity).toEqual({});
    expect(result.warnings).toEqual([]);
    expect(result.recommendations).toEqual(['Budget for security measures', 'Plan staffing and supply logistics early']);
  });

  it('degrades instead of throwing when scoring fails', () => {
    const offline = (): never => {
      throw new Error('feed offline');
    };
    const logger = createMockLogger();
    const engine = new SiteScoringEngine({
      catalog,
      logger,
      componentScorer: { score: offline, scoreWithDiagnostics: offline },
    });

    const result = engine.scoreBusiness('cafe', {}, makeContext());

    expect(result.degraded).toBe(true);
    expect(result.score).toBe(0);
    expect(result.confidence).toBe(0);
    expect(result.reasons).toEqual(['Scoring failed: insufficient or invalid data (feed offline)']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('reports factors that could not be computed and keeps them out of the rules', () => {
    const engine = new SiteScoringEngine({
      catalog,
      componentScorer: fixedScorer(0.5, { financial_viability: 0 }, ['financial_viability']),
      logger: createMockLogger(),
    });

    const result = engine.scoreBusiness('grocery', {}, makeContext({ osmCounts: { police: 1 } }));

    expect(result.degraded).toBe(false);
    expect(result.failedComponents).toEqual(['financial_viability']);
    expect(result.components.financial_viability).toBe(0);
    expect(result.score).toBe(41);
    expect(result.warnings).toEqual(['Could not compute: financial_viability']);
    expect(result.recommendations).toEqual([]);
  });

  it('keeps scoring when category counts cannot be read', () => {
    const engine = new SiteScoringEngine({ catalog, logger: createMockLogger() });
    const ctx = makeContext({ osmCounts: EXAMPLE_OSM, categoryCounts: unreadableCounts() });

    const result = engine.scoreBusiness('grocery', {}, ctx);

    expect(result.degraded).toBe(false);
    expect(result.failedComponents).toEqual(['competition', 'operational_feasibility']);
    expect(result.warnings.at(-1)).toBe('Could not compute: competition, operational_feasibility');
    expect(result.score).toBeGreaterThan(0);
  });

  it('copies the weights it was given', () => {
    const engine = new SiteScoringEngine({ catalog, componentScorer: fixedScorer(0.5), logger: createMockLogger() });
    const weights = { customer: 0.5, transport: 0.5 };

    const result = engine.scoreBusiness('cafe', {}, makeContext(), { weights, includeSensitivity: false });
    weights.customer = 99;

    expect(result.weights.customer).toBe(0.5);
    expect(Object.isFrozen(result.weights)).toBe(true);
    expect(Object.isFrozen(result.components)).toBe(true);
    expect(Object.isFrozen(result.warnings)).toBe(true);
  });

  it('includes sensitivities for every weighted factor by default', () => {
    const engine = new SiteScoringEngine({ catalog, logger: createMockLogger() });
    const result = engine.scoreBusiness('spa', {}, makeContext({ osmCounts: EXAMPLE_OSM }));
    expect(Object.keys(result.sensitivity).sort()).toEqual([...FACTORS].sort());
  });
});

describe('normalizeInputs', () => {
  it('fills defaults and clamps the price level', () => {
    expect(normalizeInputs({})).toEqual({ customerTarget: 'general', priceLevel: 2 });
    expect(normalizeInputs({ customerTarget: 'student', priceLevel: 7 })).toEqual({
      customerTarget: 'student',
      priceLevel: 4,
    });
    expect(normalizeInputs({ priceLevel: 0.2 })).toEqual({ customerTarget: 'general', priceLevel: 1 });
  });
});
