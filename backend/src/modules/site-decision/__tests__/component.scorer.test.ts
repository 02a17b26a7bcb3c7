import { describe, it, expect } from 'vitest';
import { FACTORS, type MarketContext } from '../contracts/site-decision.types.js';
import { ComponentScorer, customerAffinity } from '../engine/component.scorer.js';
import { catalog, createMockLogger, makeContext } from './helpers.js';

const GENERAL = { customerTarget: 'general', priceLevel: 2 };

const site: MarketContext = makeContext({
  osmCounts: { police: 1, hospital: 1, bus_stop: 2, subway: 1, school: 2, office: 3, park: 1, residential: 5 },
  categoryCounts: { grocery: 3, cafe: 2 },
});

describe('customerAffinity', () => {
  it('reads the segment matrix for listed segments', () => {
    expect(customerAffinity(catalog, 'milk_tea', 'student')).toBe(1.0);
    expect(customerAffinity(catalog, 'cafe', 'office')).toBe(1.0);
  });

  it('uses the listed-segment fallback for businesses missing from the row', () => {
    expect(customerAffinity(catalog, 'grocery', 'student')).toBe(0.4);
  });

  it('uses general defaults for other segments', () => {
    expect(customerAffinity(catalog, 'grocery', 'general')).toBe(0.8);
    expect(customerAffinity(catalog, 'grocery', 'astronaut')).toBe(0.8);
  });

  it('falls back to 0.5 for an unknown business', () => {
    expect(customerAffinity(catalog, 'unicorn_shop', 'general')).toBe(0.5);
  });
});

describe('ComponentScorer', () => {
  const scorer = new ComponentScorer(catalog, createMockLogger());

  it('computes every factor for a retail business', () => {
    const s = scorer.score('grocery', GENERAL, site);
    expect(s.customer).toBeCloseTo(0.8, 6);
    // capacity 6 × 1.25 × 1.0 = 7.5; saturation 0.4
    expect(s.competition).toBeCloseTo(1 / (1 + Math.exp(-0.5)), 6);
    expect(s.market_potential).toBeCloseTo(0.5, 6);
    expect(s.financial_viability).toBeCloseTo(0.49, 6);
    expect(s.safety).toBeCloseTo(2 / 3, 6);
    expect(s.transport).toBeCloseTo(0.8, 6);
    expect(s.landmark).toBeCloseTo(0.6, 6);
    expect(s.operational_feasibility).toBeCloseTo(1.25 / 3, 6);
  });

  it('applies category modifiers for food and beverage', () => {
    const s = scorer.score('cafe', GENERAL, site);
    expect(s.transport).toBeCloseTo(0.96, 6);
    expect(s.landmark).toBeCloseTo(0.66, 6);
  });

  it('scales by the seasonal factor and clamps to 1', () => {
    const s = scorer.score('grocery', GENERAL, { ...site, seasonalFactor: 1.5 });
    expect(s.transport).toBe(1);
    expect(s.landmark).toBeCloseTo(0.9, 6);
  });

  it('penalizes a price level above what the area pays', () => {
    const s = scorer.score('grocery', { customerTarget: 'general', priceLevel: 4 }, site);
    // affordability 1 − 0.2·2 = 0.6
    expect(s.financial_viability).toBeCloseTo(0.4 * 0.5 * 0.6 + 0.2 + 0.09, 6);
  });

  it('applies wired scenario deltas only', () => {
    const s = scorer.score('grocery', GENERAL, {
      ...site,
      scenarioAdjustments: { market_potential: -0.5, competition: 1 },
    });
    expect(s.market_potential).toBeCloseTo(0.25, 6);
    expect(s.competition).toBeCloseTo(1 / (1 + Math.exp(-0.5)), 6);
  });

  it('keeps every score within [0, 1]', () => {
    const contexts = [
      makeContext(),
      site,
      makeContext({
        osmCounts: { police: 20, hospital: 20, bus_stop: 50, subway: 20, school: 30, office: 60, park: 10, residential: 80 },
        categoryCounts: { cafe: 40, milk_tea: 40 },
        populationDensity: 12_000,
        incomeLevel: 'high',
        footTrafficScore: 1,
        rentLevel: 4,
        seasonalFactor: 2,
      }),
    ];
    for (const businessId of [...catalog.businesses.keys(), 'unicorn_shop']) {
      for (const ctx of contexts) {
        const s = scorer.score(businessId, { customerTarget: 'student', priceLevel: 4 }, ctx);
        for (const f of FACTORS) {
          expect(s[f]).toBeGreaterThanOrEqual(0);
          expect(s[f]).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it('defaults a failing factor to 0 and keeps the others', () => {
    const logger = createMockLogger();
    const failing = new ComponentScorer(catalog, logger);
    const broken = new Proxy<Record<string, number>>(
      {},
      {
        ownKeys() {
          throw new Error('category counts unavailable');
        },
        getOwnPropertyDescriptor() {
          throw new Error('category counts unavailable');
        },
      },
    );

    const { scores, failed } = failing.scoreWithDiagnostics('grocery', GENERAL, { ...site, categoryCounts: broken });

    expect(failed).toEqual(['competition', 'operational_feasibility']);
    expect(scores.competition).toBe(0);
    expect(scores.operational_feasibility).toBe(0);
    expect(scores.transport).toBeCloseTo(0.8, 6);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});
