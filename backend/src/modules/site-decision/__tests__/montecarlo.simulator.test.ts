import { describe, it, expect, vi } from 'vitest';
import { makeRng } from '../../../common/random.js';
import { SiteScoringEngine } from '../engine/site-scoring.engine.js';
import {
  MonteCarloSimulator,
  percentile,
  perturbContext,
  planBatches,
  type BatchExecutor,
} from '../sim/montecarlo.simulator.js';
import { WorkerPoolExecutor } from '../sim/montecarlo.pool.js';
import { catalog, createMockLogger, EXAMPLE_OSM, makeContext } from './helpers.js';

const engine = new SiteScoringEngine({ catalog, logger: createMockLogger() });
const site = makeContext({ osmCounts: { ...EXAMPLE_OSM, residential: 6 }, categoryCounts: { cafe: 4, grocery: 2 } });

describe('MonteCarloSimulator', () => {
  it('is reproducible for a fixed seed', async () => {
    const sim = new MonteCarloSimulator(engine, undefined, createMockLogger());
    const a = await sim.simulate({ businessId: 'cafe', context: site, numSimulations: 300, seed: 42 });
    const b = await sim.simulate({ businessId: 'cafe', context: site, numSimulations: 300, seed: 42 });
    expect(b).toEqual(a);
  });

  it('does not depend on the order batches execute in', async () => {
    const reversed: BatchExecutor = {
      run: async (_plan, batches, runBatch) => [...batches].reverse().map(runBatch).reverse(),
    };
    const input = { businessId: 'cafe', context: site, numSimulations: 600, seed: 7, batchSize: 100 };

    const inOrder = await new MonteCarloSimulator(engine, undefined, createMockLogger()).simulate(input);
    const outOfOrder = await new MonteCarloSimulator(engine, reversed, createMockLogger()).simulate(input);

    expect(outOfOrder).toEqual(inOrder);
  });

  it('produces ordered statistics', async () => {
    const sim = new MonteCarloSimulator(engine, undefined, createMockLogger());
    const report = await sim.simulate({ businessId: 'grocery', context: site, numSimulations: 500, seed: 3 });
    if (report.status !== 'ok') throw new Error(`unexpected status ${report.status}`);

    const s = report.statistics;
    expect(report.numSimulations).toBe(500);
    expect(s.min).toBeLessThanOrEqual(s.p5);
    expect(s.p5).toBeLessThanOrEqual(s.p25);
    expect(s.p25).toBeLessThanOrEqual(s.median);
    expect(s.median).toBeLessThanOrEqual(s.p75);
    expect(s.p75).toBeLessThanOrEqual(s.p95);
    expect(s.p95).toBeLessThanOrEqual(s.max);
    expect(report.confidenceInterval90).toEqual([s.p5, s.p95]);
    expect(site.categoryCounts).toEqual({ cafe: 4, grocery: 2 });
  });

  it('reports a constant engine as riskless', async () => {
    const sim = new MonteCarloSimulator({ scoreValue: () => 70 }, undefined, createMockLogger());
    const report = await sim.simulate({ businessId: 'cafe', context: site, numSimulations: 20, seed: 1 });
    if (report.status !== 'ok') throw new Error(`unexpected status ${report.status}`);

    expect(report.statistics.std).toBe(0);
    expect(report.risk).toEqual({
      volatility: 0,
      riskLevel: 'very_low',
      downsideRisk: 0,
      upsidePotential: 0,
      riskRewardRatio: Number.POSITIVE_INFINITY,
    });
    expect(report.probabilitySuccess).toBe(1);
    expect(report.probabilityBelowBaseline).toBe(0);
  });

  it('returns no_valid_simulations when every trial fails', async () => {
    const logger = createMockLogger();
    const scoreValue = vi
      .fn<[], number>()
      .mockReturnValueOnce(55)
      .mockImplementation(() => {
        throw new Error('engine unavailable');
      });
    const sim = new MonteCarloSimulator({ scoreValue }, undefined, logger);

    const report = await sim.simulate({ businessId: 'cafe', context: site, numSimulations: 10, seed: 5 });

    expect(report).toEqual({
      status: 'no_valid_simulations',
      businessId: 'cafe',
      seed: 5,
      requestedSimulations: 10,
      failedTrials: 10,
      error: 'No valid simulations',
    });
    expect(logger.warn).toHaveBeenCalledTimes(11);
  });
});

describe('WorkerPoolExecutor', () => {
  it('matches the in-process run for the same seed', async () => {
    const input = { businessId: 'cafe', context: site, numSimulations: 400, seed: 11, batchSize: 100 };
    const pool = new WorkerPoolExecutor({ size: 2, logger: createMockLogger() });

    const inProcess = await new MonteCarloSimulator(engine, undefined, createMockLogger()).simulate(input);
    const pooled = await new MonteCarloSimulator(engine, pool, createMockLogger()).simulate(input);

    expect(pooled.status).toBe('ok');
    expect(pooled).toEqual(inProcess);
  });

  it('passes score options to the workers', async () => {
    const input = {
      businessId: 'cafe',
      context: site,
      numSimulations: 200,
      seed: 4,
      batchSize: 50,
      score: { marketCondition: 'declining_market' as const },
    };
    const pool = new WorkerPoolExecutor({ size: 2, logger: createMockLogger() });

    const inProcess = await new MonteCarloSimulator(engine, undefined, createMockLogger()).simulate(input);
    const pooled = await new MonteCarloSimulator(engine, pool, createMockLogger()).simulate(input);

    expect(pooled).toEqual(inProcess);
  });

  it('resolves an empty run without spawning workers', async () => {
    const pool = new WorkerPoolExecutor({ size: 2, logger: createMockLogger() });
    const plan = { businessId: 'cafe', context: site, inputs: {} };
    await expect(pool.run(plan, [])).resolves.toEqual([]);
  });
});

describe('helpers', () => {
  it('splits trials into batches', () => {
    expect(planBatches(600, 250, 7).map((b) => b.size)).toEqual([250, 250, 100]);
    expect(planBatches(0, 250, 7)).toEqual([]);
  });

  it('uses the nearest-rank percentile', () => {
    expect(percentile([1, 2, 3, 4], 0.5)).toBe(3);
    expect(percentile([1, 2, 3, 4], 0.99)).toBe(4);
    expect(percentile([], 0.5)).toBeNaN();
  });

  it('perturbs only the counts that are present', () => {
    const ctx = makeContext({ osmCounts: { school: 10 }, categoryCounts: { cafe: 10 } });
    const perturbed = perturbContext(ctx, makeRng(11));

    expect(Object.keys(perturbed.osmCounts)).toEqual(['school']);
    expect(perturbed.osmCounts.school).toBeGreaterThanOrEqual(8);
    expect(perturbed.osmCounts.school).toBeLessThanOrEqual(12);
    expect(perturbed.categoryCounts.cafe).toBeGreaterThanOrEqual(7);
    expect(perturbed.categoryCounts.cafe).toBeLessThanOrEqual(13);
    expect(ctx.osmCounts).toEqual({ school: 10 });
  });
});
