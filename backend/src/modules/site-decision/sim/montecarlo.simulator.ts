/**
 * Monte Carlo Simulator
 *
 * Per trial: perturb a deep copy of the context (feature counts ±20%,
 * category counts ±30%, rounded, floor 0), re-score, collect. A trial that
 * throws is skipped.
 *
 * Trials run in independently seeded batches merged by concatenation, so the
 * result for a given seed does not depend on how batches are executed.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { deriveSeed, makeRng, randomSeed, uniform, type Rng } from '../../../common/random.js';
import {
  BASELINE_INPUTS,
  FEATURE_TAGS,
  cloneContext,
  round,
  type BusinessId,
  type MarketContext,
  type RiskLevel,
  type UserInputs,
} from '../contracts/site-decision.types.js';
import type { ScoreOptions, SiteScoringEngine } from '../engine/site-scoring.engine.js';

export const FEATURE_NOISE = 0.2;
export const CATEGORY_NOISE = 0.3;
export const SUCCESS_THRESHOLD = 60;
export const DEFAULT_SIMULATIONS = 1000;
export const DEFAULT_BATCH_SIZE = 250;

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface MonteCarloInput {
  businessId: BusinessId;
  context: MarketContext;
  numSimulations?: number;
  seed?: number;
  inputs?: Partial<UserInputs>;
  batchSize?: number;
  score?: ScoreOptions;
}

export interface MonteCarloStatistics {
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  p5: number;
  p25: number;
  p75: number;
  p95: number;
}

export interface MonteCarloRisk {
  volatility: number;
  riskLevel: RiskLevel;
  downsideRisk: number;
  upsidePotential: number;
  /** Infinity when there is no downside. */
  riskRewardRatio: number;
}

export interface MonteCarloReport {
  status: 'ok';
  businessId: BusinessId;
  seed: number;
  baselineScore: number;
  requestedSimulations: number;
  numSimulations: number;
  failedTrials: number;
  statistics: MonteCarloStatistics;
  risk: MonteCarloRisk;
  probabilityBelowBaseline: number;
  probabilitySuccess: number;
  confidenceInterval90: [number, number];
}

export interface NoValidSimulations {
  status: 'no_valid_simulations';
  businessId: BusinessId;
  seed: number;
  requestedSimulations: number;
  failedTrials: number;
  error: string;
}

export type MonteCarloSummary = MonteCarloReport | NoValidSimulations;

export interface TrialBatch {
  index: number;
  seed: number;
  size: number;
}

export interface BatchOutcome {
  scores: number[];
  failed: number;
}

/** Everything a trial needs besides its batch seed. */
export interface TrialPlan {
  businessId: BusinessId;
  context: MarketContext;
  inputs: Partial<UserInputs>;
  score?: ScoreOptions;
}

/**
 * Runs trial batches and resolves with their outcomes in batch order. The
 * in-process executor calls `runBatch`; a pooled executor ships the plan and
 * batch seeds to its workers instead.
 */
export interface BatchExecutor {
  run(
    plan: TrialPlan,
    batches: readonly TrialBatch[],
    runBatch: (batch: TrialBatch) => BatchOutcome,
  ): Promise<BatchOutcome[]>;
}

export const inProcessExecutor: BatchExecutor = {
  run: async (_plan, batches, runBatch) => batches.map(runBatch),
};

// ═══════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════

/**
 * Nearest-rank percentile on a sorted list: sorted[⌊n·p⌋].
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN;
  const idx = Math.min(sorted.length - 1, Math.floor(sorted.length * p));
  return sorted[idx] ?? NaN;
}

export function mean(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

/**
 * Population standard deviation.
 */
export function stdev(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  const m = mean(xs);
  return Math.sqrt(xs.reduce((acc, x) => acc + (x - m) * (x - m), 0) / xs.length);
}

export function describeScores(scores: readonly number[]): MonteCarloStatistics {
  const sorted = [...scores].sort((a, b) => a - b);
  return {
    mean: mean(sorted),
    median: percentile(sorted, 0.5),
    std: stdev(sorted),
    min: sorted[0] ?? NaN,
    max: sorted[sorted.length - 1] ?? NaN,
    p5: percentile(sorted, 0.05),
    p25: percentile(sorted, 0.25),
    p75: percentile(sorted, 0.75),
    p95: percentile(sorted, 0.95),
  };
}

export function volatilityRisk(volatility: number): RiskLevel {
  if (volatility < 0.1) return 'very_low';
  if (volatility < 0.2) return 'low';
  if (volatility < 0.3) return 'medium';
  if (volatility < 0.5) return 'high';
  return 'very_high';
}

export function assessRisk(stats: MonteCarloStatistics, baseline: number): MonteCarloRisk {
  const volatility = stats.mean > 0 ? stats.std / stats.mean : 1;
  const downsideRisk = Math.max(0, baseline - stats.p5);
  const upsidePotential = Math.max(0, stats.p95 - baseline);
  return {
    volatility: round(volatility, 4),
    riskLevel: volatilityRisk(volatility),
    downsideRisk: round(downsideRisk, 2),
    upsidePotential: round(upsidePotential, 2),
    riskRewardRatio: downsideRisk > 0 ? round(upsidePotential / downsideRisk, 3) : Number.POSITIVE_INFINITY,
  };
}

// ═══════════════════════════════════════════════════════════════
// PERTURBATION
// ═══════════════════════════════════════════════════════════════

function perturb(count: number, noise: number, rng: Rng): number {
  return Math.max(0, Math.round(count * uniform(rng, 1 - noise, 1 + noise)));
}

export function perturbContext(context: MarketContext, rng: Rng): MarketContext {
  const copy = cloneContext(context);
  for (const tag of FEATURE_TAGS) {
    const count = copy.osmCounts[tag];
    if (count !== undefined) copy.osmCounts[tag] = perturb(count, FEATURE_NOISE, rng);
  }
  for (const id of Object.keys(copy.categoryCounts).sort()) {
    copy.categoryCounts[id] = perturb(copy.categoryCounts[id] ?? 0, CATEGORY_NOISE, rng);
  }
  return copy;
}

export function planBatches(total: number, batchSize: number, seed: number): TrialBatch[] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: TrialBatch[] = [];
  for (let start = 0, index = 0; start < total; start += size, index++) {
    batches.push({ index, seed: deriveSeed(seed, index), size: Math.min(size, total - start) });
  }
  return batches;
}

/**
 * One batch: a fresh RNG from the batch seed, one perturbed context per trial.
 */
export function runTrialBatch(
  engine: Pick<SiteScoringEngine, 'scoreValue'>,
  plan: TrialPlan,
  batch: TrialBatch,
  logger: Logger,
): BatchOutcome {
  const rng = makeRng(batch.seed);
  const scores: number[] = [];
  let failed = 0;
  for (let k = 0; k < batch.size; k++) {
    const trialContext = perturbContext(plan.context, rng);
    try {
      scores.push(engine.scoreValue(plan.businessId, plan.inputs, trialContext, plan.score));
    } catch (err) {
      failed++;
      logger.warn({ businessId: plan.businessId, batch: batch.index, trial: k, err: errorMessage(err) }, 'trial failed');
    }
  }
  return { scores, failed };
}

// ═══════════════════════════════════════════════════════════════
// SIMULATOR
// ═══════════════════════════════════════════════════════════════

export class MonteCarloSimulator {
  constructor(
    private readonly engine: Pick<SiteScoringEngine, 'scoreValue'>,
    private readonly executor: BatchExecutor = inProcessExecutor,
    private readonly logger: Logger = createLogger('monte-carlo'),
  ) {}

  async simulate(input: MonteCarloInput): Promise<MonteCarloSummary> {
    const requested = Math.max(0, Math.floor(input.numSimulations ?? DEFAULT_SIMULATIONS));
    const seed = input.seed ?? randomSeed();
    const { businessId } = input;
    const plan: TrialPlan = {
      businessId,
      context: input.context,
      inputs: input.inputs ?? BASELINE_INPUTS,
      ...(input.score ? { score: input.score } : {}),
    };

    const baseline = this.engine.scoreValue(businessId, plan.inputs, plan.context, plan.score);
    const batches = planBatches(requested, input.batchSize ?? DEFAULT_BATCH_SIZE, seed);

    const outcomes = await this.executor.run(plan, batches, (batch) =>
      runTrialBatch(this.engine, plan, batch, this.logger),
    );

    const scores = outcomes.flatMap((o) => o.scores);
    const failedTrials = outcomes.reduce((acc, o) => acc + o.failed, 0);

    if (scores.length === 0) {
      this.logger.warn({ businessId, requested, failedTrials }, 'no valid simulations');
      return {
        status: 'no_valid_simulations',
        businessId,
        seed,
        requestedSimulations: requested,
        failedTrials,
        error: 'No valid simulations',
      };
    }

    const stats = describeScores(scores);
    const n = scores.length;

    return {
      status: 'ok',
      businessId,
      seed,
      baselineScore: round(baseline, 2),
      requestedSimulations: requested,
      numSimulations: n,
      failedTrials,
      statistics: {
        mean: round(stats.mean, 2),
        median: round(stats.median, 2),
        std: round(stats.std, 2),
        min: round(stats.min, 2),
        max: round(stats.max, 2),
        p5: round(stats.p5, 2),
        p25: round(stats.p25, 2),
        p75: round(stats.p75, 2),
        p95: round(stats.p95, 2),
      },
      risk: assessRisk(stats, baseline),
      probabilityBelowBaseline: round(scores.filter((s) => s < baseline).length / n, 4),
      probabilitySuccess: round(scores.filter((s) => s >= SUCCESS_THRESHOLD).length / n, 4),
      confidenceInterval90: [round(stats.p5, 2), round(stats.p95, 2)],
    };
  }
}
