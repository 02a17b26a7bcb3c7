/**
 * Sensitivity Analyzer
 *
 * For each weighted factor: scale its weight by (1 + pct), renormalize and
 * re-aggregate the SAME component scores.
 *
 *   sensitivity = |modified − baseline| / baseline × 100   (0 when baseline is 0)
 *
 * LEVELS: > 30 high, 10..30 medium, < 10 low
 */

import { FACTORS, round, type ComponentScores, type FactorName, type WeightMap } from '../contracts/site-decision.types.js';
import { aggregateScore } from '../engine/weighted.aggregator.js';
import { normalizeWeights } from '../engine/weight.resolver.js';

export type SensitivityLevel = 'high' | 'medium' | 'low';

export const DEFAULT_ADJUSTMENT_PCT = 0.2;

export interface FactorSensitivity {
  factor: FactorName;
  sensitivity: number;
  level: SensitivityLevel;
  modifiedScore: number;
}

export interface SensitivitySummary {
  mostSensitive: FactorName[];
  moderatelySensitive: FactorName[];
  leastSensitive: FactorName[];
  criticalFactors: FactorName[];
  averageSensitivity: number;
  distribution: Record<SensitivityLevel, number>;
}

export interface SensitivityReport {
  baselineScore: number;
  adjustmentPct: number;
  sensitivities: Partial<Record<FactorName, number>>;
  factors: FactorSensitivity[];
  summary: SensitivitySummary;
}

export function sensitivityLevel(value: number): SensitivityLevel {
  if (value > 30) return 'high';
  if (value >= 10) return 'medium';
  return 'low';
}

export function factorSensitivities(
  scores: ComponentScores,
  weights: WeightMap,
  adjustmentPct: number = DEFAULT_ADJUSTMENT_PCT,
): FactorSensitivity[] {
  const baseline = aggregateScore(scores, weights);
  const out: FactorSensitivity[] = [];

  for (const factor of FACTORS) {
    const w = weights[factor];
    if (w === undefined) continue;
    const modified = normalizeWeights({ ...weights, [factor]: w * (1 + adjustmentPct) }) ?? weights;
    const modifiedScore = aggregateScore(scores, modified);
    const sensitivity = baseline > 0 ? (Math.abs(modifiedScore - baseline) / baseline) * 100 : 0;
    out.push({ factor, sensitivity, level: sensitivityLevel(sensitivity), modifiedScore });
  }
  return out;
}

export function summarizeSensitivity(factors: readonly FactorSensitivity[]): SensitivitySummary {
  const sorted = [...factors].sort((a, b) => b.sensitivity - a.sensitivity);
  const pick = (level: SensitivityLevel) => sorted.filter((f) => f.level === level).map((f) => f.factor);
  const high = pick('high');
  const total = factors.reduce((acc, f) => acc + f.sensitivity, 0);

  return {
    mostSensitive: high,
    moderatelySensitive: pick('medium'),
    leastSensitive: pick('low'),
    criticalFactors: high.slice(0, 3),
    averageSensitivity: factors.length ? round(total / factors.length, 3) : 0,
    distribution: {
      high: high.length,
      medium: factors.filter((f) => f.level === 'medium').length,
      low: factors.filter((f) => f.level === 'low').length,
    },
  };
}

export function analyzeSensitivity(
  scores: ComponentScores,
  weights: WeightMap,
  adjustmentPct: number = DEFAULT_ADJUSTMENT_PCT,
): SensitivityReport {
  const factors = factorSensitivities(scores, weights, adjustmentPct);
  const sensitivities: Partial<Record<FactorName, number>> = {};
  for (const f of factors) sensitivities[f.factor] = f.sensitivity;

  return {
    baselineScore: aggregateScore(scores, weights),
    adjustmentPct,
    sensitivities,
    factors,
    summary: summarizeSensitivity(factors),
  };
}
