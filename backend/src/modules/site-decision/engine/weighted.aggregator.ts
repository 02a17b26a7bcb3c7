/**
 * Weighted Aggregator
 *
 * FORMULA:
 *   score      = 100 × Σ(s·w) / Σ(w over factors present in both maps)
 *   confidence = max(0.5, 1 − Σ w·(s − 0.5)²)
 *
 * No overlap between scores and weights → score 0.
 */

import { FACTORS, type ComponentScores, type WeightMap } from '../contracts/site-decision.types.js';

export const MIN_CONFIDENCE = 0.5;

export interface AggregateResult {
  score: number;
  confidence: number;
}

export function aggregateScore(scores: ComponentScores, weights: WeightMap): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const f of FACTORS) {
    const s = scores[f];
    const w = weights[f];
    if (s === undefined || w === undefined) continue;
    weighted += s * w;
    totalWeight += w;
  }
  if (totalWeight <= 0) return 0;
  return Math.max(0, Math.min(100, (100 * weighted) / totalWeight));
}

export function aggregateConfidence(scores: ComponentScores, weights: WeightMap): number {
  let dispersion = 0;
  for (const f of FACTORS) {
    const s = scores[f];
    const w = weights[f];
    if (s === undefined || w === undefined) continue;
    dispersion += w * (s - 0.5) ** 2;
  }
  return Math.min(1, Math.max(MIN_CONFIDENCE, 1 - dispersion));
}

export function aggregate(scores: ComponentScores, weights: WeightMap): AggregateResult {
  return {
    score: aggregateScore(scores, weights),
    confidence: aggregateConfidence(scores, weights),
  };
}
