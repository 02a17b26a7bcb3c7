/**
 * Venue Scoring
 * =============
 * Scores each located venue against the search center and its neighbours:
 *
 *   distance     meters to the center (closer is better)
 *   competitors  same-category venues within 200 m (fewer is better)
 *   rating       provider rating, 0 when absent (higher is better)
 *   diversity    distinct categories within 200 m, itself included (higher is better)
 *
 * Each signal is min-max normalized over the venues, (v - min) / (max - min + 1e-6),
 * and the weighted sum is scaled to 0-100. The recommended cluster is the one
 * with the best mean venue score.
 */

import { round } from '../../site-decision/contracts/site-decision.types.js';
import type { Place } from '../area-data.types.js';
import type { VenueClusters } from './venue.kmeans.js';

export const NEIGHBOUR_RADIUS_M = 200;
const EARTH_RADIUS_M = 6_371_008.8;
const NORMALIZE_EPSILON = 1e-6;
const DENSE_COMPETITION = 2;

export interface VenueScoreWeights {
  distance: number;
  competitors: number;
  rating: number;
  diversity: number;
}

export const DEFAULT_VENUE_WEIGHTS: VenueScoreWeights = Object.freeze({
  distance: 0.3,
  competitors: 0.3,
  rating: 0.25,
  diversity: 0.15,
});

export type ScorableVenue = Pick<Place, 'id' | 'name' | 'category' | 'businessId' | 'rating'> & {
  lat: number;
  lon: number;
};

export interface VenueScore {
  id: string;
  name: string;
  category: string;
  cluster: number;
  distanceM: number;
  competitors: number;
  rating: number;
  diversity: number;
  score: number;
}

export interface RecommendedCluster {
  cluster: number;
  averageScore: number;
  venues: number;
}

export interface VenueRanking {
  venues: VenueScore[];
  recommendedCluster: RecommendedCluster | null;
  conclusion: string;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function haversineMeters(a: { lat: number; lon: number }, b: { lat: number; lon: number }): number {
  const rad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * rad;
  const dLon = (b.lon - a.lon) * rad;
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(a.lat * rad) * Math.cos(b.lat * rad) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function minMaxNormalize(values: readonly number[]): number[] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  return values.map((v) => (v - min) / (max - min + NORMALIZE_EPSILON));
}

function categoryKey(venue: ScorableVenue): string {
  return venue.businessId ?? venue.category.toLowerCase();
}

export function bestCluster(venues: readonly VenueScore[]): RecommendedCluster | null {
  const totals = new Map<number, { sum: number; count: number }>();
  for (const v of venues) {
    const t = totals.get(v.cluster) ?? { sum: 0, count: 0 };
    totals.set(v.cluster, { sum: t.sum + v.score, count: t.count + 1 });
  }

  let best: RecommendedCluster | null = null;
  for (const [cluster, { sum, count }] of [...totals.entries()].sort((a, b) => a[0] - b[0])) {
    const averageScore = round(sum / count, 2);
    if (!best || averageScore > best.averageScore) best = { cluster, averageScore, venues: count };
  }
  return best;
}

export function venueConclusion(venues: readonly VenueScore[], recommended: RecommendedCluster | null): string {
  const top = venues[0];
  if (!top || !recommended) return 'No located venues to score.';

  const meanCompetitors = venues.reduce((acc, v) => acc + v.competitors, 0) / venues.length;
  const dense =
    meanCompetitors >= DENSE_COMPETITION
      ? ` Competition is dense within ${NEIGHBOUR_RADIUS_M} m: plan to differentiate.`
      : '';
  return (
    `Cluster ${recommended.cluster} has the best average venue score (${recommended.averageScore}) ` +
    `across ${recommended.venues} venue${recommended.venues === 1 ? '' : 's'}. Top venue: ${top.name} (${top.score}).${dense}`
  );
}

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

/**
 * `clusters.assignments[i]` is the cluster of `venues[i]`; a venue without an
 * assignment lands in cluster 0. Results are sorted by score, best first.
 */
export function scoreVenues(
  venues: readonly ScorableVenue[],
  center: { lat: number; lon: number },
  clusters: Pick<VenueClusters, 'assignments'>,
  weights: VenueScoreWeights = DEFAULT_VENUE_WEIGHTS,
): VenueRanking {
  const distances = venues.map((v) => haversineMeters(center, v));
  const competitors: number[] = [];
  const diversity: number[] = [];

  for (const venue of venues) {
    const near = venues.filter((other) => haversineMeters(venue, other) <= NEIGHBOUR_RADIUS_M);
    competitors.push(near.filter((other) => other !== venue && categoryKey(other) === categoryKey(venue)).length);
    diversity.push(new Set(near.map(categoryKey)).size);
  }
  const ratings = venues.map((v) => v.rating ?? 0);

  const nDistance = minMaxNormalize(distances);
  const nCompetitors = minMaxNormalize(competitors);
  const nRating = minMaxNormalize(ratings);
  const nDiversity = minMaxNormalize(diversity);

  const scored: VenueScore[] = venues.map((venue, i) => ({
    id: venue.id,
    name: venue.name,
    category: venue.category,
    cluster: clusters.assignments[i] ?? 0,
    distanceM: round(distances[i], 1),
    competitors: competitors[i],
    rating: ratings[i],
    diversity: diversity[i],
    score: round(
      100 *
        (weights.distance * (1 - nDistance[i]) +
          weights.competitors * (1 - nCompetitors[i]) +
          weights.rating * nRating[i] +
          weights.diversity * nDiversity[i]),
      2,
    ),
  }));
  scored.sort((a, b) => b.score - a.score);

  const recommendedCluster = bestCluster(scored);
  return { venues: scored, recommendedCluster, conclusion: venueConclusion(scored, recommendedCluster) };
}
