/**
 * Venue Clustering
 * ================
 * KMeans over venue coordinates (Euclidean on lat/lon, k-means++ init).
 * Seeded, so the same venues and seed give the same clusters.
 */

import { makeRng, type Rng } from '../../../common/random.js';

export interface LocatedVenue {
  lat: number;
  lon: number;
}

export interface VenueClusters {
  centroids: Array<{ lat: number; lon: number }>;
  assignments: number[];
  sizes: number[];
  /** Sum of squared distances to the assigned centroid. */
  inertia: number;
}

type Point = [number, number];

export const DEFAULT_CLUSTER_SEED = 42;
const MAX_ITERATIONS = 50;

function sqDistance(a: Point, b: Point): number {
  const dLat = a[0] - b[0];
  const dLon = a[1] - b[1];
  return dLat * dLat + dLon * dLon;
}

function meanPoint(points: Point[]): Point {
  let lat = 0;
  let lon = 0;
  for (const p of points) {
    lat += p[0];
    lon += p[1];
  }
  return [lat / points.length, lon / points.length];
}

function nearest(point: Point, centroids: Point[]): { index: number; d2: number } {
  let index = 0;
  let d2 = Infinity;
  for (let c = 0; c < centroids.length; c++) {
    const d = sqDistance(point, centroids[c]);
    if (d < d2) {
      d2 = d;
      index = c;
    }
  }
  return { index, d2 };
}

function pickKMeansPlusPlus(points: Point[], k: number, rng: Rng): Point[] {
  const first = points[Math.min(Math.floor(rng() * points.length), points.length - 1)];
  const centroids: Point[] = [[first[0], first[1]]];

  while (centroids.length < k) {
    const d2 = points.map((p) => nearest(p, centroids).d2);
    const sum = d2.reduce((a, b) => a + b, 0);
    if (sum === 0) break;

    let r = rng() * sum;
    let idx = 0;
    for (; idx < d2.length; idx++) {
      r -= d2[idx];
      if (r <= 0) break;
    }
    const chosen = points[Math.min(idx, points.length - 1)];
    centroids.push([chosen[0], chosen[1]]);
  }
  return centroids;
}

/**
 * Cluster venues into at most `k` groups. Fewer groups come back when there
 * are fewer distinct locations than `k`.
 */
export function clusterVenues(venues: readonly LocatedVenue[], k: number, seed: number = DEFAULT_CLUSTER_SEED): VenueClusters {
  const points: Point[] = venues
    .filter((v) => Number.isFinite(v.lat) && Number.isFinite(v.lon))
    .map((v) => [v.lat, v.lon]);
  if (points.length === 0 || k <= 0) {
    return { centroids: [], assignments: [], sizes: [], inertia: 0 };
  }

  const centroids = pickKMeansPlusPlus(points, Math.min(Math.floor(k), points.length), makeRng(seed));
  const assignments: number[] = new Array<number>(points.length).fill(-1);

  for (let t = 0; t < MAX_ITERATIONS; t++) {
    let changed = false;
    for (let i = 0; i < points.length; i++) {
      const { index } = nearest(points[i], centroids);
      if (assignments[i] !== index) {
        assignments[i] = index;
        changed = true;
      }
    }
    if (!changed) break;

    const buckets: Point[][] = centroids.map(() => []);
    for (let i = 0; i < points.length; i++) buckets[assignments[i]].push(points[i]);
    for (let c = 0; c < centroids.length; c++) {
      if (buckets[c].length > 0) centroids[c] = meanPoint(buckets[c]);
    }
  }

  const sizes = centroids.map(() => 0);
  let inertia = 0;
  for (let i = 0; i < points.length; i++) {
    sizes[assignments[i]] += 1;
    inertia += sqDistance(points[i], centroids[assignments[i]]);
  }

  return {
    centroids: centroids.map(([lat, lon]) => ({ lat, lon })),
    assignments,
    sizes,
    inertia,
  };
}
