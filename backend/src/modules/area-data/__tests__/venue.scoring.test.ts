import { describe, it, expect } from 'vitest';
import {
  bestCluster,
  haversineMeters,
  minMaxNormalize,
  scoreVenues,
  type ScorableVenue,
  type VenueScore,
} from '../clustering/venue.scoring.js';

const EQUAL = { distance: 0.25, competitors: 0.25, rating: 0.25, diversity: 0.25 };

const VENUES: ScorableVenue[] = [
  { id: 'a', name: 'Bean There', category: 'Cafe', lat: 0, lon: 0, rating: 8 },
  { id: 'b', name: 'Daily Grind', category: 'Cafe', lat: 0, lon: 0.001, rating: 6 },
  { id: 'c', name: 'Crumbs', category: 'Bakery', lat: 0.01, lon: 0, rating: 9 },
  { id: 'd', name: 'Page Turner', category: 'Bookshop', lat: 0.01, lon: 0.001 },
];

function venue(cluster: number, score: number): VenueScore {
  return { id: `${cluster}-${score}`, name: 'x', category: 'x', cluster, distanceM: 0, competitors: 0, rating: 0, diversity: 1, score };
}

describe('haversineMeters', () => {
  it('measures a thousandth of a degree along the equator', () => {
    expect(haversineMeters({ lat: 0, lon: 0 }, { lat: 0, lon: 0.001 })).toBeCloseTo(111.195, 3);
    expect(haversineMeters({ lat: 5, lon: 5 }, { lat: 5, lon: 5 })).toBe(0);
  });
});

describe('minMaxNormalize', () => {
  it('maps to 0..1 and flattens equal values to 0', () => {
    const [lo, mid, hi] = minMaxNormalize([2, 4, 6]);
    expect(lo).toBe(0);
    expect(mid).toBeCloseTo(0.5, 6);
    expect(hi).toBeCloseTo(1, 6);
    expect(minMaxNormalize([3, 3])).toEqual([0, 0]);
    expect(minMaxNormalize([])).toEqual([]);
  });
});

describe('scoreVenues', () => {
  const ranking = scoreVenues(VENUES, { lat: 0, lon: 0 }, { assignments: [0, 0, 1, 1] }, EQUAL);

  it('counts same-category neighbours and categories within 200 m', () => {
    const byId = new Map(ranking.venues.map((v) => [v.id, v]));
    expect(['a', 'b', 'c', 'd'].map((id) => byId.get(id)?.competitors)).toEqual([1, 1, 0, 0]);
    expect(['a', 'b', 'c', 'd'].map((id) => byId.get(id)?.diversity)).toEqual([1, 1, 2, 2]);
    expect(byId.get('d')?.rating).toBe(0);
    expect(byId.get('c')?.distanceM).toBe(1112);
  });

  it('ranks venues by weighted normalized score', () => {
    expect(ranking.venues.map((v) => [v.id, v.score])).toEqual([
      ['c', 75.12],
      ['d', 50],
      ['a', 47.22],
      ['b', 39.18],
    ]);
  });

  it('recommends the cluster with the best mean score', () => {
    expect(ranking.recommendedCluster).toEqual({ cluster: 1, averageScore: 62.56, venues: 2 });
    expect(ranking.conclusion).toBe(
      'Cluster 1 has the best average venue score (62.56) across 2 venues. Top venue: Crumbs (75.12).',
    );
  });

  it('flags dense competition', () => {
    const crowded = [0, 0.0001, 0.0002].map((lon, i) => ({ id: `v${i}`, name: `Cafe ${i}`, category: 'Cafe', lat: 0, lon }));
    const result = scoreVenues(crowded, { lat: 0, lon: 0 }, { assignments: [0, 0, 0] });

    expect(result.venues.every((v) => v.competitors === 2)).toBe(true);
    expect(result.conclusion.endsWith('Competition is dense within 200 m: plan to differentiate.')).toBe(true);
  });

  it('has nothing to recommend without venues', () => {
    expect(scoreVenues([], { lat: 0, lon: 0 }, { assignments: [] })).toEqual({
      venues: [],
      recommendedCluster: null,
      conclusion: 'No located venues to score.',
    });
  });
});

describe('bestCluster', () => {
  it('keeps the lower cluster index on a tie', () => {
    expect(bestCluster([venue(2, 40), venue(1, 40), venue(1, 40)])).toEqual({ cluster: 1, averageScore: 40, venues: 2 });
  });
});
