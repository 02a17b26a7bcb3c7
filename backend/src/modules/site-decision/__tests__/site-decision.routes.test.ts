import { describe, it, expect, vi, afterAll } from 'vitest';
import { buildApp } from '../../../app.js';
import { AreaDataService } from '../../area-data/area-data.service.js';
import type { GeoPoint, ProviderResult } from '../../area-data/area-data.types.js';
import { emptyFeatureCounts } from '../../area-data/providers/area-features.provider.js';
import { SiteDecisionService } from '../site-decision.service.js';
import { catalog, createMockLogger, EXAMPLE_OSM } from './helpers.js';

const NOW = new Date('2026-03-01T00:00:00.000Z');

function live<T>(data: T): ProviderResult<T> {
  return { data, quality: { mode: 'LIVE', missing: [] } };
}

const areaData = new AreaDataService(
  {
    geocode: { geocode: vi.fn(async () => live<GeoPoint>({ lat: 10, lon: 106, displayName: 'Test Square' })) },
    places: {
      searchPlaces: vi.fn(async () =>
        live([
          { id: '1', name: 'Corner Coffee', category: 'Coffee Shop', lat: 10.001, lon: 106.001 },
          { id: '2', name: 'Tea Spot', category: 'Bubble Tea Shop', lat: 10.002, lon: 106.002 },
        ]),
      ),
    },
    features: { getAreaFeatures: vi.fn(async () => live({ ...emptyFeatureCounts(), ...EXAMPLE_OSM })) },
  },
  catalog.placeCategories,
  createMockLogger(),
);

const app = buildApp({
  siteDecision: new SiteDecisionService({ catalog, areaData, logger: createMockLogger(), clock: () => NOW }),
});

const bareApp = buildApp({
  siteDecision: new SiteDecisionService({ catalog, logger: createMockLogger(), clock: () => NOW }),
});

afterAll(async () => {
  await app.close();
  await bareApp.close();
});

const AREA = { osmCounts: EXAMPLE_OSM, categoryCounts: { milk_tea: 2 }, month: 9 };

describe('site decision API', () => {
  it('GET /api/health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: 'site-decision' });
  });

  it('GET /catalog lists businesses and factors', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/site-decision/catalog' });
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.data.businesses).toHaveLength(25);
    expect(body.data.factors).toHaveLength(8);
  });

  it('POST /score returns the result with importance and seasonal outlook', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/score',
      payload: { businessId: 'milk_tea', inputs: { customerTarget: 'student' }, area: AREA },
    });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.data.result.businessId).toBe('milk_tea');
    expect(body.data.result.degraded).toBe(false);
    expect(body.data.importance.customer).toBe('critical');
    expect(body.data.seasonal.customerTarget).toBe('student');
  });

  it('rejects an unknown feature tag with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/score',
      payload: { businessId: 'cafe', area: { osmCounts: { castle: 1 } } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('POST /rules blocks an oversaturated market', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/rules',
      payload: { businessId: 'milk_tea', area: { ...AREA, categoryCounts: { milk_tea: 9 } } },
    });
    expect(res.json().data.summary.overallRisk).toBe('very_high');
  });

  it('POST /scenarios with an unknown id is a 404', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/scenarios',
      payload: { businessId: 'cafe', area: AREA, scenarioIds: ['alien_invasion'] },
    });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Unknown scenario: alien_invasion' });
  });

  it('POST /scenarios runs a subset plus custom scenarios', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/scenarios',
      payload: {
        businessId: 'cafe',
        area: AREA,
        scenarioIds: ['economic_downturn'],
        custom: [
          {
            name: 'Rent spike',
            changes: { financial_viability: -0.5 },
            businessSpecificOverrides: { cafe: { customer: -0.2 } },
          },
        ],
      },
    });
    const ids = res.json().data.results.map((r: { scenarioId: string }) => r.scenarioId).sort();
    expect(ids).toEqual(['custom_rent_spike', 'economic_downturn']);
  });

  it('POST /decision-tree answers from the requested scenarios', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/decision-tree',
      payload: { businessId: 'cafe', area: AREA, scenarioIds: ['economic_downturn'] },
    });
    const tree = res.json().data;

    expect(res.statusCode).toBe(200);
    expect(tree.root.question).toBe('Does the baseline score reach 60?');
    expect(tree.viabilityThreshold).toBe(60);
    expect(tree.failedScenarios).toEqual([]);
  });

  it('POST /what-if reports each condition', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/what-if',
      payload: { businessId: 'cafe', area: AREA, conditions: { unchanged: {} } },
    });
    expect(res.json().data).toEqual([
      expect.objectContaining({ condition: 'unchanged', scoreChange: 0, impact: 'negligible' }),
    ]);
  });

  it('POST /monte-carlo is reproducible with a seed', async () => {
    const payload = { businessId: 'cafe', area: AREA, numSimulations: 200, seed: 42 };
    const first = await app.inject({ method: 'POST', url: '/api/site-decision/monte-carlo', payload });
    const second = await app.inject({ method: 'POST', url: '/api/site-decision/monte-carlo', payload });

    expect(first.json().data.status).toBe('ok');
    expect(first.json().data.numSimulations).toBe(200);
    expect(second.json()).toEqual(first.json());
  });

  it('POST /monte-carlo scores the baseline with the requested weights', async () => {
    const weights = { customer: 1 };
    const score = await app.inject({
      method: 'POST',
      url: '/api/site-decision/score',
      payload: { businessId: 'cafe', area: AREA, weights },
    });
    const mc = await app.inject({
      method: 'POST',
      url: '/api/site-decision/monte-carlo',
      payload: { businessId: 'cafe', area: AREA, weights, numSimulations: 50, seed: 1 },
    });

    const customer = score.json().data.result.components.customer;
    expect(mc.json().data.baselineScore).toBeCloseTo(customer * 100, 1);
  });

  it('POST /screen ranks every business', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/site-decision/screen', payload: { area: AREA } });
    expect(res.json().data).toHaveLength(25);
  });

  it('POST /insights returns market insights and data quality', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/insights',
      payload: { area: AREA, coordinates: { lat: 10, lon: 106, radius: 1000 } },
    });
    const body = res.json();
    expect(body.data.insights.fallback).toBe(false);
    expect(body.data.dataQuality.sources).toEqual(['OpenStreetMap', 'Geocoding']);
  });

  it('GET /seasonal/:businessId', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/site-decision/seasonal/ice_cream?month=4' });
    const body = res.json();
    expect(body.data.bestMonths).toEqual([4, 5, 7]);
    expect(body.data.monthAdvice).toBe('Current month is strong: focus on sales');
  });

  it('GET /seasonal/:businessId includes a demand forecast', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/site-decision/seasonal/cafe?month=11&monthsAhead=3' });
    const forecast = res.json().data.forecast;

    expect(forecast.map((p: { month: number }) => p.month)).toEqual([11, 12, 1]);
    expect(forecast[2]).toMatchObject({ yearOffset: 1, seasonalFactor: 0.96, forecastedDemand: 97.9 });
  });

  it('POST /analyze collects area data and ranks businesses', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/analyze',
      payload: { address: '1 Test Square, Springfield', radius: 800 },
    });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.data.analysisId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(body.data.createdAt).toBe('2026-03-01T00:00:00.000Z');
    expect(body.data.location).toEqual({ lat: 10, lon: 106, displayName: 'Test Square' });
    expect(body.data.context.categoryCounts).toEqual({ cafe: 1, milk_tea: 1 });
    expect(body.data.ranking).toHaveLength(25);
    expect(body.data.inputIssues).toEqual([]);
    expect(body.data.areaQuality.mode).toBe('LIVE');
  });

  it('POST /analyze scores venues with the requested weights', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/site-decision/analyze',
      payload: { lat: 10, lon: 106, venueWeights: { distance: 1, competitors: 0, rating: 0, diversity: 0 } },
    });
    const { venueRanking, clusters } = res.json().data;

    expect(venueRanking.venues.map((v: { id: string; score: number }) => [v.id, v.score])).toEqual([
      ['1', 100],
      ['2', 0],
    ]);
    expect(venueRanking.recommendedCluster).toEqual({ cluster: clusters.assignments[0], averageScore: 100, venues: 1 });
  });

  it('POST /analyze needs an address or coordinates', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/site-decision/analyze', payload: { radius: 800 } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('POST /analyze is unavailable without an area data service', async () => {
    const res = await bareApp.inject({
      method: 'POST',
      url: '/api/site-decision/analyze',
      payload: { lat: 10, lon: 106 },
    });
    expect(res.statusCode).toBe(503);
    expect(res.json().error).toBe('AREA_DATA_UNAVAILABLE');
  });

  it('unknown routes are 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
