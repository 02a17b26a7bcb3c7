import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, UpstreamError, ValidationError } from '../../../common/errors.js';
import { FEATURE_TAGS } from '../../site-decision/contracts/site-decision.types.js';
import { loadSiteCatalog } from '../../site-decision/catalog/catalog.loader.js';
import { createMockLogger } from '../../site-decision/__tests__/helpers.js';
import { AreaDataService, toSnapshot } from '../area-data.service.js';
import {
  noData,
  type FeatureCounts,
  type GeoPoint,
  type Place,
  type PlaceQuery,
  type ProviderResult,
} from '../area-data.types.js';
import { emptyFeatureCounts } from '../providers/area-features.provider.js';

const categories = loadSiteCatalog().placeCategories;

const SQUARE: GeoPoint = { lat: 10, lon: 106, displayName: 'Test Square' };

const PLACES: Place[] = [
  { id: '1', name: 'Corner Coffee', category: 'Coffee Shop', lat: 10.001, lon: 106.001 },
  { id: '2', name: 'Tea Spot', category: 'Bubble Tea Shop', lat: 10.002, lon: 106.002 },
  { id: '3', name: 'City Bank', category: 'Bank' },
];

const COUNTS: FeatureCounts = { ...emptyFeatureCounts(), school: 2, bus_stop: 3 };

function live<T>(data: T): ProviderResult<T> {
  return { data, quality: { mode: 'LIVE', missing: [] } };
}

function makeProviders() {
  return {
    geocode: { geocode: vi.fn<[string], Promise<ProviderResult<GeoPoint>>>().mockResolvedValue(live(SQUARE)) },
    places: { searchPlaces: vi.fn<[PlaceQuery], Promise<ProviderResult<Place[]>>>().mockResolvedValue(live(PLACES)) },
    features: {
      getAreaFeatures: vi
        .fn<[number, number, number], Promise<ProviderResult<FeatureCounts>>>()
        .mockResolvedValue(live(COUNTS)),
    },
  };
}

describe('AreaDataService.collect', () => {
  it('geocodes, maps categories and clusters located places', async () => {
    const providers = makeProviders();
    const service = new AreaDataService(providers, categories, createMockLogger());

    const area = await service.collect({ address: '1 Test Square', radius: 500, priceRange: { min: 1, max: 2 } });

    expect(area.location).toEqual(SQUARE);
    expect(area.radius).toBe(500);
    expect(area.osmCounts).toEqual(COUNTS);
    expect(area.categoryCounts).toEqual({ cafe: 1, milk_tea: 1 });
    expect(area.places.map((p) => p.businessId)).toEqual(['cafe', 'milk_tea', undefined]);
    expect(area.clusters.sizes.reduce((a, b) => a + b, 0)).toBe(2);
    expect(area.clusters.centroids).toHaveLength(2);
    expect(area.quality.mode).toBe('LIVE');
    expect(providers.places.searchPlaces).toHaveBeenCalledWith({
      lat: 10,
      lon: 106,
      radius: 500,
      priceRange: { min: 1, max: 2 },
    });
    expect(providers.features.getAreaFeatures).toHaveBeenCalledWith(10, 106, 500);
  });

  it('scores located venues and recommends the best cluster', async () => {
    const service = new AreaDataService(makeProviders(), categories, createMockLogger());

    const area = await service.collect({ address: '1 Test Square' });
    const { venues, recommendedCluster, conclusion } = area.venueRanking;
    const cluster = area.clusters.assignments[0];

    expect(venues.map((v) => [v.id, v.score])).toEqual([
      ['1', 60],
      ['2', 30],
    ]);
    expect(venues[0]).toMatchObject({ competitors: 0, diversity: 2, rating: 0, cluster });
    expect(recommendedCluster).toEqual({ cluster, averageScore: 60, venues: 1 });
    expect(conclusion).toBe(
      `Cluster ${cluster} has the best average venue score (60) across 1 venue. Top venue: Corner Coffee (60).`,
    );
  });

  it('skips geocoding when coordinates are given', async () => {
    const providers = makeProviders();
    const service = new AreaDataService(providers, categories, createMockLogger());

    const area = await service.collect({ lat: 10.5, lon: 106.5 });

    expect(providers.geocode.geocode).not.toHaveBeenCalled();
    expect(area.location).toEqual({ lat: 10.5, lon: 106.5, displayName: '10.5,106.5' });
    expect(area.radius).toBe(1000);
  });

  it('degrades when a provider has no data', async () => {
    const providers = makeProviders();
    providers.features.getAreaFeatures.mockResolvedValue(noData([...FEATURE_TAGS], 'timeout'));
    const logger = createMockLogger();
    const service = new AreaDataService(providers, categories, logger);

    const area = await service.collect({ address: '1 Test Square' });

    expect(area.osmCounts).toEqual(emptyFeatureCounts());
    expect(area.quality.mode).toBe('DEGRADED');
    expect(area.quality.missing).toEqual([...FEATURE_TAGS]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('fails on an address that cannot be resolved', async () => {
    const providers = makeProviders();
    const service = new AreaDataService(providers, categories, createMockLogger());

    providers.geocode.geocode.mockResolvedValueOnce(noData(['coordinates']));
    await expect(service.collect({ address: 'Nowhere' })).rejects.toBeInstanceOf(NotFoundError);

    providers.geocode.geocode.mockResolvedValueOnce(noData(['coordinates'], 'socket hang up'));
    await expect(service.collect({ address: '1 Test Square' })).rejects.toBeInstanceOf(UpstreamError);

    await expect(service.collect({ address: '   ' })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('toSnapshot', () => {
  it('carries the centre and radius as coordinates', async () => {
    const service = new AreaDataService(makeProviders(), categories, createMockLogger());
    const area = await service.collect({ address: '1 Test Square', radius: 800 });

    const snapshot = toSnapshot(area);

    expect(snapshot.coordinates).toEqual({ lat: 10, lon: 106, radius: 800 });
    expect(snapshot.places).toHaveLength(3);
  });
});
