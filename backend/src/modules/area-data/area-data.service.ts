/**
 * Area Data Service
 *
 * Resolves a location, then fetches places and area features in parallel.
 * A failed provider degrades the snapshot (its counts become 0 and are
 * listed in quality.missing); only an unresolvable location is fatal.
 */

import { NotFoundError, UpstreamError, ValidationError } from '../../common/errors.js';
import { createLogger, type Logger } from '../../common/logger.js';
import type { BusinessId } from '../site-decision/contracts/site-decision.types.js';
import type { AreaSnapshot } from '../site-decision/insights/data.validator.js';
import { countCategories, mapPlaceCategory, type PlaceCategoryTable } from './category.mapper.js';
import { clusterVenues, type LocatedVenue, type VenueClusters } from './clustering/venue.kmeans.js';
import { scoreVenues, type VenueRanking, type VenueScoreWeights } from './clustering/venue.scoring.js';
import { emptyFeatureCounts } from './providers/area-features.provider.js';
import type {
  AreaFeaturesProvider,
  DataMode,
  DataQuality,
  FeatureCounts,
  GeocodeProvider,
  GeoPoint,
  Place,
  PlacesProvider,
  PriceRange,
} from './area-data.types.js';

export const DEFAULT_RADIUS_M = 1000;
export const DEFAULT_CLUSTER_COUNT = 3;

export interface AreaRequest {
  address?: string;
  lat?: number;
  lon?: number;
  radius?: number;
  priceRange?: PriceRange;
  clusterCount?: number;
  venueWeights?: VenueScoreWeights;
}

export interface AreaQuality {
  mode: DataMode;
  geocode: DataQuality;
  places: DataQuality;
  features: DataQuality;
  missing: string[];
}

export interface AreaData {
  location: GeoPoint;
  radius: number;
  osmCounts: FeatureCounts;
  categoryCounts: Record<BusinessId, number>;
  places: Place[];
  clusters: VenueClusters;
  venueRanking: VenueRanking;
  quality: AreaQuality;
}

export interface AreaDataProviders {
  geocode: GeocodeProvider;
  places: PlacesProvider;
  features: AreaFeaturesProvider;
}

function overallMode(parts: readonly DataQuality[]): DataMode {
  if (parts.every((q) => q.mode === 'LIVE')) return 'LIVE';
  if (parts.every((q) => q.mode === 'NO_DATA')) return 'NO_DATA';
  return 'DEGRADED';
}

function isLocated(place: Place): place is Place & LocatedVenue {
  return place.lat !== undefined && place.lon !== undefined && Number.isFinite(place.lat) && Number.isFinite(place.lon);
}

export function toSnapshot(area: AreaData): AreaSnapshot {
  return {
    osmCounts: area.osmCounts,
    categoryCounts: area.categoryCounts,
    places: area.places,
    coordinates: { lat: area.location.lat, lon: area.location.lon, radius: area.radius },
  };
}

export class AreaDataService {
  constructor(
    private readonly providers: AreaDataProviders,
    private readonly categories: PlaceCategoryTable,
    private readonly logger: Logger = createLogger('area-data'),
  ) {}

  async resolveLocation(request: AreaRequest): Promise<{ location: GeoPoint; quality: DataQuality }> {
    if (request.lat !== undefined && request.lon !== undefined) {
      return {
        location: { lat: request.lat, lon: request.lon, displayName: request.address ?? `${request.lat},${request.lon}` },
        quality: { mode: 'LIVE', missing: [] },
      };
    }
    const address = request.address?.trim();
    if (!address) throw new ValidationError('Either an address or lat/lon is required');

    const result = await this.providers.geocode.geocode(address);
    if (result.data) return { location: result.data, quality: result.quality };
    if (result.quality.error) throw new UpstreamError(`Geocoding failed: ${result.quality.error}`);
    throw new NotFoundError(`Address not found: ${address}`);
  }

  async collect(request: AreaRequest): Promise<AreaData> {
    const radius = request.radius ?? DEFAULT_RADIUS_M;
    const { location, quality: geocode } = await this.resolveLocation(request);

    const [placesResult, featuresResult] = await Promise.all([
      this.providers.places.searchPlaces({
        lat: location.lat,
        lon: location.lon,
        radius,
        ...(request.priceRange ? { priceRange: request.priceRange } : {}),
      }),
      this.providers.features.getAreaFeatures(location.lat, location.lon, radius),
    ]);

    const places = (placesResult.data ?? []).map((p) => {
      const businessId = mapPlaceCategory(this.categories, p.category);
      return businessId ? { ...p, businessId } : p;
    });
    const osmCounts = featuresResult.data ?? emptyFeatureCounts();
    const missing = [...geocode.missing, ...placesResult.quality.missing, ...featuresResult.quality.missing];
    const mode = overallMode([geocode, placesResult.quality, featuresResult.quality]);

    if (mode !== 'LIVE') {
      this.logger.warn({ mode, missing, address: request.address }, '[AreaData] degraded area snapshot');
    }

    const located = places.filter(isLocated);
    const clusters = clusterVenues(located, request.clusterCount ?? DEFAULT_CLUSTER_COUNT);

    return {
      location,
      radius,
      osmCounts,
      categoryCounts: countCategories(places),
      places,
      clusters,
      venueRanking: scoreVenues(located, location, clusters, request.venueWeights),
      quality: { mode, geocode, places: placesResult.quality, features: featuresResult.quality, missing },
    };
  }
}
