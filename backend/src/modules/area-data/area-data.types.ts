/**
 * Area Data Types
 *
 * Every collaborator call returns a ProviderResult so the caller can see how
 * the data degraded instead of getting an exception.
 */

import type { BusinessId, FeatureTag } from '../site-decision/contracts/site-decision.types.js';

export type DataMode = 'LIVE' | 'DEGRADED' | 'NO_DATA';

export interface DataQuality {
  mode: DataMode;
  latencyMs?: number;
  missing: string[];
  error?: string;
}

export interface ProviderResult<T> {
  data: T | null;
  quality: DataQuality;
}

export interface GeoPoint {
  lat: number;
  lon: number;
  displayName: string;
}

export interface Place {
  id: string;
  name: string;
  /** Provider category label, e.g. "Coffee Shop". */
  category: string;
  /** Mapped business id, when the label matches one. */
  businessId?: BusinessId;
  lat?: number;
  lon?: number;
  price?: number;
  /** Provider rating, 0-10. */
  rating?: number;
}

export interface PriceRange {
  min?: number;
  max?: number;
}

export interface PlaceQuery {
  lat: number;
  lon: number;
  /** meters */
  radius: number;
  priceRange?: PriceRange;
  limit?: number;
}

export type FeatureCounts = Record<FeatureTag, number>;

export interface GeocodeProvider {
  geocode(address: string): Promise<ProviderResult<GeoPoint>>;
}

export interface PlacesProvider {
  searchPlaces(query: PlaceQuery): Promise<ProviderResult<Place[]>>;
}

export interface AreaFeaturesProvider {
  getAreaFeatures(lat: number, lon: number, radius: number): Promise<ProviderResult<FeatureCounts>>;
}

export function noData<T>(missing: string[], error?: string, latencyMs?: number): ProviderResult<T> {
  return { data: null, quality: { mode: 'NO_DATA', missing, ...(error ? { error } : {}), ...(latencyMs !== undefined ? { latencyMs } : {}) } };
}
