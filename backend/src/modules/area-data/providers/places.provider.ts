/**
 * Places Provider
 * Source: Foursquare Places search (API key required)
 *
 * Without a key the provider reports NO_DATA and makes no request.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { env } from '../../../config/env.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { noData, type Place, type PlaceQuery, type PlacesProvider, type ProviderResult } from '../area-data.types.js';

const DEFAULT_LIMIT = 50;
const FIELDS = 'fsq_id,name,categories,geocodes,price,rating';

const FoursquareResponseSchema = z.object({
  results: z
    .array(
      z.object({
        fsq_id: z.string().optional(),
        name: z.string().default(''),
        categories: z.array(z.object({ id: z.union([z.string(), z.number()]).optional(), name: z.string().default('') })).default([]),
        geocodes: z
          .object({ main: z.object({ latitude: z.number(), longitude: z.number() }).optional() })
          .optional(),
        price: z.number().optional(),
        rating: z.number().min(0).max(10).optional(),
      }),
    )
    .default([]),
});

type FoursquarePlace = z.infer<typeof FoursquareResponseSchema>['results'][number];

export interface PlacesProviderOptions {
  http?: AxiosInstance;
  url?: string;
  apiKey?: string;
  logger?: Logger;
}

function toPlace(item: FoursquarePlace, index: number): Place {
  const main = item.geocodes?.main;
  return {
    id: item.fsq_id ?? `place_${index}`,
    name: item.name,
    category: item.categories[0]?.name ?? 'unknown',
    ...(main ? { lat: main.latitude, lon: main.longitude } : {}),
    ...(item.price !== undefined ? { price: item.price } : {}),
    ...(item.rating !== undefined ? { rating: item.rating } : {}),
  };
}

export class FoursquarePlacesProvider implements PlacesProvider {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(options: PlacesProviderOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: env.PROVIDER_TIMEOUT_MS });
    this.url = options.url ?? env.FOURSQUARE_URL;
    this.apiKey = options.apiKey ?? env.FOURSQUARE_API_KEY;
    this.logger = options.logger ?? createLogger('places-provider');
  }

  async searchPlaces(query: PlaceQuery): Promise<ProviderResult<Place[]>> {
    if (!this.apiKey) {
      return noData(['places'], 'FOURSQUARE_API_KEY is not configured');
    }

    const params: Record<string, string | number> = {
      ll: `${query.lat},${query.lon}`,
      radius: query.radius,
      limit: query.limit ?? DEFAULT_LIMIT,
      fields: FIELDS,
    };
    if (query.priceRange?.min) params.min_price = query.priceRange.min;
    if (query.priceRange?.max) params.max_price = query.priceRange.max;

    const startMs = Date.now();
    try {
      const response = await this.http.get<unknown>(this.url, {
        params,
        headers: { Accept: 'application/json', Authorization: this.apiKey },
      });
      const latencyMs = Date.now() - startMs;

      const parsed = FoursquareResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        this.logger.warn({ latencyMs }, '[Places] malformed response');
        return noData(['places'], 'malformed response', latencyMs);
      }

      const places = parsed.data.results.map(toPlace);
      const unlocated = places.filter((p) => p.lat === undefined).length;
      return {
        data: places,
        quality: {
          mode: unlocated > 0 ? 'DEGRADED' : 'LIVE',
          latencyMs,
          missing: unlocated > 0 ? ['place_coordinates'] : [],
        },
      };
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, '[Places] request failed');
      return noData(['places'], errorMessage(err), Date.now() - startMs);
    }
  }
}
