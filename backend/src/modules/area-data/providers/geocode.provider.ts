/**
 * Geocode Provider
 * Source: Nominatim search (OpenStreetMap, public, 1 req/s)
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { env } from '../../../config/env.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { noData, type GeoPoint, type GeocodeProvider, type ProviderResult } from '../area-data.types.js';

const NominatimResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().default(''),
  }),
);

export interface GeocodeProviderOptions {
  http?: AxiosInstance;
  url?: string;
  logger?: Logger;
}

export class NominatimGeocodeProvider implements GeocodeProvider {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly logger: Logger;

  constructor(options: GeocodeProviderOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: env.PROVIDER_TIMEOUT_MS });
    this.url = options.url ?? env.NOMINATIM_URL;
    this.logger = options.logger ?? createLogger('geocode-provider');
  }

  async geocode(address: string): Promise<ProviderResult<GeoPoint>> {
    const startMs = Date.now();
    try {
      const response = await this.http.get<unknown>(this.url, {
        params: { q: address, format: 'json', limit: 1 },
        headers: { Accept: 'application/json', 'User-Agent': 'site-decision-engine' },
      });
      const latencyMs = Date.now() - startMs;

      const parsed = NominatimResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        this.logger.warn({ address }, '[Geocode] malformed response');
        return noData(['coordinates'], 'malformed response', latencyMs);
      }
      const first = parsed.data[0];
      if (!first) return noData(['coordinates'], undefined, latencyMs);

      return {
        data: { lat: first.lat, lon: first.lon, displayName: first.display_name },
        quality: { mode: 'LIVE', latencyMs, missing: [] },
      };
    } catch (err) {
      this.logger.warn({ address, err: errorMessage(err) }, '[Geocode] request failed');
      return noData(['coordinates'], errorMessage(err), Date.now() - startMs);
    }
  }
}
