/**
 * Area Features Provider
 * Source: Overpass API (OpenStreetMap)
 *
 * Counts the nine feature tags within a radius. Elements that match no tag
 * are ignored; an element counts toward at most one tag.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { env } from '../../../config/env.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { FEATURE_TAGS, type FeatureTag } from '../../site-decision/contracts/site-decision.types.js';
import { noData, type AreaFeaturesProvider, type FeatureCounts, type ProviderResult } from '../area-data.types.js';

const OverpassResponseSchema = z.object({
  elements: z.array(z.object({ tags: z.record(z.string()).default({}) })).default([]),
});

const AMENITY_TAGS: ReadonlySet<string> = new Set(['school', 'hospital', 'pharmacy', 'police']);

export function buildOverpassQuery(lat: number, lon: number, radius: number): string {
  const around = `(around:${Math.round(radius)},${lat},${lon})`;
  return [
    '[out:json][timeout:25];',
    '(',
    `  nwr["amenity"~"^(school|hospital|pharmacy|police)$"]${around};`,
    `  node["highway"="bus_stop"]${around};`,
    `  node["station"="subway"]${around};`,
    `  node["railway"="subway_entrance"]${around};`,
    `  nwr["leisure"="park"]${around};`,
    `  nwr["office"]${around};`,
    `  way["building"~"^(residential|apartments)$"]${around};`,
    ');',
    'out tags center;',
  ].join('\n');
}

export function classifyElement(tags: Readonly<Record<string, string>>): FeatureTag | null {
  const amenity = tags.amenity;
  if (amenity !== undefined && AMENITY_TAGS.has(amenity)) {
    return FEATURE_TAGS.find((t) => t === amenity) ?? null;
  }
  if (tags.highway === 'bus_stop') return 'bus_stop';
  if (tags.station === 'subway' || tags.railway === 'subway_entrance') return 'subway';
  if (tags.leisure === 'park') return 'park';
  if (tags.office !== undefined) return 'office';
  if (tags.building === 'residential' || tags.building === 'apartments') return 'residential';
  return null;
}

export function emptyFeatureCounts(): FeatureCounts {
  return {
    school: 0,
    hospital: 0,
    pharmacy: 0,
    police: 0,
    bus_stop: 0,
    subway: 0,
    park: 0,
    office: 0,
    residential: 0,
  };
}

export interface AreaFeaturesProviderOptions {
  http?: AxiosInstance;
  url?: string;
  logger?: Logger;
}

export class OverpassAreaFeaturesProvider implements AreaFeaturesProvider {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly logger: Logger;

  constructor(options: AreaFeaturesProviderOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: env.PROVIDER_TIMEOUT_MS });
    this.url = options.url ?? env.OVERPASS_URL;
    this.logger = options.logger ?? createLogger('area-features-provider');
  }

  async getAreaFeatures(lat: number, lon: number, radius: number): Promise<ProviderResult<FeatureCounts>> {
    const body = new URLSearchParams({ data: buildOverpassQuery(lat, lon, radius) }).toString();
    const startMs = Date.now();
    try {
      const response = await this.http.post<unknown>(this.url, body, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
      });
      const latencyMs = Date.now() - startMs;

      const parsed = OverpassResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        this.logger.warn({ latencyMs }, '[AreaFeatures] malformed response');
        return noData([...FEATURE_TAGS], 'malformed response', latencyMs);
      }

      const counts = emptyFeatureCounts();
      for (const el of parsed.data.elements) {
        const tag = classifyElement(el.tags);
        if (tag) counts[tag] += 1;
      }
      return { data: counts, quality: { mode: 'LIVE', latencyMs, missing: [] } };
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, '[AreaFeatures] request failed');
      return noData([...FEATURE_TAGS], errorMessage(err), Date.now() - startMs);
    }
  }
}
