/**
 * Site catalog loader
 *
 * Reads the static tables under backend/data/site-decision once and freezes
 * them into a SiteCatalog that is passed to every engine component.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import { CatalogError, errorMessage } from '../../../common/errors.js';
import { env } from '../../../config/env.js';
import type { BusinessCategory, BusinessId } from '../contracts/site-decision.types.js';
import {
  AffinityFileSchema,
  BusinessesFileSchema,
  PlaceCategoriesFileSchema,
  ScenariosFileSchema,
  SeasonalFileSchema,
  WeightsFileSchema,
  type AffinityFile,
  type BusinessProfile,
  type PlaceCategoriesFile,
  type ScenarioDefinition,
  type SeasonalFile,
  type WeightsFile,
} from './catalog.schema.js';

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../../../data/site-decision/', import.meta.url));

export interface SiteCatalog {
  readonly weights: WeightsFile;
  readonly businesses: ReadonlyMap<BusinessId, BusinessProfile>;
  readonly affinity: AffinityFile;
  readonly seasonal: SeasonalFile;
  readonly scenarios: readonly ScenarioDefinition[];
  readonly placeCategories: PlaceCategoriesFile;
}

function readJson<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): z.output<S> {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new CatalogError(`Cannot read ${path}: ${errorMessage(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new CatalogError(`Invalid ${file}: ${first?.path.join('.')} ${first?.message}`);
  }
  return parsed.data;
}

export function loadSiteCatalog(dir: string = DEFAULT_DATA_DIR): SiteCatalog {
  const businesses = readJson(dir, 'businesses.json', BusinessesFileSchema);
  return Object.freeze({
    weights: readJson(dir, 'weights.json', WeightsFileSchema),
    businesses: new Map(businesses.map((b) => [b.id, b])),
    affinity: readJson(dir, 'customer-affinity.json', AffinityFileSchema),
    seasonal: readJson(dir, 'seasonal-calendar.json', SeasonalFileSchema),
    scenarios: readJson(dir, 'scenarios.json', ScenariosFileSchema),
    placeCategories: readJson(dir, 'place-categories.json', PlaceCategoriesFileSchema),
  });
}

let cached: SiteCatalog | null = null;

/**
 * Process-wide catalog, loaded on first use.
 */
export function getSiteCatalog(): SiteCatalog {
  if (!cached) {
    cached = loadSiteCatalog(env.SITE_DATA_DIR ?? DEFAULT_DATA_DIR);
  }
  return cached;
}

export function businessCategory(catalog: SiteCatalog, businessId: BusinessId): BusinessCategory {
  return catalog.businesses.get(businessId)?.category ?? 'general';
}
