/**
 * Site Decision Module
 *
 * createSiteDecisionService() wires the default catalog and live providers;
 * registerSiteDecisionModule() mounts the routes under /api/site-decision.
 */

import type { FastifyInstance } from 'fastify';
import {
  AreaDataService,
  FoursquarePlacesProvider,
  NominatimGeocodeProvider,
  OverpassAreaFeaturesProvider,
} from '../area-data/index.js';
import { getSiteCatalog, type SiteCatalog } from './catalog/catalog.loader.js';
import { registerSiteDecisionRoutes } from './api/site-decision.routes.js';
import { SiteDecisionService } from './site-decision.service.js';

export function createSiteDecisionService(catalog: SiteCatalog = getSiteCatalog()): SiteDecisionService {
  const areaData = new AreaDataService(
    {
      geocode: new NominatimGeocodeProvider(),
      places: new FoursquarePlacesProvider(),
      features: new OverpassAreaFeaturesProvider(),
    },
    catalog.placeCategories,
  );
  return new SiteDecisionService({ catalog, areaData });
}

export async function registerSiteDecisionModule(
  app: FastifyInstance,
  service: SiteDecisionService = createSiteDecisionService(),
): Promise<void> {
  await app.register(
    async (scope) => {
      await registerSiteDecisionRoutes(scope, service);
    },
    { prefix: '/api/site-decision' },
  );
  app.log.info('[SiteDecision] routes registered at /api/site-decision/*');
}

export { SiteDecisionService } from './site-decision.service.js';
export { SiteScoringEngine } from './engine/site-scoring.engine.js';
export { loadSiteCatalog, getSiteCatalog, type SiteCatalog } from './catalog/catalog.loader.js';
export * from './contracts/site-decision.types.js';
