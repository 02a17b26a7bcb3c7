/**
 * Site Decision Routes
 * ====================
 *
 * ENDPOINTS (prefix /api/site-decision):
 *   GET  /catalog                  - Businesses, factors, segments, scenarios
 *   GET  /seasonal/:businessId     - Seasonal outlook + demand forecast
 *   POST /score                    - Full scoring result
 *   POST /rules                    - Rule evaluation
 *   POST /sensitivity              - Weight sensitivity
 *   POST /scenarios                - Catalog + custom scenarios
 *   POST /decision-tree            - Yes/no tree from a scenario run
 *   POST /what-if                  - Ad hoc factor changes
 *   POST /monte-carlo              - Score distribution under noise
 *   POST /screen                   - Quick screen of all categories
 *   POST /insights                 - Market analysis + data quality
 *   POST /analyze                  - Address → providers → ranking
 *
 * Bodies are validated with zod; a ValidationError becomes a 400 in the
 * global error handler.
 */

import type { FastifyInstance } from 'fastify';
import type { SiteDecisionService } from '../site-decision.service.js';
import {
  AnalyzeBody,
  InsightsBody,
  MonteCarloBody,
  parseBody,
  RulesBody,
  ScenariosBody,
  ScoreBody,
  ScreenBody,
  SeasonalQuery,
  SensitivityBody,
  WhatIfBody,
} from './site-decision.schemas.js';

export async function registerSiteDecisionRoutes(app: FastifyInstance, service: SiteDecisionService): Promise<void> {

  // ═══════════════════════════════════════════════════════════════
  // CATALOG
  // ═══════════════════════════════════════════════════════════════

  app.get('/catalog', async () => ({ ok: true, data: service.catalogSummary() }));

  app.get<{ Params: { businessId: string } }>('/seasonal/:businessId', async (request) => {
    const query = parseBody(SeasonalQuery, request.query);
    return { ok: true, data: service.seasonal(request.params.businessId, query) };
  });

  // ═══════════════════════════════════════════════════════════════
  // SCORING
  // ═══════════════════════════════════════════════════════════════

  app.post('/score', async (request) => {
    const body = parseBody(ScoreBody, request.body);
    return { ok: true, data: service.score(body) };
  });

  app.post('/rules', async (request) => {
    const body = parseBody(RulesBody, request.body);
    return { ok: true, data: service.rules(body) };
  });

  app.post('/sensitivity', async (request) => {
    const body = parseBody(SensitivityBody, request.body);
    return { ok: true, data: service.sensitivity(body) };
  });

  app.post('/screen', async (request) => {
    const body = parseBody(ScreenBody, request.body);
    return { ok: true, data: service.screen(body) };
  });

  // ═══════════════════════════════════════════════════════════════
  // WHAT-IF
  // ═══════════════════════════════════════════════════════════════

  app.post('/scenarios', async (request) => {
    const body = parseBody(ScenariosBody, request.body);
    return { ok: true, data: service.scenarios(body) };
  });

  app.post('/decision-tree', async (request) => {
    const body = parseBody(ScenariosBody, request.body);
    return { ok: true, data: service.decisionTree(body) };
  });

  app.post('/what-if', async (request) => {
    const body = parseBody(WhatIfBody, request.body);
    return { ok: true, data: service.whatIf(body) };
  });

  app.post('/monte-carlo', async (request) => {
    const body = parseBody(MonteCarloBody, request.body);
    return { ok: true, data: await service.monteCarlo(body) };
  });

  // ═══════════════════════════════════════════════════════════════
  // AREA
  // ═══════════════════════════════════════════════════════════════

  app.post('/insights', async (request) => {
    const body = parseBody(InsightsBody, request.body);
    return { ok: true, data: service.insights(body) };
  });

  app.post('/analyze', async (request) => {
    const body = parseBody(AnalyzeBody, request.body);
    return { ok: true, data: await service.analyze(body) };
  });
}
