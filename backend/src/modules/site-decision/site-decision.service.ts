/**
 * Site Decision Service
 *
 * Wires the engine components around one SiteCatalog and turns validated
 * request bodies into engine calls. Routes stay thin; everything here is
 * callable without HTTP.
 */

import { v4 as uuidv4 } from 'uuid';
import { AppError } from '../../common/errors.js';
import { createLogger, type Logger } from '../../common/logger.js';
import { randomSeed } from '../../common/random.js';
import { env } from '../../config/env.js';
import { AreaDataService, toSnapshot, type AreaData } from '../area-data/area-data.service.js';
import type { SiteCatalog } from './catalog/catalog.loader.js';
import type { ScenarioDefinition } from './catalog/catalog.schema.js';
import {
  FACTORS,
  FEATURE_TAGS,
  type BusinessId,
  type MarketContext,
  type ScoringResult,
  type WeightMap,
} from './contracts/site-decision.types.js';
import { screenCategories, type ScreenEntry } from './engine/basic.scorer.js';
import { buildMarketContext } from './engine/market-context.builder.js';
import { SeasonalCalendar, type DemandForecastPoint, type SeasonalOutlook } from './engine/seasonal.calendar.js';
import { SiteScoringEngine, type ScoreOptions } from './engine/site-scoring.engine.js';
import { classifyWeightImportance, normalizeWeights } from './engine/weight.resolver.js';
import { DataValidator, type DataQualityIssue, type DataQualityReport } from './insights/data.validator.js';
import { MarketAnalyzer, type MarketInsights } from './insights/market.analyzer.js';
import type { RulesEvaluation } from './rules/rule.types.js';
import { WorkerPoolExecutor } from './sim/montecarlo.pool.js';
import {
  inProcessExecutor,
  MonteCarloSimulator,
  type BatchExecutor,
  type MonteCarloSummary,
} from './sim/montecarlo.simulator.js';
import {
  ScenarioPlanner,
  type AdjustmentMode,
  type DecisionTree,
  type ScenarioRun,
  type WhatIfResult,
} from './sim/scenario.planner.js';
import type { SensitivityReport } from './sim/sensitivity.analyzer.js';
import type {
  AnalyzeRequest,
  AreaInput,
  InputsInput,
  InsightsRequest,
  MonteCarloRequest,
  RulesRequest,
  ScenariosRequest,
  ScoreRequest,
  ScreenRequest,
  SeasonalRequest,
  SensitivityRequest,
  WhatIfRequest,
} from './api/site-decision.schemas.js';

export interface SiteDecisionServiceDeps {
  catalog: SiteCatalog;
  areaData?: AreaDataService;
  logger?: Logger;
  /** Month used when a request does not name one. Defaults to the current month. */
  clock?: () => Date;
  /** Monte Carlo batch executor. Defaults to a worker pool when MC_WORKERS > 0. */
  executor?: BatchExecutor;
}

export interface CatalogSummary {
  businesses: Array<{ id: BusinessId; name: string; category: string }>;
  factors: readonly string[];
  featureTags: readonly string[];
  customerSegments: string[];
  scenarios: Array<{ id: string; name: string; description: string }>;
}

export interface ScoreResponse {
  result: ScoringResult;
  importance: ReturnType<typeof classifyWeightImportance>;
  seasonal: SeasonalOutlook;
}

export interface SeasonalResponse extends SeasonalOutlook {
  forecast: DemandForecastPoint[];
}

export interface InsightsResponse {
  insights: MarketInsights;
  dataQuality: DataQualityReport;
}

export interface AnalyzeResponse {
  analysisId: string;
  createdAt: string;
  location: AreaData['location'];
  radius: number;
  areaQuality: AreaData['quality'];
  inputIssues: DataQualityIssue[];
  context: MarketContext;
  ranking: ScreenEntry[];
  insights: MarketInsights;
  dataQuality: DataQualityReport;
  clusters: AreaData['clusters'];
  venueRanking: AreaData['venueRanking'];
}

export class SiteDecisionService {
  readonly catalog: SiteCatalog;
  readonly engine: SiteScoringEngine;
  readonly calendar: SeasonalCalendar;
  readonly planner: ScenarioPlanner;
  readonly simulator: MonteCarloSimulator;
  readonly analyzer: MarketAnalyzer;
  readonly validator: DataValidator;
  private readonly areaData: AreaDataService | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: SiteDecisionServiceDeps) {
    this.catalog = deps.catalog;
    this.logger = deps.logger ?? createLogger('site-decision');
    this.clock = deps.clock ?? (() => new Date());
    this.engine = new SiteScoringEngine({ catalog: deps.catalog, logger: this.logger });
    this.calendar = new SeasonalCalendar(deps.catalog);
    this.planner = new ScenarioPlanner(this.engine, { logger: this.logger });
    this.simulator = new MonteCarloSimulator(
      this.engine,
      deps.executor ?? (env.MC_WORKERS > 0 ? new WorkerPoolExecutor({ size: env.MC_WORKERS }) : inProcessExecutor),
      this.logger,
    );
    this.analyzer = new MarketAnalyzer(this.logger);
    this.validator = new DataValidator(this.logger);
    this.areaData = deps.areaData ?? null;
  }

  // ═══════════════════════════════════════════════════════════════
  // CONTEXT
  // ═══════════════════════════════════════════════════════════════

  currentMonth(): number {
    return this.clock().getMonth() + 1;
  }

  /**
   * Build the market context for a request; explicit overrides win over the
   * derived estimates.
   */
  context(area: AreaInput, inputs: InputsInput = {}): MarketContext {
    const derived = buildMarketContext(area, this.calendar, {
      month: area.month ?? this.currentMonth(),
      ...(inputs.customerTarget ? { customerTarget: inputs.customerTarget } : {}),
      ...(area.rentLevel !== undefined ? { rentLevel: area.rentLevel } : {}),
    });
    return {
      ...derived,
      ...(area.populationDensity !== undefined ? { populationDensity: area.populationDensity } : {}),
      ...(area.incomeLevel ? { incomeLevel: area.incomeLevel } : {}),
      ...(area.footTrafficScore !== undefined ? { footTrafficScore: area.footTrafficScore } : {}),
      ...(area.seasonalFactor !== undefined ? { seasonalFactor: area.seasonalFactor } : {}),
    };
  }

  catalogSummary(): CatalogSummary {
    return {
      businesses: [...this.catalog.businesses.values()].map((b) => ({ id: b.id, name: b.name, category: b.category })),
      factors: FACTORS,
      featureTags: FEATURE_TAGS,
      customerSegments: Object.keys(this.catalog.seasonal.segments),
      scenarios: this.planner.listScenarios().map((s) => ({ id: s.id, name: s.name, description: s.description })),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // SCORING
  // ═══════════════════════════════════════════════════════════════

  /**
   * Precedence: explicit weights, scheme, trend signals, then
   * market condition / location type.
   */
  scoreOptions(req: Pick<ScoreRequest, 'businessId' | 'weights' | 'scheme' | 'signals' | 'marketCondition' | 'locationType'>): ScoreOptions {
    let weights: WeightMap | undefined;
    if (req.weights) weights = normalizeWeights(req.weights) ?? this.engine.weights.defaultWeights();
    else if (req.scheme) weights = this.engine.weights.resolveWithScheme(req.businessId, req.scheme);
    else if (req.signals) weights = this.engine.weights.resolveDynamic(req.businessId, req.signals);

    return {
      ...(weights ? { weights } : {}),
      ...(req.marketCondition ? { marketCondition: req.marketCondition } : {}),
      ...(req.locationType ? { locationType: req.locationType } : {}),
    };
  }

  score(req: ScoreRequest): ScoreResponse {
    const context = this.context(req.area, req.inputs);
    const options = { ...this.scoreOptions(req), includeSensitivity: req.includeSensitivity };
    const result = this.engine.scoreBusiness(req.businessId, req.inputs, context, options);
    return {
      result,
      importance: classifyWeightImportance(result.weights),
      seasonal: this.calendar.outlook(
        req.businessId,
        req.inputs.customerTarget ?? 'general',
        req.area.month ?? this.currentMonth(),
      ),
    };
  }

  rules(req: RulesRequest): RulesEvaluation {
    return this.engine.evaluateRules(req.businessId, this.context(req.area, req.inputs), undefined, req.inputs);
  }

  sensitivity(req: SensitivityRequest): SensitivityReport {
    const weights = req.weights ? normalizeWeights(req.weights) ?? undefined : undefined;
    return this.engine.analyzeSensitivity(
      req.businessId,
      this.context(req.area, req.inputs),
      weights,
      req.adjustmentPct,
      req.inputs,
    );
  }

  screen(req: ScreenRequest): ScreenEntry[] {
    return screenCategories(this.engine, req.inputs, this.context(req.area, req.inputs), req.businessIds);
  }

  /**
   * Outlook for the given (or current) month plus a demand forecast starting there.
   */
  seasonal(businessId: BusinessId, query: SeasonalRequest): SeasonalResponse {
    const month = query.month ?? this.currentMonth();
    return {
      ...this.calendar.outlook(businessId, query.segment, month),
      forecast: this.calendar.forecastDemand(businessId, query.segment, month, query.baseDemand, query.monthsAhead),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // WHAT-IF
  // ═══════════════════════════════════════════════════════════════

  private plannerFor(mode: AdjustmentMode | undefined): ScenarioPlanner {
    if (!mode || mode === this.planner.adjustmentMode) return this.planner;
    return new ScenarioPlanner(this.engine, { adjustmentMode: mode, logger: this.logger });
  }

  /**
   * Planner for the request's mode and scenario subset, plus its custom scenarios.
   */
  private scenarioSetup(req: ScenariosRequest): { planner: ScenarioPlanner; custom: ScenarioDefinition[] } {
    const planner = this.plannerFor(req.adjustmentMode);
    const custom = req.custom.map((c) =>
      planner.createCustomScenario(c.name, c.description, c.changes, c.businessSpecificOverrides),
    );
    const selected = req.scenarioIds?.map((id) => planner.getScenario(id));
    if (!selected) return { planner, custom };
    return {
      planner: new ScenarioPlanner(this.engine, {
        scenarios: selected,
        adjustmentMode: planner.adjustmentMode,
        logger: this.logger,
      }),
      custom,
    };
  }

  scenarios(req: ScenariosRequest): ScenarioRun {
    const { planner, custom } = this.scenarioSetup(req);
    return planner.runScenarios(req.businessId, this.context(req.area, req.inputs), { custom, inputs: req.inputs });
  }

  decisionTree(req: ScenariosRequest): DecisionTree {
    const { planner, custom } = this.scenarioSetup(req);
    return planner.decisionTree(req.businessId, this.context(req.area, req.inputs), { custom, inputs: req.inputs });
  }

  whatIf(req: WhatIfRequest): WhatIfResult[] {
    return this.plannerFor(req.adjustmentMode).whatIf(
      req.businessId,
      this.context(req.area, req.inputs),
      req.conditions,
      req.inputs,
    );
  }

  monteCarlo(req: MonteCarloRequest): Promise<MonteCarloSummary> {
    return this.simulator.simulate({
      businessId: req.businessId,
      context: this.context(req.area, req.inputs),
      numSimulations: req.numSimulations,
      seed: req.seed ?? randomSeed(),
      inputs: req.inputs,
      score: this.scoreOptions(req),
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // AREA
  // ═══════════════════════════════════════════════════════════════

  insights(req: InsightsRequest): InsightsResponse {
    const context = this.context(req.area);
    return {
      insights: this.analyzer.analyze(context),
      dataQuality: this.validator.validate({
        osmCounts: context.osmCounts,
        categoryCounts: context.categoryCounts,
        ...(req.places ? { places: req.places } : {}),
        ...(req.coordinates ? { coordinates: req.coordinates } : {}),
      }),
    };
  }

  /**
   * Address (or coordinates) → providers → context → ranking.
   */
  async analyze(req: AnalyzeRequest): Promise<AnalyzeResponse> {
    if (!this.areaData) throw new AppError(503, 'AREA_DATA_UNAVAILABLE', 'Area data service is not configured');

    const inputIssues = this.validator.validateInputs({
      ...(req.address !== undefined ? { address: req.address } : {}),
      radius: req.radius,
      ...(req.priceMin !== undefined ? { priceMin: req.priceMin } : {}),
      ...(req.priceMax !== undefined ? { priceMax: req.priceMax } : {}),
    });

    const area = await this.areaData.collect({
      ...(req.address !== undefined ? { address: req.address } : {}),
      ...(req.lat !== undefined ? { lat: req.lat } : {}),
      ...(req.lon !== undefined ? { lon: req.lon } : {}),
      radius: req.radius,
      priceRange: { ...(req.priceMin ? { min: req.priceMin } : {}), ...(req.priceMax ? { max: req.priceMax } : {}) },
      clusterCount: req.clusterCount,
      ...(req.venueWeights ? { venueWeights: req.venueWeights } : {}),
    });

    const context = this.context(
      { osmCounts: area.osmCounts, categoryCounts: area.categoryCounts, ...(req.month ? { month: req.month } : {}) },
      req.inputs,
    );
    const analysisId = uuidv4();
    this.logger.info(
      { analysisId, mode: area.quality.mode, places: area.places.length },
      '[SiteDecision] area analysis complete',
    );

    return {
      analysisId,
      createdAt: this.clock().toISOString(),
      location: area.location,
      radius: area.radius,
      areaQuality: area.quality,
      inputIssues,
      context,
      ranking: screenCategories(this.engine, req.inputs, context, req.businessIds),
      insights: this.analyzer.analyze(context),
      dataQuality: this.validator.validate(toSnapshot(area)),
      clusters: area.clusters,
      venueRanking: area.venueRanking,
    };
  }
}
