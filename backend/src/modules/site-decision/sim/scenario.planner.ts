/**
 * Scenario Planner
 *
 * Applies named what-if deltas to a deep copy of the context and re-scores.
 *
 * DELTA APPLICATION:
 *   competition → every category count × (1 + d), truncated, floor 0
 *   transport   → bus_stop and subway × (1 + d), truncated, floor 0
 *   all deltas  → recorded on the copy as scenarioAdjustments
 *
 * In `wired` mode the component scorer applies the recorded deltas of the
 * non-count factors; in `counts_only` mode they are recorded but not observed.
 *
 * The decision tree is a fixed two-level yes/no tree whose answers come from
 * one scenario run: does the baseline clear the viability line, and does any
 * scenario move the score across it.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { NotFoundError, errorMessage } from '../../../common/errors.js';
import type { ScenarioDefinition } from '../catalog/catalog.schema.js';
import {
  BASELINE_INPUTS,
  FACTORS,
  cloneContext,
  ownValue,
  round,
  type BusinessId,
  type FactorDeltas,
  type FactorName,
  type MarketContext,
  type UserInputs,
} from '../contracts/site-decision.types.js';
import type { ScoreOptions, SiteScoringEngine } from '../engine/site-scoring.engine.js';

export type AdjustmentMode = 'wired' | 'counts_only';

export type RiskLevelChange =
  | 'reduced_significantly'
  | 'reduced_slightly'
  | 'unchanged'
  | 'increased_slightly'
  | 'increased_significantly';

export type WhatIfImpact =
  | 'large_positive'
  | 'moderate_positive'
  | 'negligible'
  | 'moderate_negative'
  | 'large_negative';

export interface ScenarioResult {
  scenarioId: string;
  scenarioName: string;
  description: string;
  baselineScore: number;
  scenarioScore: number;
  scoreChange: number;
  scoreChangePercent: number;
  riskLevelChange: RiskLevelChange;
  keyImpacts: string[];
  recommendations: string[];
  appliedModifications: FactorDeltas;
}

export interface ScenarioRun {
  businessId: BusinessId;
  baselineScore: number;
  results: ScenarioResult[];
  failedScenarios: string[];
}

export interface WhatIfResult {
  condition: string;
  originalScore: number;
  newScore: number;
  scoreChange: number;
  changePercent: number;
  impact: WhatIfImpact;
}

export interface ScenarioPlannerOptions {
  scenarios?: readonly ScenarioDefinition[];
  adjustmentMode?: AdjustmentMode;
  logger?: Logger;
}

export interface ScenarioRunOptions {
  custom?: readonly ScenarioDefinition[];
  inputs?: Partial<UserInputs>;
  score?: ScoreOptions;
}

export interface DecisionLeaf {
  recommendation: string;
  scenarios: string[];
  actions: string[];
}

export interface DecisionQuestion {
  question: string;
  answer: 'yes' | 'no';
  yes: DecisionNode;
  no: DecisionNode;
}

export type DecisionNode = DecisionQuestion | DecisionLeaf;

export interface DecisionTree {
  businessId: BusinessId;
  baselineScore: number;
  viabilityThreshold: number;
  root: DecisionQuestion;
  /** The leaf the answers lead to. */
  outcome: DecisionLeaf;
  failedScenarios: string[];
}

const MAX_KEY_IMPACTS = 3;
const MAX_RECOMMENDATIONS = 5;
export const VIABILITY_THRESHOLD = 60;

export const FACTOR_LABELS: Record<FactorName, string> = {
  customer: 'customer fit',
  competition: 'competitive position',
  market_potential: 'market potential',
  financial_viability: 'profitability',
  safety: 'safety',
  transport: 'transport access',
  landmark: 'nearby landmarks',
  operational_feasibility: 'operational feasibility',
};

// ═══════════════════════════════════════════════════════════════
// PURE HELPERS
// ═══════════════════════════════════════════════════════════════

function scaleCount(count: number, delta: number): number {
  return Math.max(0, Math.trunc(count * (1 + delta)));
}

export function mergeModifications(scenario: ScenarioDefinition, businessId: BusinessId): FactorDeltas {
  return { ...scenario.modifications, ...(ownValue(scenario.businessSpecificOverrides, businessId) ?? {}) };
}

export function applyModifications(context: MarketContext, modifications: FactorDeltas): MarketContext {
  const copy = cloneContext(context);
  copy.scenarioAdjustments = { ...copy.scenarioAdjustments, ...modifications };

  const competition = modifications.competition;
  if (competition !== undefined) {
    for (const id of Object.keys(copy.categoryCounts)) {
      copy.categoryCounts[id] = scaleCount(copy.categoryCounts[id] ?? 0, competition);
    }
  }

  const transport = modifications.transport;
  if (transport !== undefined) {
    const { bus_stop: busStop, subway } = copy.osmCounts;
    if (busStop !== undefined) copy.osmCounts.bus_stop = scaleCount(busStop, transport);
    if (subway !== undefined) copy.osmCounts.subway = scaleCount(subway, transport);
  }

  return copy;
}

export function riskLevelChange(scoreChangePercent: number): RiskLevelChange {
  if (scoreChangePercent > 20) return 'reduced_significantly';
  if (scoreChangePercent > 10) return 'reduced_slightly';
  if (scoreChangePercent > -10) return 'unchanged';
  if (scoreChangePercent > -20) return 'increased_slightly';
  return 'increased_significantly';
}

export function whatIfImpact(scoreChange: number): WhatIfImpact {
  if (scoreChange > 15) return 'large_positive';
  if (scoreChange > 5) return 'moderate_positive';
  if (scoreChange > -5) return 'negligible';
  if (scoreChange > -15) return 'moderate_negative';
  return 'large_negative';
}

export function keyImpacts(modifications: FactorDeltas): string[] {
  const entries: Array<{ factor: FactorName; delta: number }> = [];
  for (const factor of FACTORS) {
    const delta = modifications[factor];
    if (delta !== undefined && delta !== 0) entries.push({ factor, delta });
  }
  entries.sort((a, b) => Math.abs(b.delta) - Math.abs(a.delta));

  return entries.slice(0, MAX_KEY_IMPACTS).map(({ factor, delta }) => {
    const label = FACTOR_LABELS[factor];
    if (delta > 0.2) return `Significantly improves ${label}`;
    if (delta > 0) return `Slightly improves ${label}`;
    if (delta < -0.2) return `Sharply reduces ${label}`;
    return `Slightly reduces ${label}`;
  });
}

export function scenarioRecommendations(
  scenario: ScenarioDefinition,
  scoreChange: number,
  modifications: FactorDeltas,
): string[] {
  const out: string[] = [];
  if (scoreChange > 10) {
    out.push(`"${scenario.name}" has a positive effect: prepare to take advantage of it`);
  } else if (scoreChange < -10) {
    out.push(`"${scenario.name}" is high risk: prepare a contingency plan`);
  }
  if ((modifications.competition ?? 0) > 0.3) out.push('Prepare a differentiation strategy for a tougher market');
  if ((modifications.market_potential ?? 0) < -0.3) out.push('Diversify products or services to spread risk');
  if ((modifications.financial_viability ?? 0) < -0.3) out.push('Optimize costs and keep a financial reserve');
  if ((modifications.transport ?? 0) > 0.3) out.push('Use the better transport links to widen the catchment');
  out.push(...(scenario.advice ?? []));
  return out.slice(0, MAX_RECOMMENDATIONS);
}

function decisionLeaf(recommendation: string, results: readonly ScenarioResult[]): DecisionLeaf {
  return {
    recommendation,
    scenarios: results.map((r) => r.scenarioId),
    actions: [...new Set(results.flatMap((r) => r.recommendations))].slice(0, MAX_RECOMMENDATIONS),
  };
}

function answer(condition: boolean): 'yes' | 'no' {
  return condition ? 'yes' : 'no';
}

export function reachedLeaf(node: DecisionNode): DecisionLeaf {
  return 'question' in node ? reachedLeaf(node.answer === 'yes' ? node.yes : node.no) : node;
}

export function buildDecisionTree(run: ScenarioRun, threshold = VIABILITY_THRESHOLD): DecisionTree {
  const below = run.results.filter((r) => r.scenarioScore < threshold);
  const above = run.results.filter((r) => r.scenarioScore >= threshold);

  const root: DecisionQuestion = {
    question: `Does the baseline score reach ${threshold}?`,
    answer: answer(run.baselineScore >= threshold),
    yes: {
      question: `Does any scenario drop the score below ${threshold}?`,
      answer: answer(below.length > 0),
      yes: decisionLeaf('Viable but exposed: prepare contingency plans for these scenarios', below),
      no: decisionLeaf('Viable under every scenario: proceed with planning', []),
    },
    no: {
      question: `Does any scenario lift the score to ${threshold}?`,
      answer: answer(above.length > 0),
      yes: decisionLeaf('Viable only if conditions improve: watch these scenarios before committing', above),
      no: decisionLeaf('Not viable under any scenario: consider another business or site', []),
    },
  };

  return {
    businessId: run.businessId,
    baselineScore: run.baselineScore,
    viabilityThreshold: threshold,
    root,
    outcome: reachedLeaf(root),
    failedScenarios: run.failedScenarios,
  };
}

// ═══════════════════════════════════════════════════════════════
// PLANNER
// ═══════════════════════════════════════════════════════════════

export class ScenarioPlanner {
  private readonly scenarios: readonly ScenarioDefinition[];
  readonly adjustmentMode: AdjustmentMode;
  private readonly logger: Logger;

  constructor(
    private readonly engine: SiteScoringEngine,
    options: ScenarioPlannerOptions = {},
  ) {
    this.scenarios = options.scenarios ?? engine.catalog.scenarios;
    this.adjustmentMode = options.adjustmentMode ?? 'wired';
    this.logger = options.logger ?? createLogger('scenario-planner');
  }

  listScenarios(): readonly ScenarioDefinition[] {
    return this.scenarios;
  }

  getScenario(id: string): ScenarioDefinition {
    const scenario = this.scenarios.find((s) => s.id === id);
    if (!scenario) throw new NotFoundError(`Unknown scenario: ${id}`);
    return scenario;
  }

  createCustomScenario(
    name: string,
    description: string,
    changes: FactorDeltas,
    businessSpecificOverrides: Record<BusinessId, FactorDeltas> = {},
  ): ScenarioDefinition {
    return {
      id: `custom_${name.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_|_$/g, '')}`,
      name,
      description,
      modifications: { ...changes },
      businessSpecificOverrides: { ...businessSpecificOverrides },
    };
  }

  /**
   * Context copy with the deltas applied according to the adjustment mode.
   */
  applyScenario(context: MarketContext, modifications: FactorDeltas): MarketContext {
    const copy = applyModifications(context, modifications);
    if (this.adjustmentMode === 'counts_only') {
      return { ...copy, scenarioAdjustments: context.scenarioAdjustments };
    }
    return copy;
  }

  /**
   * Deltas that were applied but cannot be observed in the score.
   */
  unobservedFactors(modifications: FactorDeltas): FactorName[] {
    if (this.adjustmentMode === 'wired') return [];
    return FACTORS.filter(
      (f) => f !== 'competition' && f !== 'transport' && (modifications[f] ?? 0) !== 0,
    );
  }

  runScenario(
    scenario: ScenarioDefinition,
    businessId: BusinessId,
    context: MarketContext,
    baselineScore: number,
    inputs: Partial<UserInputs> = BASELINE_INPUTS,
    scoreOptions: ScoreOptions = {},
  ): ScenarioResult {
    const modifications = mergeModifications(scenario, businessId);
    const modified = this.applyScenario(context, modifications);
    const scenarioScore = this.engine.scoreValue(businessId, inputs, modified, scoreOptions);
    const scoreChange = scenarioScore - baselineScore;
    const scoreChangePercent = baselineScore > 0 ? (scoreChange / baselineScore) * 100 : 0;

    return {
      scenarioId: scenario.id,
      scenarioName: scenario.name,
      description: scenario.description,
      baselineScore: round(baselineScore, 2),
      scenarioScore: round(scenarioScore, 2),
      scoreChange: round(scoreChange, 2),
      scoreChangePercent: round(scoreChangePercent, 2),
      riskLevelChange: riskLevelChange(scoreChangePercent),
      keyImpacts: keyImpacts(modifications),
      recommendations: scenarioRecommendations(scenario, scoreChange, modifications),
      appliedModifications: modifications,
    };
  }

  /**
   * Whole catalog plus custom scenarios, sorted by |scoreChange| descending.
   */
  runScenarios(businessId: BusinessId, context: MarketContext, options: ScenarioRunOptions = {}): ScenarioRun {
    const inputs = options.inputs ?? BASELINE_INPUTS;
    const baselineScore = this.engine.scoreValue(businessId, inputs, context, options.score);
    const results: ScenarioResult[] = [];
    const failedScenarios: string[] = [];

    for (const scenario of [...this.scenarios, ...(options.custom ?? [])]) {
      try {
        results.push(this.runScenario(scenario, businessId, context, baselineScore, inputs, options.score));
      } catch (err) {
        this.logger.warn({ businessId, scenarioId: scenario.id, err: errorMessage(err) }, 'scenario failed');
        failedScenarios.push(scenario.id);
      }
    }

    results.sort((a, b) => Math.abs(b.scoreChange) - Math.abs(a.scoreChange));
    return { businessId, baselineScore: round(baselineScore, 2), results, failedScenarios };
  }

  decisionTree(businessId: BusinessId, context: MarketContext, options: ScenarioRunOptions = {}): DecisionTree {
    return buildDecisionTree(this.runScenarios(businessId, context, options));
  }

  whatIf(
    businessId: BusinessId,
    context: MarketContext,
    conditions: Readonly<Record<string, FactorDeltas>>,
    inputs: Partial<UserInputs> = BASELINE_INPUTS,
  ): WhatIfResult[] {
    const originalScore = this.engine.scoreValue(businessId, inputs, context);
    return Object.entries(conditions).map(([condition, changes]) => {
      const newScore = this.engine.scoreValue(businessId, inputs, this.applyScenario(context, changes));
      const scoreChange = newScore - originalScore;
      return {
        condition,
        originalScore: round(originalScore, 2),
        newScore: round(newScore, 2),
        scoreChange: round(scoreChange, 2),
        changePercent: originalScore > 0 ? round((scoreChange / originalScore) * 100, 2) : 0,
        impact: whatIfImpact(scoreChange),
      };
    });
  }
}
