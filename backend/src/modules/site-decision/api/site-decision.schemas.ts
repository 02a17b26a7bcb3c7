/**
 * Request bodies for /api/site-decision/*
 */

import { z } from 'zod';
import { env } from '../../../config/env.js';
import { ValidationError } from '../../../common/errors.js';
import { FACTORS, FEATURE_TAGS } from '../contracts/site-decision.types.js';

const count = z.number().finite().min(0);
const factorEnum = z.enum(FACTORS);
const month = z.number().int().min(1).max(12);

export const FactorDeltasBody = z.record(factorEnum, z.number().finite().min(-1).max(5));
export const WeightsBody = z.record(factorEnum, z.number().finite().min(0));

export const InputsBody = z
  .object({
    customerTarget: z.string().min(1).max(40).optional(),
    priceLevel: z.number().int().min(1).max(4).optional(),
  })
  .default({});

export const AreaBody = z.object({
  osmCounts: z.record(z.enum(FEATURE_TAGS), count).default({}),
  categoryCounts: z.record(z.string().min(1), count).default({}),
  month: month.optional(),
  rentLevel: z.number().int().min(1).max(4).optional(),
  populationDensity: count.optional(),
  incomeLevel: z.enum(['low', 'medium', 'high']).optional(),
  footTrafficScore: z.number().min(0).max(1).optional(),
  seasonalFactor: z.number().positive().max(3).optional(),
});

const BusinessRequest = z.object({
  businessId: z.string().min(1).max(60),
  inputs: InputsBody,
  area: AreaBody,
});

const WeightingFields = {
  marketCondition: z.enum(['high_growth', 'mature_market', 'declining_market']).optional(),
  locationType: z.enum(['city_center', 'residential', 'commercial', 'suburban']).optional(),
  scheme: z.enum(['conservative', 'aggressive', 'balanced']).optional(),
  signals: z
    .object({
      growthRate: z.number().finite().optional(),
      unemploymentRate: z.number().finite().optional(),
      rentTrend: z.number().finite().optional(),
      infrastructureInvestment: z.number().finite().optional(),
    })
    .optional(),
  weights: WeightsBody.optional(),
};

export const ScoreBody = BusinessRequest.extend({
  ...WeightingFields,
  includeSensitivity: z.boolean().default(true),
});

export const RulesBody = BusinessRequest;

export const SensitivityBody = BusinessRequest.extend({
  adjustmentPct: z.number().gt(0).max(1).default(0.2),
  weights: WeightsBody.optional(),
});

export const CustomScenarioBody = z.object({
  name: z.string().min(1).max(80),
  description: z.string().max(300).default(''),
  changes: FactorDeltasBody,
  businessSpecificOverrides: z.record(z.string().min(1), FactorDeltasBody).default({}),
});

export const ScenariosBody = BusinessRequest.extend({
  scenarioIds: z.array(z.string().min(1)).optional(),
  custom: z.array(CustomScenarioBody).max(20).default([]),
  adjustmentMode: z.enum(['wired', 'counts_only']).optional(),
});

export const WhatIfBody = BusinessRequest.extend({
  conditions: z.record(z.string().min(1), FactorDeltasBody),
  adjustmentMode: z.enum(['wired', 'counts_only']).optional(),
});

export const MonteCarloBody = BusinessRequest.extend({
  ...WeightingFields,
  numSimulations: z.number().int().min(1).max(env.MC_MAX_SIMULATIONS).default(env.MC_DEFAULT_SIMULATIONS),
  seed: z.number().int().min(0).optional(),
});

export const ScreenBody = z.object({
  inputs: InputsBody,
  area: AreaBody,
  businessIds: z.array(z.string().min(1)).optional(),
});

export const InsightsBody = z.object({
  area: AreaBody,
  places: z
    .array(
      z.object({
        name: z.string().optional(),
        category: z.string().optional(),
        lat: z.number().optional(),
        lon: z.number().optional(),
      }),
    )
    .optional(),
  coordinates: z
    .object({ lat: z.number(), lon: z.number(), radius: z.number().positive().optional() })
    .optional(),
});

export const AnalyzeBody = z
  .object({
    address: z.string().max(300).optional(),
    lat: z.number().min(-90).max(90).optional(),
    lon: z.number().min(-180).max(180).optional(),
    radius: z.number().int().min(50).max(20_000).default(1000),
    priceMin: z.number().int().min(1).max(4).optional(),
    priceMax: z.number().int().min(1).max(4).optional(),
    inputs: InputsBody,
    month: month.optional(),
    businessIds: z.array(z.string().min(1)).optional(),
    clusterCount: z.number().int().min(1).max(10).default(3),
    venueWeights: z
      .object({
        distance: z.number().finite().min(0),
        competitors: z.number().finite().min(0),
        rating: z.number().finite().min(0),
        diversity: z.number().finite().min(0),
      })
      .optional(),
  })
  .refine((b) => Boolean(b.address?.trim()) || (b.lat !== undefined && b.lon !== undefined), {
    message: 'Either address or lat/lon is required',
  });

export const SeasonalQuery = z.object({
  segment: z.string().min(1).default('general'),
  month: z.coerce.number().int().min(1).max(12).optional(),
  baseDemand: z.coerce.number().positive().default(100),
  monthsAhead: z.coerce.number().int().min(1).max(24).default(12),
});

export type AreaInput = z.infer<typeof AreaBody>;
export type InputsInput = z.infer<typeof InputsBody>;
export type ScoreRequest = z.infer<typeof ScoreBody>;
export type RulesRequest = z.infer<typeof RulesBody>;
export type SensitivityRequest = z.infer<typeof SensitivityBody>;
export type ScenariosRequest = z.infer<typeof ScenariosBody>;
export type WhatIfRequest = z.infer<typeof WhatIfBody>;
export type MonteCarloRequest = z.infer<typeof MonteCarloBody>;
export type ScreenRequest = z.infer<typeof ScreenBody>;
export type InsightsRequest = z.infer<typeof InsightsBody>;
export type AnalyzeRequest = z.infer<typeof AnalyzeBody>;
export type SeasonalRequest = z.infer<typeof SeasonalQuery>;

/**
 * Parse or throw a 400 with the first few issues.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.') || 'body'}: ${i.message}`)
      .join('; ');
    throw new ValidationError(issues);
  }
  return parsed.data;
}
