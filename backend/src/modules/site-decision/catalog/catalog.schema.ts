/**
 * Catalog file schemas
 */

import { z } from 'zod';
import { FACTORS } from '../contracts/site-decision.types.js';

const factorEnum = z.enum(FACTORS);

const weightTable = z.record(factorEnum, z.number().nonnegative());
const multiplierTable = z.record(factorEnum, z.number().positive());

export const WeightsFileSchema = z.object({
  default: weightTable,
  businesses: z.record(z.string(), weightTable),
  marketConditions: z.object({
    high_growth: multiplierTable,
    mature_market: multiplierTable,
    declining_market: multiplierTable,
  }),
  locationTypes: z.object({
    city_center: multiplierTable,
    residential: multiplierTable,
    commercial: multiplierTable,
    suburban: multiplierTable,
  }),
  schemes: z.object({
    conservative: multiplierTable,
    aggressive: multiplierTable,
    balanced: multiplierTable,
  }),
});

const incomeMultipliers = z.object({
  low: z.number().positive(),
  medium: z.number().positive(),
  high: z.number().positive(),
});

export const BusinessProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(['food_beverage', 'service', 'retail', 'entertainment']),
  capacityRatio: z.number().nonnegative(),
  profitMargin: z.number().min(0).max(1),
  incomeMultipliers: incomeMultipliers.optional(),
});

export const BusinessesFileSchema = z.array(BusinessProfileSchema);

const unit = z.number().min(0).max(1);

export const AffinityFileSchema = z.object({
  segments: z.record(z.string(), z.record(z.string(), unit)),
  generalDefaults: z.record(z.string(), unit),
  listedSegmentFallback: unit,
  unknownFallback: unit,
});

const monthly = z.array(z.number().positive()).length(12);

const periodImpacts = z.object({
  months: z.array(z.number().int().min(1).max(12)),
  impacts: z.record(z.string(), z.number().positive()),
});

export const SeasonalFileSchema = z.object({
  segments: z.record(z.string(), monthly).refine((s) => 'general' in s, {
    message: 'segments must include "general"',
  }),
  businesses: z.record(z.string(), monthly),
  holidays: z.record(z.string(), periodImpacts),
  weather: z.record(z.string(), periodImpacts),
});

export const FactorDeltasSchema = z.record(factorEnum, z.number().min(-1).max(5));

export const ScenarioDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  modifications: FactorDeltasSchema,
  businessSpecificOverrides: z.record(z.string(), FactorDeltasSchema).default({}),
  advice: z.array(z.string()).optional(),
});

export const ScenariosFileSchema = z.array(ScenarioDefinitionSchema);

/** business id → lowercase keywords matched against provider category labels */
export const PlaceCategoriesFileSchema = z.record(z.array(z.string().min(1).toLowerCase()).min(1));

export type WeightsFile = z.infer<typeof WeightsFileSchema>;
export type BusinessProfile = z.infer<typeof BusinessProfileSchema>;
export type AffinityFile = z.infer<typeof AffinityFileSchema>;
export type SeasonalFile = z.infer<typeof SeasonalFileSchema>;
export type ScenarioDefinition = z.infer<typeof ScenarioDefinitionSchema>;
export type PlaceCategoriesFile = z.infer<typeof PlaceCategoriesFileSchema>;
