/**
 * Messages between the Monte Carlo worker pool and its workers.
 * Everything crossing the thread boundary is re-validated on arrival.
 */

import { z } from 'zod';
import { FACTORS, FEATURE_TAGS } from '../contracts/site-decision.types.js';

// structured clone keeps NaN and Infinity; z.number() alone rejects NaN
const num = z.union([z.number(), z.nan()]);
const factorMap = z.record(z.enum(FACTORS), num);

export const TrialPlanSchema = z.object({
  businessId: z.string(),
  context: z.object({
    osmCounts: z.record(z.enum(FEATURE_TAGS), num),
    categoryCounts: z.record(z.string(), num),
    populationDensity: num,
    incomeLevel: z.enum(['low', 'medium', 'high']),
    footTrafficScore: num,
    rentLevel: num,
    seasonalFactor: num,
    scenarioAdjustments: factorMap.optional(),
  }),
  inputs: z.object({
    customerTarget: z.string().optional(),
    priceLevel: num.optional(),
  }),
  score: z
    .object({
      weights: factorMap.optional(),
      marketCondition: z.enum(['high_growth', 'mature_market', 'declining_market']).optional(),
      locationType: z.enum(['city_center', 'residential', 'commercial', 'suburban']).optional(),
      includeSensitivity: z.boolean().optional(),
    })
    .optional(),
});

export const WorkerSetupSchema = z.object({
  dataDir: z.string().min(1),
  plan: TrialPlanSchema,
});

export const TrialBatchSchema = z.object({
  index: z.number().int().min(0),
  seed: z.number().int().min(0),
  size: z.number().int().min(0),
});

export const BatchReplySchema = z.union([
  z.object({ index: z.number().int(), scores: z.array(num), failed: z.number().int().min(0) }),
  z.object({ index: z.number().int(), error: z.string() }),
]);

export type WorkerSetup = z.infer<typeof WorkerSetupSchema>;
export type BatchReply = z.infer<typeof BatchReplySchema>;
