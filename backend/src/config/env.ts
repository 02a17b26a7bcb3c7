/**
 * Environment configuration
 *
 * Loaded once at startup. Invalid values fail fast.
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // External collaborators
  NOMINATIM_URL: z.string().url().default('https://nominatim.openstreetmap.org/search'),
  FOURSQUARE_URL: z.string().url().default('https://api.foursquare.com/v3/places/search'),
  FOURSQUARE_API_KEY: z.string().default(''),
  OVERPASS_URL: z.string().url().default('https://overpass-api.de/api/interpreter'),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Engine
  SITE_DATA_DIR: z.string().optional(),
  MC_DEFAULT_SIMULATIONS: z.coerce.number().int().positive().default(1000),
  MC_MAX_SIMULATIONS: z.coerce.number().int().positive().default(20000),
  /** Worker threads for Monte Carlo; 0 runs trials in process. */
  MC_WORKERS: z.coerce.number().int().min(0).default(0),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = parseEnv(process.env);
