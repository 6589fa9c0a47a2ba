import { z } from 'zod';

/**
 * Environment configuration. Parsed once at startup; an invalid value stops
 * the server before it accepts traffic.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  TRIP_DATA_PATH: z.string().min(1).default('data/raw/delivery_five_cities.csv'),
  TRIP_ROW_LIMIT: z.coerce.number().int().positive().default(100_000),
  DIESEL_EMISSION_FACTOR: z.coerce.number().nonnegative().default(0.21),
  EV_EMISSION_FACTOR: z.coerce.number().nonnegative().default(0.05),
  // 0 disables the dataset run cache
  ANALYSIS_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60_000),
  ORS_API_KEY: z.string().optional(),
  ORS_BASE_URL: z.string().url().default('https://api.openrouteservice.org'),
});

export type ApiConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return envSchema.parse(env);
}
