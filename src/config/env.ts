/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // NASA / external APIs
  NASA_API_KEY: z.string().min(1, 'NASA_API_KEY is required'),
  NASA_API_BASE_URL: z.string().url().default('https://api.nasa.gov'),
  EXOPLANET_ARCHIVE_URL: z
    .string()
    .url()
    .default('https://exoplanetarchive.ipac.caltech.edu/TAP/sync'),

  // Mission dataset
  MISSIONS_CSV_PATH: z.string().default('./data/space_missions_dataset.csv'),
  MISSIONS_CSV_URL: z.string().url().optional(),

  // Database
  DB_PATH: z.string().default('./data/nasa_missions.db'),

  // External fetches
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  APOD_DAYS: z.coerce.number().int().min(1).default(7),
  NEO_DAYS_AHEAD: z.coerce.number().int().min(0).max(7).default(7),
  AUX_RETENTION_DAYS: z.coerce.number().int().min(0).default(0),
  RELOAD_ON_SOURCE_CHANGE: booleanString.default('true'),

  // Logging
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  LOG_FILE: z.string().default('./logs/app.log'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
