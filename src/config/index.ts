/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'space-missions-loader',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  nasa: {
    apiKey: env.NASA_API_KEY,
    baseUrl: env.NASA_API_BASE_URL,
    exoplanetArchiveUrl: env.EXOPLANET_ARCHIVE_URL,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    apodDays: env.APOD_DAYS,
    neoDaysAhead: env.NEO_DAYS_AHEAD,
  },

  source: {
    csvPath: env.MISSIONS_CSV_PATH,
    csvUrl: env.MISSIONS_CSV_URL,
    reloadOnChange: env.RELOAD_ON_SOURCE_CHANGE,
  },

  database: {
    path: env.DB_PATH,
    auxiliaryRetentionDays: env.AUX_RETENTION_DAYS,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export {
  COLUMN_MAP,
  EXPECTED_COLUMNS,
  NUMERIC_FIELDS,
  SYNTHETIC_ID_PREFIX,
  SYNTHETIC_ID_WIDTH,
} from './columns.js';
export type { CsvColumn, MappedColumn, NumericField } from './columns.js';
