/**
 * NASA Exoplanet Archive (TAP sync endpoint)
 */

import { config } from '../config/index.js';
import { buildUrl, getJson } from './http.js';
import { isolateFetch } from './client.js';
import { ExoplanetResponseSchema, type ExoplanetRow } from './schemas.js';
import type { ExoplanetEntry, FetchOutcome } from '../types/index.js';

export const EXOPLANET_LIMIT = 50;

export const EXOPLANET_QUERY = [
  `SELECT TOP ${EXOPLANET_LIMIT} pl_name, sy_pnum, pl_rade, pl_bmasse, sy_dist, disc_year`,
  'FROM ps',
  'WHERE pl_name IS NOT NULL',
  'ORDER BY disc_year DESC',
].join(' ');

export interface ExoplanetFetchOptions {
  archiveUrl?: string;
  timeoutMs?: number;
}

export function toExoplanetEntry(row: ExoplanetRow): ExoplanetEntry {
  return {
    name: row.pl_name,
    planetCount: row.sy_pnum ?? null,
    radiusEarth: row.pl_rade ?? null,
    massEarth: row.pl_bmasse ?? null,
    distancePc: row.sy_dist ?? null,
    discoveryYear: row.disc_year ?? null,
    source: 'Exoplanet Archive',
  };
}

async function requestExoplanets(options: ExoplanetFetchOptions): Promise<ExoplanetEntry[]> {
  const {
    archiveUrl = config.nasa.exoplanetArchiveUrl,
    timeoutMs = config.nasa.timeoutMs,
  } = options;

  const url = buildUrl(archiveUrl, '', { query: EXOPLANET_QUERY, format: 'json' });
  const rows = await getJson(url, ExoplanetResponseSchema, timeoutMs);
  return rows.slice(0, EXOPLANET_LIMIT).map(toExoplanetEntry);
}

export function fetchExoplanets(
  options: ExoplanetFetchOptions = {}
): Promise<FetchOutcome<ExoplanetEntry>> {
  return isolateFetch('Exoplanet Archive', () => requestExoplanets(options));
}
