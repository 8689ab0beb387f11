/**
 * Earth imagery availability for a fixed set of locations
 */

import { logger } from '../utils/logger.js';
import { buildUrl, head, redactApiKey } from './http.js';
import { isolateFetch, resolveRequestOptions, type NasaRequestOptions } from './client.js';
import type { EarthImageryEntry, FetchOutcome } from '../types/index.js';

export const EARTH_IMAGERY_PATH = '/planetary/earth/imagery';
export const EARTH_IMAGERY_DIM = 0.15;

export interface ImageryLocation {
  name: string;
  lat: number;
  lon: number;
}

export const IMAGERY_LOCATIONS: readonly ImageryLocation[] = [
  { name: 'New York City', lat: 40.7128, lon: -74.006 },
  { name: 'Tokyo', lat: 35.6895, lon: 139.6917 },
  { name: 'London', lat: 51.5074, lon: -0.1278 },
  { name: 'Sydney', lat: -33.8688, lon: 151.2093 },
];

export interface EarthImageryFetchOptions extends NasaRequestOptions {
  locations?: readonly ImageryLocation[];
}

/**
 * HEAD probe per location. 200 means imagery exists; any other status
 * just leaves the location out. Network errors fail the whole dataset.
 */
async function probeEarthImagery(options: EarthImageryFetchOptions): Promise<EarthImageryEntry[]> {
  const { apiKey, baseUrl, timeoutMs } = resolveRequestOptions(options);
  const entries: EarthImageryEntry[] = [];

  for (const location of options.locations ?? IMAGERY_LOCATIONS) {
    const url = buildUrl(baseUrl, EARTH_IMAGERY_PATH, {
      lon: location.lon,
      lat: location.lat,
      dim: EARTH_IMAGERY_DIM,
      api_key: apiKey,
    });

    const response = await head(url, timeoutMs);
    if (response.status !== 200) {
      logger.debug({ location: location.name, status: response.status }, 'Earth imagery unavailable');
      continue;
    }

    entries.push({
      location: location.name,
      latitude: location.lat,
      longitude: location.lon,
      url: redactApiKey(response.url || url),
      source: 'Earth Imagery',
    });
  }

  return entries;
}

export function fetchEarthImagery(
  options: EarthImageryFetchOptions = {}
): Promise<FetchOutcome<EarthImageryEntry>> {
  return isolateFetch('Earth Imagery', () => probeEarthImagery(options));
}
