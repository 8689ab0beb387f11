/**
 * NASA Module
 *
 * Fetches the four auxiliary datasets one after another. Each fetch is
 * isolated: a failure yields an empty outcome with its error message.
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { fetchApod } from './apod.js';
import { fetchNeoFeed } from './neo.js';
import { fetchExoplanets } from './exoplanet.js';
import { fetchEarthImagery } from './earth-imagery.js';
import type { NasaRequestOptions } from './client.js';
import type { AuxiliaryData } from '../types/index.js';

export interface AuxiliaryFetchOptions extends NasaRequestOptions {
  apodDays?: number;
  neoDaysAhead?: number;
  exoplanetArchiveUrl?: string;
}

export async function fetchAuxiliaryData(options: AuxiliaryFetchOptions = {}): Promise<AuxiliaryData> {
  const {
    apodDays = config.nasa.apodDays,
    neoDaysAhead = config.nasa.neoDaysAhead,
    exoplanetArchiveUrl,
    ...request
  } = options;

  logger.info('Fetching NASA auxiliary datasets...');

  const apod = await fetchApod({ ...request, days: apodDays });
  const neo = await fetchNeoFeed({ ...request, daysAhead: neoDaysAhead });
  const exoplanet = await fetchExoplanets({
    archiveUrl: exoplanetArchiveUrl,
    timeoutMs: request.timeoutMs,
  });
  const earthImagery = await fetchEarthImagery(request);

  return { apod, neo, exoplanet, earthImagery };
}

export { fetchApod, apodDates, toApodEntry, APOD_EXPLANATION_LIMIT } from './apod.js';
export { fetchNeoFeed, flattenNeoFeed, toNeoEntry } from './neo.js';
export { fetchExoplanets, toExoplanetEntry, EXOPLANET_QUERY, EXOPLANET_LIMIT } from './exoplanet.js';
export { fetchEarthImagery, IMAGERY_LOCATIONS, type ImageryLocation } from './earth-imagery.js';
export { isolateFetch, type NasaRequestOptions } from './client.js';
export { redactApiKey } from './http.js';
