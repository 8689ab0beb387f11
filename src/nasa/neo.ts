/**
 * Near-Earth Object feed
 */

import { addDays, formatDate } from '../utils/dates.js';
import { buildUrl, getJson } from './http.js';
import { isolateFetch, resolveRequestOptions, type NasaRequestOptions } from './client.js';
import { NeoFeedResponseSchema, type NeoObject } from './schemas.js';
import type { FetchOutcome, NeoEntry } from '../types/index.js';

export const NEO_FEED_PATH = '/neo/rest/v1/feed';

export interface NeoFetchOptions extends NasaRequestOptions {
  /** Days after today covered by the feed request */
  daysAhead?: number;
}

export function toNeoEntry(date: string, object: NeoObject): NeoEntry {
  return {
    date,
    name: object.name,
    diameterKm: object.estimated_diameter?.kilometers?.estimated_diameter_max ?? null,
    hazardous: object.is_potentially_hazardous_asteroid === true,
    velocityKms: object.close_approach_data?.[0]?.relative_velocity?.kilometers_per_second ?? null,
    source: 'NEO',
  };
}

/**
 * Flatten the date-keyed feed into one entry per object, dates ascending
 */
export function flattenNeoFeed(feed: Record<string, NeoObject[]>): NeoEntry[] {
  return Object.keys(feed)
    .sort()
    .flatMap((date) => (feed[date] ?? []).map((object) => toNeoEntry(date, object)));
}

async function requestNeoFeed(options: NeoFetchOptions): Promise<NeoEntry[]> {
  const { apiKey, baseUrl, timeoutMs, referenceDate } = resolveRequestOptions(options);
  const url = buildUrl(baseUrl, NEO_FEED_PATH, {
    api_key: apiKey,
    start_date: formatDate(referenceDate),
    end_date: formatDate(addDays(referenceDate, options.daysAhead ?? 7)),
    detailed: false,
  });

  const data = await getJson(url, NeoFeedResponseSchema, timeoutMs);
  return flattenNeoFeed(data.near_earth_objects);
}

export function fetchNeoFeed(options: NeoFetchOptions = {}): Promise<FetchOutcome<NeoEntry>> {
  return isolateFetch('NEO', () => requestNeoFeed(options));
}
