/**
 * Astronomy Picture of the Day
 */

import { addDays, formatDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { buildUrl, getJson } from './http.js';
import { isolateFetch, resolveRequestOptions, type NasaRequestOptions } from './client.js';
import { ApodResponseSchema, type ApodResponse } from './schemas.js';
import type { ApodEntry, FetchOutcome } from '../types/index.js';

export const APOD_PATH = '/planetary/apod';
export const APOD_EXPLANATION_LIMIT = 500;

export interface ApodFetchOptions extends NasaRequestOptions {
  /** Trailing window, today included */
  days?: number;
}

/**
 * Calendar days of the trailing window, most recent first
 */
export function apodDates(referenceDate: Date, days: number): string[] {
  return Array.from({ length: days }, (_, i) => formatDate(addDays(referenceDate, -i)));
}

export function toApodEntry(data: ApodResponse): ApodEntry {
  return {
    date: data.date,
    title: data.title ?? null,
    explanation: (data.explanation ?? '').slice(0, APOD_EXPLANATION_LIMIT),
    url: data.url ?? null,
    mediaType: data.media_type ?? null,
    source: 'APOD',
  };
}

/**
 * One request per day; a failed day fails the whole dataset
 */
async function requestApod(options: ApodFetchOptions): Promise<ApodEntry[]> {
  const { apiKey, baseUrl, timeoutMs, referenceDate } = resolveRequestOptions(options);
  const entries: ApodEntry[] = [];

  for (const date of apodDates(referenceDate, options.days ?? 7)) {
    const url = buildUrl(baseUrl, APOD_PATH, { api_key: apiKey, date });
    const data = await getJson(url, ApodResponseSchema, timeoutMs);
    entries.push(toApodEntry(data));
    logger.debug({ date, title: data.title }, 'APOD fetched');
  }

  return entries;
}

export function fetchApod(options: ApodFetchOptions = {}): Promise<FetchOutcome<ApodEntry>> {
  return isolateFetch('APOD', () => requestApod(options));
}
