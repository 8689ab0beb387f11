/**
 * Shared request options and failure isolation for the auxiliary fetchers
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { AuxiliarySource, FetchOutcome } from '../types/index.js';

export interface NasaRequestOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** "Today" for date windows; defaults to the current time */
  referenceDate?: Date;
}

export type ResolvedRequestOptions = Required<NasaRequestOptions>;

export function resolveRequestOptions(options: NasaRequestOptions = {}): ResolvedRequestOptions {
  return {
    apiKey: options.apiKey ?? config.nasa.apiKey,
    baseUrl: options.baseUrl ?? config.nasa.baseUrl,
    timeoutMs: options.timeoutMs ?? config.nasa.timeoutMs,
    referenceDate: options.referenceDate ?? new Date(),
  };
}

/**
 * Run one auxiliary fetch. Any error is logged and turned into an empty
 * outcome so the other datasets and the store step still run.
 */
export async function isolateFetch<T>(
  source: AuxiliarySource,
  task: () => Promise<T[]>
): Promise<FetchOutcome<T>> {
  try {
    const records = await task();
    logger.info({ source, records: records.length }, 'Auxiliary dataset fetched');
    return { source, records };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ source, error: message }, 'Auxiliary fetch failed, continuing without it');
    return { source, records: [], error: message };
  }
}
