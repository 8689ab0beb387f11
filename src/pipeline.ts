/**
 * Main Pipeline
 *
 * "Ensure ready" workflow:
 * 1. Check whether missions are already stored (idempotence guard)
 * 2. Read and normalize the mission CSV
 * 3. Apply pending schema migrations
 * 4. Rebuild the missions table
 * 5. Fetch the NASA auxiliary datasets
 * 6. Store them (and prune old snapshots when a retention window is set)
 */

import { config } from './config/index.js';
import { initDatabase, closeDatabase, applyMigrations } from './db/index.js';
import {
  countMissions,
  getLoadMetadata,
  pruneAuxiliaryData,
  rebuildMissions,
  storeAuxiliaryData,
} from './db/queries.js';
import { normalizeCsvContent, readCsvSource, resolveCsvSource, type CsvContent } from './loader/index.js';
import { fetchAuxiliaryData, type AuxiliaryFetchOptions } from './nasa/index.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import type {
  AuxiliaryCounts,
  AuxiliaryData,
  AuxiliaryRefreshResult,
  EnsureReadyResult,
  LoadReason,
} from './types/index.js';

/**
 * Pipeline options
 */
export interface EnsureReadyOptions {
  dbPath?: string;
  /** CSV path or URL; falls back to the configured path, then URL */
  csvSource?: string;
  /** Rebuild even when missions are already stored */
  force?: boolean;
  /** Hash the source on each call and rebuild when it changed */
  reloadOnSourceChange?: boolean;
  auxiliary?: AuxiliaryFetchOptions;
  retentionDays?: number;
}

export interface AuxiliaryRefreshOptions {
  dbPath?: string;
  auxiliary?: AuxiliaryFetchOptions;
  retentionDays?: number;
}

const NO_AUXILIARY: AuxiliaryCounts = { apod: 0, neo: 0, exoplanet: 0, earthImagery: 0 };

function collectFetchErrors(data: AuxiliaryData): EnsureReadyResult['fetchErrors'] {
  const errors: EnsureReadyResult['fetchErrors'] = {};
  for (const key of ['apod', 'neo', 'exoplanet', 'earthImagery'] as const) {
    const error = data[key].error;
    if (error !== undefined) {
      errors[key] = error;
    }
  }
  return errors;
}

/**
 * Decide whether a populated store must be reloaded because its source
 * changed. Returns the already-read content when it must.
 */
async function detectSourceChange(csvSource: string | undefined): Promise<CsvContent | null> {
  let content: CsvContent;
  try {
    content = await readCsvSource(resolveCsvSource(csvSource));
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Could not read CSV source for change detection, keeping stored missions');
    return null;
  }

  const storedHash = getLoadMetadata('source_hash');
  if (storedHash === null || storedHash === content.hash) {
    return null;
  }

  logger.warn(
    { source: content.source.location, storedHash, currentHash: content.hash },
    'CSV source changed since last load'
  );
  return content;
}

/**
 * Make sure the database holds the missions and a fresh set of auxiliary
 * snapshots. A populated store is left untouched unless `force` is set or
 * the source content changed.
 */
export async function ensureReady(options: EnsureReadyOptions = {}): Promise<EnsureReadyResult> {
  const {
    dbPath = config.database.path,
    csvSource,
    force = false,
    reloadOnSourceChange = config.source.reloadOnChange,
    auxiliary = {},
    retentionDays = config.database.auxiliaryRetentionDays,
  } = options;

  const startTime = Date.now();
  logger.info({ dbPath, csvSource, force }, 'Ensuring mission database is ready');

  initDatabase(dbPath);

  try {
    const existing = countMissions();
    let content: CsvContent | null = null;
    let reason: LoadReason;

    if (existing > 0 && force) {
      reason = 'forced';
    } else if (existing > 0) {
      content = reloadOnSourceChange ? await detectSourceChange(csvSource) : null;
      if (content === null) {
        logger.info({ dbPath, missions: existing }, 'Database already populated, skipping load');
        return {
          status: 'skipped',
          reason: 'already_populated',
          dbPath,
          missions: existing,
          auxiliary: { ...NO_AUXILIARY },
          fetchErrors: {},
          durationMs: Date.now() - startTime,
        };
      }
      reason = 'source_changed';
    } else {
      reason = 'empty';
    }

    // Step 1: Read and normalize the CSV
    content ??= await readCsvSource(resolveCsvSource(csvSource));
    const loaded = normalizeCsvContent(content);

    // Step 2: Schema
    applyMigrations();

    // Step 3: Missions
    const missions = rebuildMissions(loaded.missions, {
      sourceHash: content.hash,
      sourceLocation: content.source.location,
    });
    logger.info({ missions, reason }, 'Missions loaded');

    // Step 4: Auxiliary datasets
    const data = await fetchAuxiliaryData(auxiliary);
    const counts = storeAuxiliaryData(data);
    pruneAuxiliaryData(retentionDays);

    const result: EnsureReadyResult = {
      status: 'loaded',
      reason,
      dbPath,
      missions,
      auxiliary: counts,
      fetchErrors: collectFetchErrors(data),
      durationMs: Date.now() - startTime,
    };

    logger.info({ result }, 'Database ready');
    return result;
  } catch (error) {
    logger.error({ error }, 'Failed to prepare mission database');
    throw error;
  } finally {
    closeDatabase();
  }
}

/**
 * Fetch and store the auxiliary datasets without touching missions
 */
export async function refreshAuxiliaryData(
  options: AuxiliaryRefreshOptions = {}
): Promise<AuxiliaryRefreshResult> {
  const {
    dbPath = config.database.path,
    auxiliary = {},
    retentionDays = config.database.auxiliaryRetentionDays,
  } = options;

  const startTime = Date.now();
  initDatabase(dbPath);

  try {
    applyMigrations();
    const data = await fetchAuxiliaryData(auxiliary);
    const counts = storeAuxiliaryData(data);
    const pruned = pruneAuxiliaryData(retentionDays);

    return {
      auxiliary: counts,
      fetchErrors: collectFetchErrors(data),
      pruned,
      durationMs: Date.now() - startTime,
    };
  } finally {
    closeDatabase();
  }
}
