/**
 * Loader Module
 *
 * Resolves and reads the mission CSV, then validates and normalizes it.
 */

import { logger } from '../utils/logger.js';
import { parseCsv } from './parse.js';
import { normalizeMissions, type NormalizeResult } from './normalize.js';
import type { CsvContent } from './source.js';

export interface LoadedMissions extends NormalizeResult {
  content: CsvContent;
  rowCount: number;
}

/**
 * Normalize CSV text that has already been read
 */
export function normalizeCsvContent(content: CsvContent): LoadedMissions {
  const csv = parseCsv(content.text);
  logger.info({ rows: csv.rows.length, columns: csv.headers.length }, 'CSV parsed');

  const result = normalizeMissions(csv);

  if (Object.keys(result.coercionFailures).length > 0) {
    logger.debug({ coercionFailures: result.coercionFailures }, 'Some values were coerced to null');
  }
  logger.info(
    { missions: result.missions.length, synthesizedIds: result.synthesizedIds },
    'Missions normalized'
  );

  return { ...result, content, rowCount: csv.rows.length };
}

export { parseCsv, type ParsedCsv, type CsvRow } from './parse.js';
export {
  normalizeMissions,
  findMissingColumns,
  synthesizeMissionId,
  type NormalizeResult,
} from './normalize.js';
export {
  resolveCsvSource,
  readCsvSource,
  hashCsvText,
  isUrl,
  type CsvSource,
  type CsvContent,
  type CsvSourceDefaults,
} from './source.js';
export { MissionCsvSchema, parseDecimal, cleanText, type NormalizedMission } from './schemas.js';
