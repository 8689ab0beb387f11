/**
 * Mission normalization
 *
 * Header validation and renaming, type coercion, launch-year derivation and
 * identifier synthesis.
 */

import {
  COLUMN_MAP,
  EXPECTED_COLUMNS,
  NUMERIC_FIELDS,
  SYNTHETIC_ID_PREFIX,
  SYNTHETIC_ID_WIDTH,
  type MappedColumn,
} from '../config/columns.js';
import { yearOf } from '../utils/dates.js';
import { ValidationError } from '../utils/errors.js';
import { MissionCsvSchema, type MissionCsv, type NormalizedMission } from './schemas.js';
import type { CsvRow, ParsedCsv } from './parse.js';

export interface NormalizeResult {
  missions: NormalizedMission[];
  /** Identifiers synthesized for rows that had none */
  synthesizedIds: number;
  /** Non-empty cells that could not be coerced, per column */
  coercionFailures: Partial<Record<MappedColumn, number>>;
}

/**
 * Expected headers absent from `headers`, in mapping order
 */
export function findMissingColumns(headers: readonly string[]): string[] {
  const present = new Set(headers);
  return EXPECTED_COLUMNS.filter((column) => !present.has(column));
}

/**
 * `MSN-0001` style identifier for a 1-based row position
 */
export function synthesizeMissionId(position: number): string {
  return `${SYNTHETIC_ID_PREFIX}${String(position).padStart(SYNTHETIC_ID_WIDTH, '0')}`;
}

type MappedRow = Partial<Record<MappedColumn, string>>;

function mapRow(row: CsvRow): MappedRow {
  const mapped: MappedRow = {};
  for (const { header, column } of COLUMN_MAP) {
    mapped[column] = row[header];
  }
  return mapped;
}

function countCoercionFailures(
  raw: MappedRow,
  parsed: MissionCsv,
  failures: Partial<Record<MappedColumn, number>>
): void {
  const coerced: MappedColumn[] = ['launch_date', ...NUMERIC_FIELDS];
  for (const column of coerced) {
    const input = raw[column];
    if (input !== undefined && input.trim() !== '' && parsed[column] === null) {
      failures[column] = (failures[column] ?? 0) + 1;
    }
  }
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Normalize parsed CSV rows into mission records.
 *
 * @throws ValidationError when expected columns are missing or identifiers
 *   are not unique after synthesis
 */
export function normalizeMissions(csv: ParsedCsv): NormalizeResult {
  const missing = findMissingColumns(csv.headers);
  if (missing.length > 0) {
    throw new ValidationError(`CSV missing expected columns: ${missing.join(', ')}`, {
      details: { missingColumns: missing },
    });
  }

  const coercionFailures: Partial<Record<MappedColumn, number>> = {};
  let synthesizedIds = 0;

  const missions = csv.rows.map((row, index): NormalizedMission => {
    const raw = mapRow(row);
    const result = MissionCsvSchema.safeParse(raw);
    if (!result.success) {
      const message = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid mission row ${index + 1}: ${message}`);
    }

    const parsed = result.data;
    countCoercionFailures(raw, parsed, coercionFailures);

    let missionId = parsed.mission_id;
    if (missionId === null) {
      missionId = synthesizeMissionId(index + 1);
      synthesizedIds++;
    }

    return {
      mission_id: missionId,
      mission_name: parsed.mission_name,
      launch_date: parsed.launch_date,
      launch_year: yearOf(parsed.launch_date),
      target_type: parsed.target_type,
      target_name: parsed.target_name,
      mission_type: parsed.mission_type,
      distance_ly: parsed.distance_ly,
      duration_years: parsed.duration_years,
      cost_billion_usd: parsed.cost_billion_usd,
      scientific_yield: parsed.scientific_yield,
      crew_size: parsed.crew_size,
      success_pct: parsed.success_pct,
      fuel_consumption_tons: parsed.fuel_consumption_tons,
      payload_weight_tons: parsed.payload_weight_tons,
      launch_vehicle: parsed.launch_vehicle,
    };
  });

  const duplicates = findDuplicates(missions.map((mission) => mission.mission_id));
  if (duplicates.length > 0) {
    throw new ValidationError(`Duplicate mission identifiers: ${duplicates.join(', ')}`, {
      details: { duplicateIds: duplicates },
    });
  }

  return { missions, synthesizedIds, coercionFailures };
}
