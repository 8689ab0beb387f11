/**
 * Database Queries and Operations
 */

import { getDatabase } from './index.js';
import {
  AUXILIARY_TABLE_NAMES,
  DROP_MISSIONS_TABLE,
  MISSIONS_TABLE,
  type AuxiliaryTable,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import type { NormalizedMission } from '../loader/schemas.js';
import type {
  ApodEntry,
  AuxiliaryCounts,
  AuxiliaryData,
  EarthImageryEntry,
  ExoplanetEntry,
  Mission,
  MissionFilterOptions,
  MissionFilters,
  MissionSummary,
  NeoEntry,
} from '../types/index.js';

const DEFAULT_YEAR_RANGE: [number, number] = [2000, 2050];

// ═══════════════════════════════════════════════════════════════════════════════
// Table Inspection
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Check if a table exists
 */
export function tableExists(name: string): boolean {
  const db = getDatabase();
  const stmt = db.prepare<[string], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
  );
  return stmt.get(name) !== undefined;
}

function countRows(table: 'missions' | AuxiliaryTable): number {
  if (!tableExists(table)) {
    return 0;
  }
  const db = getDatabase();
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row?.count ?? 0;
}

/**
 * Number of stored missions (0 when the table does not exist)
 */
export function countMissions(): number {
  return countRows('missions');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Mission Load
// ═══════════════════════════════════════════════════════════════════════════════

const INSERT_MISSION = `
  INSERT INTO missions (
    mission_id, mission_name, launch_date, launch_year, target_type, target_name,
    mission_type, distance_ly, duration_years, cost_billion_usd, scientific_yield,
    crew_size, success_pct, fuel_consumption_tons, payload_weight_tons, launch_vehicle
  ) VALUES (
    @mission_id, @mission_name, @launch_date, @launch_year, @target_type, @target_name,
    @mission_type, @distance_ly, @duration_years, @cost_billion_usd, @scientific_yield,
    @crew_size, @success_pct, @fuel_consumption_tons, @payload_weight_tons, @launch_vehicle
  )
`;

export interface MissionLoadInfo {
  sourceHash: string;
  sourceLocation: string;
}

/**
 * Drop and recreate the missions table, insert every row and record the
 * source it came from. Runs as one transaction: on failure the previous
 * missions are kept.
 *
 * @returns number of inserted missions
 */
export function rebuildMissions(missions: NormalizedMission[], info: MissionLoadInfo): number {
  const db = getDatabase();

  logger.info(
    { missions: missions.length, source: info.sourceLocation },
    'Rebuilding missions table (drop + recreate)'
  );

  const rebuild = db.transaction((rows: NormalizedMission[]) => {
    db.exec(DROP_MISSIONS_TABLE);
    db.exec(MISSIONS_TABLE);

    const insert = db.prepare<NormalizedMission>(INSERT_MISSION);
    for (const row of rows) {
      insert.run(row);
    }

    setLoadMetadata('source_hash', info.sourceHash);
    setLoadMetadata('source_location', info.sourceLocation);
    setLoadMetadata('loaded_at', new Date().toISOString());
  });

  try {
    rebuild(missions);
  } catch (error) {
    logger.error({ error }, 'Mission rebuild failed, transaction rolled back');
    throw new StorageError(`Failed to rebuild missions table: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return countMissions();
}

// ═══════════════════════════════════════════════════════════════════════════════
// Load Metadata
// ═══════════════════════════════════════════════════════════════════════════════

export type LoadMetadataKey = 'source_hash' | 'source_location' | 'loaded_at';

/**
 * Read a load metadata value (null when absent or the table predates migrations)
 */
export function getLoadMetadata(key: LoadMetadataKey): string | null {
  if (!tableExists('load_metadata')) {
    return null;
  }
  const db = getDatabase();
  const stmt = db.prepare<[string], { value: string }>(
    'SELECT value FROM load_metadata WHERE key = ?'
  );
  return stmt.get(key)?.value ?? null;
}

export function setLoadMetadata(key: LoadMetadataKey, value: string): void {
  const db = getDatabase();
  const stmt = db.prepare<[string, string]>(`
    INSERT INTO load_metadata (key, value)
    VALUES (?, ?)
    ON CONFLICT(key) DO UPDATE SET
      value = excluded.value,
      updated_at = datetime('now')
  `);
  stmt.run(key, value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Auxiliary Datasets
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Rows an upsert batch leaves behind: entries sharing a natural key collapse
 */
function countDistinct<T>(entries: T[], key: (entry: T) => string): number {
  return new Set(entries.map(key)).size;
}

/**
 * Insert or refresh APOD entries (keyed by date)
 */
export function upsertApodEntries(entries: ApodEntry[]): number {
  const db = getDatabase();
  const stmt = db.prepare<ApodRow>(`
    INSERT INTO apod (date, title, explanation, url, media_type, source)
    VALUES (@date, @title, @explanation, @url, @media_type, @source)
    ON CONFLICT(date) DO UPDATE SET
      title = excluded.title,
      explanation = excluded.explanation,
      url = excluded.url,
      media_type = excluded.media_type,
      source = excluded.source,
      fetched_at = datetime('now')
  `);
  for (const entry of entries) {
    stmt.run({
      date: entry.date,
      title: entry.title,
      explanation: entry.explanation,
      url: entry.url,
      media_type: entry.mediaType,
      source: entry.source,
    });
  }
  return countDistinct(entries, (entry) => entry.date);
}

/**
 * Insert or refresh near-earth objects (keyed by date + name)
 */
export function upsertNeoEntries(entries: NeoEntry[]): number {
  const db = getDatabase();
  const stmt = db.prepare<NeoRow>(`
    INSERT INTO neo (date, name, diameter_km, hazardous, velocity_kms, source)
    VALUES (@date, @name, @diameter_km, @hazardous, @velocity_kms, @source)
    ON CONFLICT(date, name) DO UPDATE SET
      diameter_km = excluded.diameter_km,
      hazardous = excluded.hazardous,
      velocity_kms = excluded.velocity_kms,
      source = excluded.source,
      fetched_at = datetime('now')
  `);
  for (const entry of entries) {
    stmt.run({
      date: entry.date,
      name: entry.name,
      diameter_km: entry.diameterKm,
      hazardous: entry.hazardous ? 1 : 0,
      velocity_kms: entry.velocityKms,
      source: entry.source,
    });
  }
  return countDistinct(entries, (entry) => JSON.stringify([entry.date, entry.name]));
}

/**
 * Insert or refresh exoplanets (keyed by planet name)
 */
export function upsertExoplanetEntries(entries: ExoplanetEntry[]): number {
  const db = getDatabase();
  const stmt = db.prepare<ExoplanetRow>(`
    INSERT INTO exoplanet (name, planet_count, radius_earth, mass_earth, distance_pc, discovery_year, source)
    VALUES (@name, @planet_count, @radius_earth, @mass_earth, @distance_pc, @discovery_year, @source)
    ON CONFLICT(name) DO UPDATE SET
      planet_count = excluded.planet_count,
      radius_earth = excluded.radius_earth,
      mass_earth = excluded.mass_earth,
      distance_pc = excluded.distance_pc,
      discovery_year = excluded.discovery_year,
      source = excluded.source,
      fetched_at = datetime('now')
  `);
  for (const entry of entries) {
    stmt.run({
      name: entry.name,
      planet_count: entry.planetCount,
      radius_earth: entry.radiusEarth,
      mass_earth: entry.massEarth,
      distance_pc: entry.distancePc,
      discovery_year: entry.discoveryYear,
      source: entry.source,
    });
  }
  return countDistinct(entries, (entry) => entry.name);
}

/**
 * Insert or refresh imagery availability (keyed by location name)
 */
export function upsertEarthImageryEntries(entries: EarthImageryEntry[]): number {
  const db = getDatabase();
  const stmt = db.prepare<EarthImageryRow>(`
    INSERT INTO earth_imagery (location, latitude, longitude, url, source)
    VALUES (@location, @latitude, @longitude, @url, @source)
    ON CONFLICT(location) DO UPDATE SET
      latitude = excluded.latitude,
      longitude = excluded.longitude,
      url = excluded.url,
      source = excluded.source,
      fetched_at = datetime('now')
  `);
  for (const entry of entries) {
    stmt.run({
      location: entry.location,
      latitude: entry.latitude,
      longitude: entry.longitude,
      url: entry.url,
      source: entry.source,
    });
  }
  return countDistinct(entries, (entry) => entry.location);
}

/**
 * Store the four auxiliary datasets, one transaction per table
 */
export function storeAuxiliaryData(data: AuxiliaryData): AuxiliaryCounts {
  const db = getDatabase();

  try {
    const counts: AuxiliaryCounts = {
      apod: db.transaction(upsertApodEntries)(data.apod.records),
      neo: db.transaction(upsertNeoEntries)(data.neo.records),
      exoplanet: db.transaction(upsertExoplanetEntries)(data.exoplanet.records),
      earthImagery: db.transaction(upsertEarthImageryEntries)(data.earthImagery.records),
    };

    logger.info(counts, 'Stored auxiliary datasets');
    return counts;
  } catch (error) {
    logger.error({ error }, 'Failed to store auxiliary datasets');
    throw new StorageError(`Failed to store auxiliary datasets: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Delete auxiliary rows fetched more than `retentionDays` days ago
 *
 * @returns number of deleted rows
 */
export function pruneAuxiliaryData(retentionDays: number): number {
  if (retentionDays <= 0) {
    return 0;
  }

  const db = getDatabase();
  const window = `-${retentionDays} days`;
  let deleted = 0;

  for (const table of AUXILIARY_TABLE_NAMES) {
    if (!tableExists(table)) {
      continue;
    }
    const info = db
      .prepare<[string]>(`DELETE FROM ${table} WHERE fetched_at < datetime('now', ?)`)
      .run(window);
    deleted += info.changes;
  }

  if (deleted > 0) {
    logger.info({ deleted, retentionDays }, 'Pruned stale auxiliary rows');
  }
  return deleted;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Mission Queries
// ═══════════════════════════════════════════════════════════════════════════════

interface WhereClause {
  sql: string;
  params: (string | number)[];
}

function inList(column: string, values: string[] | undefined, where: WhereClause[]): void {
  if (values && values.length > 0) {
    where.push({
      sql: `${column} IN (${values.map(() => '?').join(', ')})`,
      params: values,
    });
  }
}

function buildWhere(filters: MissionFilters, extra: string[] = []): WhereClause {
  const parts: WhereClause[] = extra.map((sql) => ({ sql, params: [] }));

  inList('mission_type', filters.missionTypes, parts);
  inList('target_type', filters.targetTypes, parts);
  inList('launch_vehicle', filters.launchVehicles, parts);

  if (filters.yearRange) {
    const [from, to] = filters.yearRange;
    parts.push({ sql: 'launch_year BETWEEN ? AND ?', params: [from, to] });
  }

  if (parts.length === 0) {
    return { sql: '', params: [] };
  }
  return {
    sql: `WHERE ${parts.map((part) => part.sql).join(' AND ')}`,
    params: parts.flatMap((part) => part.params),
  };
}

/**
 * Get missions matching the filters. Empty filter lists match everything;
 * a year range excludes missions without a launch year.
 */
export function getMissions(filters: MissionFilters = {}): Mission[] {
  if (!tableExists('missions')) {
    return [];
  }
  const db = getDatabase();
  const where = buildWhere(filters);
  const stmt = db.prepare<(string | number)[], MissionRow>(`
    SELECT * FROM missions
    ${where.sql}
    ORDER BY launch_date IS NULL, launch_date, mission_id
  `);
  return stmt.all(...where.params).map(mapMissionRow);
}

function distinctValues(column: 'mission_type' | 'target_type' | 'launch_vehicle'): string[] {
  const db = getDatabase();
  return db
    .prepare<[], { value: string }>(
      `SELECT DISTINCT ${column} AS value FROM missions WHERE ${column} IS NOT NULL ORDER BY value`
    )
    .all()
    .map((row) => row.value);
}

/**
 * Values available for each mission filter
 */
export function getMissionFilterOptions(): MissionFilterOptions {
  if (!tableExists('missions')) {
    return { missionTypes: [], targetTypes: [], launchVehicles: [], yearRange: DEFAULT_YEAR_RANGE };
  }

  const db = getDatabase();
  const years = db
    .prepare<[], { min: number | null; max: number | null }>(
      'SELECT MIN(launch_year) AS min, MAX(launch_year) AS max FROM missions'
    )
    .get();

  return {
    missionTypes: distinctValues('mission_type'),
    targetTypes: distinctValues('target_type'),
    launchVehicles: distinctValues('launch_vehicle'),
    yearRange:
      years && years.min !== null && years.max !== null ? [years.min, years.max] : DEFAULT_YEAR_RANGE,
  };
}

/**
 * KPI and grouped figures for the filtered missions
 */
export function getMissionSummary(filters: MissionFilters = {}): MissionSummary {
  const empty: MissionSummary = {
    totalMissions: 0,
    avgCostBillionUsd: null,
    avgSuccessPct: null,
    topLaunchVehicle: null,
    missionsByTargetType: [],
    successByMissionType: [],
    missionsByYear: [],
  };
  if (!tableExists('missions')) {
    return empty;
  }

  const db = getDatabase();
  const where = buildWhere(filters);

  const totals = db
    .prepare<(string | number)[], { total: number; avgCost: number | null; avgSuccess: number | null }>(`
      SELECT COUNT(*) AS total, AVG(cost_billion_usd) AS avgCost, AVG(success_pct) AS avgSuccess
      FROM missions ${where.sql}
    `)
    .get(...where.params);

  const vehicleWhere = buildWhere(filters, ['launch_vehicle IS NOT NULL']);
  const topVehicle = db
    .prepare<(string | number)[], { vehicle: string }>(`
      SELECT launch_vehicle AS vehicle, COUNT(*) AS missions
      FROM missions ${vehicleWhere.sql}
      GROUP BY launch_vehicle
      ORDER BY missions DESC, launch_vehicle ASC
      LIMIT 1
    `)
    .get(...vehicleWhere.params);

  const byTarget = db
    .prepare<(string | number)[], { targetType: string | null; missions: number }>(`
      SELECT target_type AS targetType, COUNT(mission_id) AS missions
      FROM missions ${where.sql}
      GROUP BY target_type
      ORDER BY missions DESC, target_type ASC
    `)
    .all(...where.params);

  const typeWhere = buildWhere(filters, ['mission_type IS NOT NULL']);
  const byType = db
    .prepare<(string | number)[], { missionType: string; avgSuccessPct: number | null }>(`
      SELECT mission_type AS missionType, AVG(success_pct) AS avgSuccessPct
      FROM missions ${typeWhere.sql}
      GROUP BY mission_type
      ORDER BY avgSuccessPct DESC, mission_type ASC
    `)
    .all(...typeWhere.params);

  const byYear = db
    .prepare<(string | number)[], { launchYear: number | null; missions: number }>(`
      SELECT launch_year AS launchYear, COUNT(mission_id) AS missions
      FROM missions ${where.sql}
      GROUP BY launch_year
      ORDER BY launch_year IS NULL, launch_year
    `)
    .all(...where.params);

  return {
    totalMissions: totals?.total ?? 0,
    avgCostBillionUsd: totals?.avgCost ?? null,
    avgSuccessPct: totals?.avgSuccess ?? null,
    topLaunchVehicle: topVehicle?.vehicle ?? null,
    missionsByTargetType: byTarget,
    successByMissionType: byType,
    missionsByYear: byYear,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Auxiliary Queries
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Most recent stored APOD entry
 */
export function getLatestApod(): ApodEntry | null {
  if (!tableExists('apod')) {
    return null;
  }
  const db = getDatabase();
  const row = db.prepare<[], ApodRow>('SELECT * FROM apod ORDER BY date DESC LIMIT 1').get();
  return row ? mapApodRow(row) : null;
}

/**
 * Potentially hazardous objects, optionally for a single approach date
 */
export function getHazardousNeos(date?: string): NeoEntry[] {
  if (!tableExists('neo')) {
    return [];
  }
  const db = getDatabase();
  const rows = date
    ? db
        .prepare<[string], NeoRow>(
          'SELECT * FROM neo WHERE hazardous = 1 AND date = ? ORDER BY diameter_km DESC, name'
        )
        .all(date)
    : db
        .prepare<[], NeoRow>('SELECT * FROM neo WHERE hazardous = 1 ORDER BY date, diameter_km DESC, name')
        .all();
  return rows.map(mapNeoRow);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbStats {
  missions: number;
  auxiliary: AuxiliaryCounts;
  lastLoadedAt: Date | null;
  sourceLocation: string | null;
  schemaVersion: number;
}

/**
 * Get database statistics
 */
export function getStats(): DbStats {
  const db = getDatabase();
  const loadedAt = getLoadMetadata('loaded_at');

  const schemaVersion = tableExists('schema_migrations')
    ? (db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations').get()
        ?.version ?? 0)
    : 0;

  return {
    missions: countMissions(),
    auxiliary: {
      apod: countRows('apod'),
      neo: countRows('neo'),
      exoplanet: countRows('exoplanet'),
      earthImagery: countRows('earth_imagery'),
    },
    lastLoadedAt: loadedAt ? new Date(loadedAt) : null,
    sourceLocation: getLoadMetadata('source_location'),
    schemaVersion,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Row Types & Mappers
// ═══════════════════════════════════════════════════════════════════════════════

type MissionRow = NormalizedMission;

interface ApodRow {
  date: string;
  title: string | null;
  explanation: string | null;
  url: string | null;
  media_type: string | null;
  source: string;
}

interface NeoRow {
  date: string;
  name: string;
  diameter_km: number | null;
  hazardous: number;
  velocity_kms: number | null;
  source: string;
}

interface ExoplanetRow {
  name: string;
  planet_count: number | null;
  radius_earth: number | null;
  mass_earth: number | null;
  distance_pc: number | null;
  discovery_year: number | null;
  source: string;
}

interface EarthImageryRow {
  location: string;
  latitude: number;
  longitude: number;
  url: string;
  source: string;
}

function mapMissionRow(row: MissionRow): Mission {
  return {
    missionId: row.mission_id,
    missionName: row.mission_name,
    launchDate: row.launch_date,
    launchYear: row.launch_year,
    targetType: row.target_type,
    targetName: row.target_name,
    missionType: row.mission_type,
    distanceLy: row.distance_ly,
    durationYears: row.duration_years,
    costBillionUsd: row.cost_billion_usd,
    scientificYield: row.scientific_yield,
    crewSize: row.crew_size,
    successPct: row.success_pct,
    fuelConsumptionTons: row.fuel_consumption_tons,
    payloadWeightTons: row.payload_weight_tons,
    launchVehicle: row.launch_vehicle,
  };
}

function mapApodRow(row: ApodRow): ApodEntry {
  return {
    date: row.date,
    title: row.title,
    explanation: row.explanation ?? '',
    url: row.url,
    mediaType: row.media_type,
    source: 'APOD',
  };
}

function mapNeoRow(row: NeoRow): NeoEntry {
  return {
    date: row.date,
    name: row.name,
    diameterKm: row.diameter_km,
    hazardous: row.hazardous === 1,
    velocityKms: row.velocity_kms,
    source: 'NEO',
  };
}
