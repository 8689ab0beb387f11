/**
 * SQLite Database Schema
 */

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const MIGRATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  version INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

// ═══════════════════════════════════════════════════════════════════════════════
// Missions Table
// One row per CSV record; rebuilt from scratch on every full load
// ═══════════════════════════════════════════════════════════════════════════════
export const MISSIONS_TABLE = `
CREATE TABLE IF NOT EXISTS missions (
  mission_id TEXT PRIMARY KEY,
  mission_name TEXT,
  launch_date TEXT,                               -- YYYY-MM-DD
  launch_year INTEGER,
  target_type TEXT,
  target_name TEXT,
  mission_type TEXT,
  distance_ly REAL,
  duration_years REAL,
  cost_billion_usd REAL,
  scientific_yield REAL,
  crew_size INTEGER,
  success_pct REAL,
  fuel_consumption_tons REAL,
  payload_weight_tons REAL,
  launch_vehicle TEXT
);

CREATE INDEX IF NOT EXISTS idx_missions_year ON missions(launch_year);
CREATE INDEX IF NOT EXISTS idx_missions_type ON missions(mission_type);
CREATE INDEX IF NOT EXISTS idx_missions_target ON missions(target_type);
CREATE INDEX IF NOT EXISTS idx_missions_vehicle ON missions(launch_vehicle);
`;

export const DROP_MISSIONS_TABLE = 'DROP TABLE IF EXISTS missions;';

// ═══════════════════════════════════════════════════════════════════════════════
// Load Metadata Table
// Source hash and location of the last mission load
// ═══════════════════════════════════════════════════════════════════════════════
const LOAD_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS load_metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

// ═══════════════════════════════════════════════════════════════════════════════
// Auxiliary Tables
// NASA snapshots, upserted by natural key
// ═══════════════════════════════════════════════════════════════════════════════
const AUXILIARY_TABLES = `
CREATE TABLE IF NOT EXISTS apod (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  title TEXT,
  explanation TEXT,
  url TEXT,
  media_type TEXT,
  source TEXT NOT NULL DEFAULT 'APOD',
  fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS neo (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  name TEXT NOT NULL,
  diameter_km REAL,
  hazardous INTEGER NOT NULL DEFAULT 0 CHECK (hazardous IN (0, 1)),
  velocity_kms REAL,
  source TEXT NOT NULL DEFAULT 'NEO',
  fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS exoplanet (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  planet_count INTEGER,
  radius_earth REAL,
  mass_earth REAL,
  distance_pc REAL,
  discovery_year INTEGER,
  source TEXT NOT NULL DEFAULT 'Exoplanet Archive',
  fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS earth_imagery (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  location TEXT NOT NULL,
  latitude REAL NOT NULL,
  longitude REAL NOT NULL,
  url TEXT NOT NULL,
  source TEXT NOT NULL DEFAULT 'Earth Imagery',
  fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE UNIQUE INDEX IF NOT EXISTS uq_apod_date ON apod(date);
CREATE UNIQUE INDEX IF NOT EXISTS uq_neo_date_name ON neo(date, name);
CREATE UNIQUE INDEX IF NOT EXISTS uq_exoplanet_name ON exoplanet(name);
CREATE UNIQUE INDEX IF NOT EXISTS uq_earth_imagery_location ON earth_imagery(location);
CREATE INDEX IF NOT EXISTS idx_neo_hazardous ON neo(hazardous, date);
`;

/**
 * Ordered schema history. Applied versions are recorded in
 * schema_migrations; append new entries, never edit applied ones.
 */
export const MIGRATIONS: Migration[] = [
  { version: 1, name: 'create_missions', sql: MISSIONS_TABLE },
  { version: 2, name: 'create_load_metadata', sql: LOAD_METADATA_TABLE },
  { version: 3, name: 'create_auxiliary_tables', sql: AUXILIARY_TABLES },
];

export const AUXILIARY_TABLE_NAMES = ['apod', 'neo', 'exoplanet', 'earth_imagery'] as const;
export type AuxiliaryTable = (typeof AUXILIARY_TABLE_NAMES)[number];
