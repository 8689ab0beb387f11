/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { MIGRATIONS, MIGRATIONS_TABLE, type Migration } from './schema.js';

export type SqliteDatabase = Database.Database;

let db: SqliteDatabase | null = null;
let openPath: string | null = null;

/**
 * Get the open database handle
 */
export function getDatabase(): SqliteDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Open the SQLite database (creating its directory when needed).
 * Does not touch the schema; see applyMigrations().
 */
export function initDatabase(path: string = config.database.path): SqliteDatabase {
  if (db) {
    if (openPath === path) {
      logger.debug({ path }, 'Database already initialized');
      return db;
    }
    throw new Error(`Database already open at ${openPath}; close it before opening ${path}`);
  }

  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
    openPath = path;
  } catch (error) {
    logger.fatal({ error, path }, 'Failed to open database');
    throw new StorageError(`Failed to open database at ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.debug({ path }, 'Database connection established');
  return db;
}

/**
 * Versions already recorded in schema_migrations
 */
export function getAppliedMigrations(): number[] {
  const database = getDatabase();
  database.exec(MIGRATIONS_TABLE);
  return database
    .prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version')
    .all()
    .map((row) => row.version);
}

/**
 * Apply pending migrations, each in its own transaction
 *
 * @returns number of migrations applied
 */
export function applyMigrations(migrations: Migration[] = MIGRATIONS): number {
  const database = getDatabase();

  try {
    const applied = new Set(getAppliedMigrations());
    const pending = migrations
      .filter((migration) => !applied.has(migration.version))
      .sort((a, b) => a.version - b.version);

    const record = database.prepare<[number, string]>(
      'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
    );

    for (const migration of pending) {
      database.transaction(() => {
        database.exec(migration.sql);
        record.run(migration.version, migration.name);
      })();
      logger.info({ version: migration.version, name: migration.name }, 'Applied schema migration');
    }

    if (pending.length === 0) {
      logger.debug('Database schema up to date');
    }

    return pending.length;
  } catch (error) {
    logger.error({ error }, 'Failed to apply schema migrations');
    throw new StorageError(`Failed to apply schema migrations: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    logger.debug({ path: openPath }, 'Database connection closed');
    db = null;
    openPath = null;
  }
}

/**
 * Check if database is initialized
 */
export function isDatabaseInitialized(): boolean {
  return db !== null;
}
