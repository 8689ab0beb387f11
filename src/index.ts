#!/usr/bin/env node
/**
 * Space Missions Loader
 *
 * Loads the space missions CSV into SQLite and stores NASA snapshots:
 * 1. Reads the mission CSV (local path or URL)
 * 2. Validates, renames and coerces its columns
 * 3. Rebuilds the missions table (only when empty, changed or forced)
 * 4. Fetches APOD, NEO feed, Exoplanet Archive and Earth imagery data
 *
 * Usage:
 *   node dist/index.js                      - Ensure the database is ready
 *   node dist/index.js --csv <path-or-url>  - Use a specific CSV
 *   node dist/index.js --db <path>          - Use a specific database file
 *   node dist/index.js --force              - Rebuild even if populated
 *   node dist/index.js --refresh-aux        - Refresh NASA datasets only
 *   node dist/index.js --stats              - Print database statistics
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { getStats } from './db/queries.js';
import { ensureReady, refreshAuxiliaryData } from './pipeline.js';
import { parseArgs, USAGE, type CliOptions } from './cli.js';

function printStats(dbPath: string): void {
  initDatabase(dbPath);
  try {
    const stats = getStats();
    logger.info(
      {
        missions: stats.missions,
        auxiliary: stats.auxiliary,
        schemaVersion: stats.schemaVersion,
        source: stats.sourceLocation,
        lastLoaded: stats.lastLoadedAt?.toISOString() ?? 'never',
      },
      'Database statistics'
    );
  } finally {
    closeDatabase();
  }
}

async function run(options: CliOptions): Promise<void> {
  const dbPath = options.db ?? config.database.path;

  if (options.stats) {
    printStats(dbPath);
    return;
  }

  if (options.refreshAux) {
    const result = await refreshAuxiliaryData({ dbPath });
    logger.info('');
    logger.info('Auxiliary Refresh Complete:');
    logger.info(`  ✓ APOD:          ${result.auxiliary.apod}`);
    logger.info(`  ✓ NEO:           ${result.auxiliary.neo}`);
    logger.info(`  ✓ Exoplanets:    ${result.auxiliary.exoplanet}`);
    logger.info(`  ✓ Earth imagery: ${result.auxiliary.earthImagery}`);
    if (result.pruned > 0) {
      logger.info(`  ✓ Pruned:        ${result.pruned}`);
    }
    for (const [dataset, error] of Object.entries(result.fetchErrors)) {
      logger.info(`  ⚠ ${dataset}: ${error}`);
    }
    return;
  }

  const result = await ensureReady({ dbPath, csvSource: options.csv, force: options.force });

  logger.info('');
  if (result.status === 'skipped') {
    logger.info(`Database already populated with ${result.missions} missions, nothing to do.`);
    logger.info('Use --force to rebuild.');
    return;
  }

  logger.info('Load Complete:');
  logger.info(`  ✓ Missions:      ${result.missions} (${result.reason})`);
  logger.info(`  ✓ APOD:          ${result.auxiliary.apod}`);
  logger.info(`  ✓ NEO:           ${result.auxiliary.neo}`);
  logger.info(`  ✓ Exoplanets:    ${result.auxiliary.exoplanet}`);
  logger.info(`  ✓ Earth imagery: ${result.auxiliary.earthImagery}`);
  for (const [dataset, error] of Object.entries(result.fetchErrors)) {
    logger.info(`  ⚠ ${dataset}: ${error}`);
  }
  logger.info(`  ⏱ Duration:      ${(result.durationMs / 1000).toFixed(1)}s`);
  logger.info(`Database ready at: ${result.dbPath}`);
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    logger.error({ error }, 'Invalid arguments');
    process.stderr.write(`${USAGE}\n`);
    process.exit(1);
  }

  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  logger.info({ env: config.app.env, version: config.app.version }, 'Starting space missions loader');
  await run(options);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Space missions loader failed');
  process.exit(1);
});
