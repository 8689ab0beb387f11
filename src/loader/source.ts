/**
 * CSV source resolution and reading
 */

import crypto from 'crypto';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { NotFoundError, ReadError, errorMessage } from '../utils/errors.js';

export type CsvSourceKind = 'file' | 'url';
export type CsvSourceOrigin = 'explicit' | 'default_path' | 'default_url';

export interface CsvSource {
  location: string;
  kind: CsvSourceKind;
  origin: CsvSourceOrigin;
}

export interface CsvSourceDefaults {
  csvPath?: string;
  csvUrl?: string;
}

export interface CsvContent {
  source: CsvSource;
  text: string;
  /** SHA-256 of the text, hex encoded */
  hash: string;
}

export function isUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/**
 * Pick the CSV location: explicit argument, then the configured local
 * path (when it exists), then the configured URL.
 */
export function resolveCsvSource(
  explicit?: string,
  defaults: CsvSourceDefaults = { csvPath: config.source.csvPath, csvUrl: config.source.csvUrl }
): CsvSource {
  if (explicit) {
    if (isUrl(explicit)) {
      return { location: explicit, kind: 'url', origin: 'explicit' };
    }
    if (!existsSync(explicit)) {
      throw new NotFoundError(`CSV file not found at: ${explicit}`, {
        details: { location: explicit },
      });
    }
    return { location: explicit, kind: 'file', origin: 'explicit' };
  }

  if (defaults.csvPath && existsSync(defaults.csvPath)) {
    return { location: defaults.csvPath, kind: 'file', origin: 'default_path' };
  }

  if (defaults.csvUrl) {
    logger.info(
      { path: defaults.csvPath, url: defaults.csvUrl },
      'Local CSV not found, falling back to default URL'
    );
    return { location: defaults.csvUrl, kind: 'url', origin: 'default_url' };
  }

  throw new NotFoundError('No CSV source available: default path is missing and no URL is configured', {
    details: { csvPath: defaults.csvPath },
  });
}

export function hashCsvText(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

async function downloadCsv(url: string, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'text/csv, text/plain, */*' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new ReadError(`Failed to download CSV from ${url}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new ReadError(`Failed to download CSV from ${url}: HTTP ${response.status}`, {
      details: { status: response.status },
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new ReadError(`Failed to read CSV body from ${url}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Read the whole CSV as UTF-8 text
 */
export async function readCsvSource(
  source: CsvSource,
  options: { timeoutMs?: number } = {}
): Promise<CsvContent> {
  const { timeoutMs = config.nasa.timeoutMs } = options;

  let text: string;
  if (source.kind === 'url') {
    logger.info({ url: source.location }, 'Reading CSV from URL');
    text = await downloadCsv(source.location, timeoutMs);
  } else {
    logger.info({ path: source.location, origin: source.origin }, 'Reading local CSV');
    try {
      text = await readFile(source.location, 'utf-8');
    } catch (error) {
      throw new ReadError(`Failed to read CSV at ${source.location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  return { source, text, hash: hashCsvText(text) };
}
