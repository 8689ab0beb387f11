/**
 * Mission CSV parsing (Papa Parse)
 */

import Papa from 'papaparse';
import { ReadError } from '../utils/errors.js';

export type CsvRow = Record<string, string | undefined>;

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

function cleanHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

/**
 * Parse CSV text with a header row.
 *
 * Unbalanced quotes and rows longer than the header are read errors; short
 * rows are kept and their missing cells come back undefined.
 */
export function parseCsv(text: string): ParsedCsv {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: cleanHeader,
  });

  const fatal = result.errors.find(
    (error) => error.type !== 'FieldMismatch' || error.code === 'TooManyFields'
  );
  if (fatal) {
    const where = fatal.row === undefined ? '' : ` at row ${fatal.row + 1}`;
    throw new ReadError(`Malformed CSV${where}: ${fatal.message}`, {
      details: { code: fatal.code, row: fatal.row },
    });
  }

  return {
    headers: result.meta.fields ?? [],
    rows: result.data,
  };
}
