/**
 * Row schemas for the mission CSV (after header mapping)
 *
 * Every field transform is total: values that cannot be coerced become null.
 */

import { z } from 'zod';
import { parseCalendarDate } from '../utils/dates.js';

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// Papa yields strings, or undefined for cells missing from a short row
const cell = z.string().nullish();

export function parseDecimal(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const s = value.trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function cleanText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const s = value.trim();
  return s === '' ? null : s;
}

const toOptStr = cell.transform(cleanText);
const toOptNum = cell.transform(parseDecimal);
const toDate = cell.transform(parseCalendarDate);

export const MissionCsvSchema = z.object({
  mission_id: toOptStr,
  mission_name: toOptStr,
  launch_date: toDate,
  target_type: toOptStr,
  target_name: toOptStr,
  mission_type: toOptStr,
  distance_ly: toOptNum,
  duration_years: toOptNum,
  cost_billion_usd: toOptNum,
  scientific_yield: toOptNum,
  crew_size: toOptNum,
  success_pct: toOptNum,
  fuel_consumption_tons: toOptNum,
  payload_weight_tons: toOptNum,
  launch_vehicle: toOptStr,
});

export type MissionCsv = z.infer<typeof MissionCsvSchema>;

/**
 * A mission row ready for the `missions` table
 */
export type NormalizedMission = Omit<MissionCsv, 'mission_id'> & {
  mission_id: string;
  launch_year: number | null;
};
