/**
 * Mission CSV column configuration
 */

/**
 * Human-readable CSV header → mission table column.
 * Order matters: missing-column errors are reported in this order.
 */
export const COLUMN_MAP = [
  { header: 'Mission ID', column: 'mission_id' },
  { header: 'Mission Name', column: 'mission_name' },
  { header: 'Launch Date', column: 'launch_date' },
  { header: 'Target Type', column: 'target_type' },
  { header: 'Target Name', column: 'target_name' },
  { header: 'Mission Type', column: 'mission_type' },
  { header: 'Distance from Earth (light-years)', column: 'distance_ly' },
  { header: 'Mission Duration (years)', column: 'duration_years' },
  { header: 'Mission Cost (billion USD)', column: 'cost_billion_usd' },
  { header: 'Scientific Yield (points)', column: 'scientific_yield' },
  { header: 'Crew Size', column: 'crew_size' },
  { header: 'Mission Success (%)', column: 'success_pct' },
  { header: 'Fuel Consumption (tons)', column: 'fuel_consumption_tons' },
  { header: 'Payload Weight (tons)', column: 'payload_weight_tons' },
  { header: 'Launch Vehicle', column: 'launch_vehicle' },
] as const;

export type CsvColumn = (typeof COLUMN_MAP)[number]['header'];
export type MappedColumn = (typeof COLUMN_MAP)[number]['column'];

export const EXPECTED_COLUMNS: readonly CsvColumn[] = COLUMN_MAP.map((entry) => entry.header);

export const NUMERIC_FIELDS = [
  'distance_ly',
  'duration_years',
  'cost_billion_usd',
  'scientific_yield',
  'crew_size',
  'success_pct',
  'fuel_consumption_tons',
  'payload_weight_tons',
] as const satisfies readonly MappedColumn[];

export type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Prefix and width of identifiers synthesized for rows without one */
export const SYNTHETIC_ID_PREFIX = 'MSN-';
export const SYNTHETIC_ID_WIDTH = 4;
