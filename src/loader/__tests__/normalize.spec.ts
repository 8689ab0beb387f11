import { describe, it, expect } from 'vitest';
import { parseCsv } from '../parse.js';
import { normalizeMissions, synthesizeMissionId, findMissingColumns } from '../normalize.js';
import { EXPECTED_COLUMNS } from '../../config/columns.js';
import { ValidationError } from '../../utils/errors.js';
import { buildCsv, sampleRecord } from '../../__tests__/fixtures.js';

function normalizeText(text: string) {
  return normalizeMissions(parseCsv(text));
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('column validation', () => {
  it('names exactly the missing columns, in mapping order', () => {
    const columns = EXPECTED_COLUMNS.filter((c) => c !== 'Crew Size' && c !== 'Launch Vehicle');
    const text = buildCsv([sampleRecord('M-1')], columns);

    const error = captureError(() => normalizeText(text));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      kind: 'validation',
      message: 'CSV missing expected columns: Crew Size, Launch Vehicle',
      details: { missingColumns: ['Crew Size', 'Launch Vehicle'] },
    });
  });

  it('does not match headers loosely', () => {
    expect(findMissingColumns([...EXPECTED_COLUMNS.slice(1), 'mission id'])).toEqual(['Mission ID']);
  });

  it('drops columns outside the mapping', () => {
    const columns = [...EXPECTED_COLUMNS, 'Notes'];
    const text = buildCsv([{ ...sampleRecord('M-1'), 'Mission Name': 'Ares' }], columns);

    const [mission] = normalizeText(text).missions;

    expect(Object.keys(mission ?? {})).toEqual([
      'mission_id',
      'mission_name',
      'launch_date',
      'launch_year',
      'target_type',
      'target_name',
      'mission_type',
      'distance_ly',
      'duration_years',
      'cost_billion_usd',
      'scientific_yield',
      'crew_size',
      'success_pct',
      'fuel_consumption_tons',
      'payload_weight_tons',
      'launch_vehicle',
    ]);
  });
});

describe('coercion', () => {
  it('maps a well-formed row onto the mission columns', () => {
    const { missions } = normalizeText(buildCsv([sampleRecord('M-7')]));

    expect(missions).toEqual([
      {
        mission_id: 'M-7',
        mission_name: 'Mission M-7',
        launch_date: '2031-05-14',
        launch_year: 2031,
        target_type: 'Planet',
        target_name: 'Mars',
        mission_type: 'Exploration',
        distance_ly: 0.5,
        duration_years: 3,
        cost_billion_usd: 12.5,
        scientific_yield: 80,
        crew_size: 4,
        success_pct: 95,
        fuel_consumption_tons: 1200,
        payload_weight_tons: 45.2,
        launch_vehicle: 'Falcon Heavy',
      },
    ]);
  });

  it('turns unparseable numbers into null without throwing', () => {
    const text = buildCsv([
      sampleRecord('M-1', {
        'Distance from Earth (light-years)': 'far',
        'Mission Cost (billion USD)': '',
        'Crew Size': '12abc',
        'Fuel Consumption (tons)': '0x10',
        'Mission Success (%)': '87.5',
      }),
    ]);

    const result = normalizeText(text);
    const mission = result.missions[0];

    expect(mission?.distance_ly).toBeNull();
    expect(mission?.cost_billion_usd).toBeNull();
    expect(mission?.crew_size).toBeNull();
    expect(mission?.fuel_consumption_tons).toBeNull();
    expect(mission?.success_pct).toBe(87.5);
    expect(result.coercionFailures).toEqual({
      distance_ly: 1,
      crew_size: 1,
      fuel_consumption_tons: 1,
    });
  });

  it('accepts signed and scientific notation', () => {
    const text = buildCsv([
      sampleRecord('M-1', { 'Scientific Yield (points)': '-3', 'Payload Weight (tons)': '1.5e2' }),
    ]);

    const [mission] = normalizeText(text).missions;

    expect(mission?.scientific_yield).toBe(-3);
    expect(mission?.payload_weight_tons).toBe(150);
  });

  it('derives the launch year from the launch date', () => {
    const text = buildCsv([
      sampleRecord('M-1', { 'Launch Date': '2031-05-14' }),
      sampleRecord('M-2', { 'Launch Date': 'someday' }),
      sampleRecord('M-3', { 'Launch Date': '2031-02-30' }),
      sampleRecord('M-4', { 'Launch Date': '' }),
      sampleRecord('M-5', { 'Launch Date': '2031' }),
      sampleRecord('M-6', { 'Launch Date': 'TBD 2031' }),
    ]);

    const missions = normalizeText(text).missions;

    expect(missions.map((m) => [m.launch_date, m.launch_year])).toEqual([
      ['2031-05-14', 2031],
      [null, null],
      [null, null],
      [null, null],
      ['2031-01-01', 2031],
      [null, null],
    ]);
  });

  it('strips whitespace from text fields and keeps blanks null', () => {
    const text = buildCsv([
      sampleRecord('M-1', { 'Mission Name': '  Voyager X  ', 'Target Name': '   ', 'Launch Vehicle': '' }),
    ]);

    const [mission] = normalizeText(text).missions;

    expect(mission?.mission_name).toBe('Voyager X');
    expect(mission?.target_name).toBeNull();
    expect(mission?.launch_vehicle).toBeNull();
  });
});

describe('identifiers', () => {
  it('formats synthesized identifiers with four digits', () => {
    expect(synthesizeMissionId(1)).toBe('MSN-0001');
    expect(synthesizeMissionId(42)).toBe('MSN-0042');
    expect(synthesizeMissionId(12345)).toBe('MSN-12345');
  });

  it('fills empty identifiers from the 1-based row position', () => {
    const records = Array.from({ length: 42 }, (_, i) => sampleRecord(`REAL-${i + 1}`));
    records[0] = sampleRecord('');
    records[41] = sampleRecord('   ');

    const result = normalizeText(buildCsv(records));

    expect(result.missions).toHaveLength(42);
    expect(result.missions[0]?.mission_id).toBe('MSN-0001');
    expect(result.missions[1]?.mission_id).toBe('REAL-2');
    expect(result.missions[41]?.mission_id).toBe('MSN-0042');
    expect(result.synthesizedIds).toBe(2);
  });

  it('rejects a synthesized identifier that collides with a real one', () => {
    const text = buildCsv([sampleRecord('MSN-0002'), sampleRecord('')]);

    const error = captureError(() => normalizeText(text));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Duplicate mission identifiers: MSN-0002',
      details: { duplicateIds: ['MSN-0002'] },
    });
  });

  it('rejects repeated real identifiers', () => {
    const text = buildCsv([sampleRecord('M-1'), sampleRecord('M-2'), sampleRecord('M-1')]);

    expect(() => normalizeText(text)).toThrow('Duplicate mission identifiers: M-1');
  });
});

describe('row count', () => {
  it('keeps one mission per data row', () => {
    const records = Array.from({ length: 5 }, (_, i) => sampleRecord(`M-${i + 1}`));

    const result = normalizeText(buildCsv(records));

    expect(result.missions.map((m) => m.mission_id)).toEqual(['M-1', 'M-2', 'M-3', 'M-4', 'M-5']);
  });

  it('returns no missions for a header-only file', () => {
    expect(normalizeText(buildCsv([])).missions).toEqual([]);
  });
});
