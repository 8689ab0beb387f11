/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import { EXPECTED_COLUMNS, type CsvColumn } from '../config/columns.js';
import type { NormalizedMission } from '../loader/schemas.js';

export type CsvRecord = Partial<Record<CsvColumn, string>>;

export function sampleRecord(id: string, overrides: CsvRecord = {}): CsvRecord {
  return {
    'Mission ID': id,
    'Mission Name': `Mission ${id}`,
    'Launch Date': '2031-05-14',
    'Target Type': 'Planet',
    'Target Name': 'Mars',
    'Mission Type': 'Exploration',
    'Distance from Earth (light-years)': '0.5',
    'Mission Duration (years)': '3',
    'Mission Cost (billion USD)': '12.5',
    'Scientific Yield (points)': '80',
    'Crew Size': '4',
    'Mission Success (%)': '95',
    'Fuel Consumption (tons)': '1200',
    'Payload Weight (tons)': '45.2',
    'Launch Vehicle': 'Falcon Heavy',
    ...overrides,
  };
}

/**
 * CSV text with the given header order; absent cells are written empty
 */
export function buildCsv(
  records: CsvRecord[],
  columns: readonly string[] = EXPECTED_COLUMNS
): string {
  const header = columns.join(',');
  const lines = records.map((record) => {
    const cells = new Map(Object.entries(record));
    return columns.map((column) => cells.get(column) ?? '').join(',');
  });
  return [header, ...lines].join('\n') + '\n';
}

export function makeMission(
  id: string,
  overrides: Partial<NormalizedMission> = {}
): NormalizedMission {
  return {
    mission_id: id,
    mission_name: `Mission ${id}`,
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
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type FetchHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Replace global fetch with a handler receiving parsed URLs
 */
export function stubFetch(handler: FetchHandler) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(new URL(input instanceof Request ? input.url : String(input)), init)
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

/**
 * Canned NASA responses keyed by endpoint path
 */
export function nasaHandler(overrides: Partial<Record<string, FetchHandler>> = {}): FetchHandler {
  return (url, init) => {
    const override = overrides[url.pathname];
    if (override) {
      return override(url, init);
    }

    switch (url.pathname) {
      case '/planetary/apod': {
        const date = url.searchParams.get('date') ?? '';
        return jsonResponse({
          date,
          title: `Picture ${date}`,
          explanation: 'A nebula.',
          url: `https://apod.example/${date}.jpg`,
          media_type: 'image',
        });
      }
      case '/neo/rest/v1/feed':
        return jsonResponse({
          near_earth_objects: {
            '2031-05-14': [
              {
                name: '(2031 AB)',
                estimated_diameter: { kilometers: { estimated_diameter_max: 0.42 } },
                is_potentially_hazardous_asteroid: true,
                close_approach_data: [{ relative_velocity: { kilometers_per_second: '18.25' } }],
              },
              {
                name: '(2031 CD)',
                estimated_diameter: { kilometers: { estimated_diameter_max: 0.05 } },
                is_potentially_hazardous_asteroid: false,
                close_approach_data: [{ relative_velocity: { kilometers_per_second: '7.5' } }],
              },
            ],
          },
        });
      case '/TAP/sync':
        return jsonResponse([
          { pl_name: 'Test-1 b', sy_pnum: 2, pl_rade: 1.1, pl_bmasse: 3.2, sy_dist: 12.4, disc_year: 2030 },
        ]);
      case '/planetary/earth/imagery':
        return new Response(null, { status: 200 });
      default:
        return new Response('not found', { status: 404 });
    }
  };
}
