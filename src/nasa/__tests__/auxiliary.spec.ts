import { describe, it, expect, afterEach, vi } from 'vitest';
import { fetchAuxiliaryData } from '../index.js';
import { nasaHandler, stubFetch } from '../../__tests__/fixtures.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('fetchAuxiliaryData', () => {
  it('keeps the other datasets when one fetch fails', async () => {
    stubFetch(
      nasaHandler({ '/neo/rest/v1/feed': () => new Response('rate limited', { status: 429 }) })
    );

    const data = await fetchAuxiliaryData({
      apiKey: 'test-key',
      baseUrl: 'https://api.nasa.gov',
      exoplanetArchiveUrl: 'https://archive.example/TAP/sync',
      referenceDate: new Date(2031, 4, 14),
      apodDays: 2,
      neoDaysAhead: 3,
    });

    expect(data.apod.records).toHaveLength(2);
    expect(data.neo.records).toEqual([]);
    expect(data.neo.error).toBe(
      'HTTP 429 from https://api.nasa.gov/neo/rest/v1/feed?start_date=2031-05-14&end_date=2031-05-17&detailed=false'
    );
    expect(data.exoplanet.records).toHaveLength(1);
    expect(data.earthImagery.records).toHaveLength(4);
  });

  it('calls the endpoints in a fixed order', async () => {
    const fetchMock = stubFetch(nasaHandler());

    await fetchAuxiliaryData({
      apiKey: 'test-key',
      baseUrl: 'https://api.nasa.gov',
      exoplanetArchiveUrl: 'https://archive.example/TAP/sync',
      referenceDate: new Date(2031, 4, 14),
      apodDays: 1,
    });

    const paths = fetchMock.mock.calls.map((call) => new URL(String(call[0])).pathname);
    expect(paths).toEqual([
      '/planetary/apod',
      '/neo/rest/v1/feed',
      '/TAP/sync',
      '/planetary/earth/imagery',
      '/planetary/earth/imagery',
      '/planetary/earth/imagery',
      '/planetary/earth/imagery',
    ]);
  });
});
