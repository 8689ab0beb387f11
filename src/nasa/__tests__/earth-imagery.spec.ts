import { describe, it, expect, afterEach, vi } from 'vitest';
import { fetchEarthImagery, IMAGERY_LOCATIONS } from '../earth-imagery.js';
import { nasaHandler, stubFetch } from '../../__tests__/fixtures.js';

const REQUEST = { apiKey: 'test-key', baseUrl: 'https://api.nasa.gov', timeoutMs: 1000 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('fetchEarthImagery', () => {
  it('probes every location with HEAD and stores the URL without the key', async () => {
    const fetchMock = stubFetch(nasaHandler());

    const outcome = await fetchEarthImagery(REQUEST);

    expect(outcome.records.map((entry) => entry.location)).toEqual(
      IMAGERY_LOCATIONS.map((location) => location.name)
    );
    expect(outcome.records[0]).toEqual({
      location: 'New York City',
      latitude: 40.7128,
      longitude: -74.006,
      url: 'https://api.nasa.gov/planetary/earth/imagery?lon=-74.006&lat=40.7128&dim=0.15',
      source: 'Earth Imagery',
    });

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('HEAD');
    expect(new URL(String(fetchMock.mock.calls[0]?.[0])).searchParams.get('api_key')).toBe('test-key');
  });

  it('leaves out locations without imagery', async () => {
    stubFetch(
      nasaHandler({
        '/planetary/earth/imagery': (url) =>
          new Response(null, { status: url.searchParams.get('lat') === '35.6895' ? 404 : 200 }),
      })
    );

    const outcome = await fetchEarthImagery(REQUEST);

    expect(outcome.error).toBeUndefined();
    expect(outcome.records.map((entry) => entry.location)).toEqual(['New York City', 'London', 'Sydney']);
  });

  it('fails the dataset on network errors', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    const outcome = await fetchEarthImagery({
      ...REQUEST,
      locations: [{ name: 'Nowhere', lat: 0, lon: 0 }],
    });

    expect(outcome.records).toEqual([]);
    expect(outcome.error).toBe(
      'Request to https://api.nasa.gov/planetary/earth/imagery?lon=0&lat=0&dim=0.15 failed: fetch failed'
    );
  });
});
