import axios from 'axios';
import { SentinelHubClient, combineStatistics, parseStatisticsResponse } from '../src/data-ingestion/sentinel-hub-client';
import { SentinelVegetationIndexSource } from '../src/data-ingestion/vegetation-index-source';
import { SentinelSoilMoistureSource } from '../src/data-ingestion/soil-moisture-source';
import { BoundingBox } from '../src/types/core';
import { axiosResponse, testLogger } from './helpers/fixtures';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

const BASE_URL = 'https://sentinel.test';
const BBOX: BoundingBox = [75.8, 30.9, 75.81, 30.91];
const WINDOW = { from: new Date('2026-04-08T00:00:00.000Z'), to: new Date('2026-04-15T00:00:00.000Z') };

interface Stats {
  min: number;
  max: number;
  mean: number;
  sampleCount: number;
  noDataCount: number;
}

function statisticsBody(intervals: Stats[]) {
  return {
    data: intervals.map(stats => ({
      interval: { from: WINDOW.from.toISOString(), to: WINDOW.to.toISOString() },
      outputs: { default: { bands: { B0: { stats } } } },
    })),
    status: 'OK',
  };
}

const TOKEN_BODY = { access_token: 'test-token', expires_in: 3600, token_type: 'Bearer' };

function createClient(clock: () => number = () => 1_000_000) {
  return new SentinelHubClient(
    { baseUrl: BASE_URL, clientId: 'test-client', clientSecret: 'test-secret', timeoutMs: 5000, maxRetries: 1 },
    testLogger(),
    clock
  );
}

describe('parseStatisticsResponse', () => {
  it('rejects intervals without band statistics', () => {
    expect(() => parseStatisticsResponse({ data: [{ outputs: {} }] }))
      .toThrow('Statistical API interval 0 has no usable band statistics');
    expect(() => parseStatisticsResponse({ error: 'bad request' }))
      .toThrow('Statistical API response has no data array');
  });
});

describe('combineStatistics', () => {
  it('weights interval means by their valid samples', () => {
    const combined = combineStatistics([
      { min: 0.2, max: 0.8, mean: 0.5, sampleCount: 100, noDataCount: 20 },
      { min: 0.3, max: 0.9, mean: 0.7, sampleCount: 100, noDataCount: 60 },
    ]);

    expect(combined.mean).toBeCloseTo(68 / 120, 12);
    expect(combined).toMatchObject({ min: 0.2, max: 0.9, sampleCount: 200, noDataCount: 80 });
  });
});

describe('SentinelHubClient', () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it('caches the access token until shortly before it expires', async () => {
    let now = 1_000_000;
    const client = createClient(() => now);
    mockedAxios.post
      .mockResolvedValueOnce(axiosResponse(TOKEN_BODY))
      .mockResolvedValueOnce(axiosResponse({ ...TOKEN_BODY, access_token: 'test-token-2' }));

    await expect(client.getAccessToken()).resolves.toBe('test-token');
    now += 3_000_000;
    await expect(client.getAccessToken()).resolves.toBe('test-token');
    now += 600_000;
    await expect(client.getAccessToken()).resolves.toBe('test-token-2');

    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
    expect(mockedAxios.post).toHaveBeenNthCalledWith(
      1,
      `${BASE_URL}/oauth/token`,
      'grant_type=client_credentials&client_id=test-client&client_secret=test-secret',
      { timeout: 5000, headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
    );
  });

  it('refuses to authenticate without credentials', async () => {
    const client = new SentinelHubClient({ baseUrl: BASE_URL, timeoutMs: 5000, maxRetries: 1 }, testLogger());

    expect(client.isConfigured).toBe(false);
    await expect(client.getAccessToken()).rejects.toThrow('Sentinel Hub credentials not configured');
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });
});

describe('SentinelVegetationIndexSource', () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it('reduces NDVI statistics to a reading', async () => {
    mockedAxios.post
      .mockResolvedValueOnce(axiosResponse(TOKEN_BODY))
      .mockResolvedValueOnce(axiosResponse(statisticsBody([
        { min: 0.2, max: 0.8, mean: 0.5, sampleCount: 100, noDataCount: 20 },
        { min: 0.3, max: 0.9, mean: 0.7, sampleCount: 100, noDataCount: 60 },
      ])));
    const source = new SentinelVegetationIndexSource(createClient());

    const reading = await source.fetch(BBOX, WINDOW);

    expect(reading.ndviMean).toBeCloseTo(68 / 120, 12);
    expect(reading).toMatchObject({ ndviMin: 0.2, ndviMax: 0.9, cloudCoverage: 0.4, validPixels: 120 });

    const [url, payload, config] = mockedAxios.post.mock.calls[1];
    expect(url).toBe(`${BASE_URL}/api/v1/statistics`);
    expect(payload).toMatchObject({
      input: {
        bounds: { bbox: BBOX },
        data: [{ type: 'sentinel-2-l1c', dataFilter: { mosaickingOrder: 'leastCC' } }],
      },
      aggregation: {
        timeRange: { from: '2026-04-08T00:00:00.000Z', to: '2026-04-15T00:00:00.000Z' },
        aggregationInterval: { of: 'P7D', lastIntervalBehavior: 'SHORTEN' },
      },
    });
    expect(config).toMatchObject({ headers: { Authorization: 'Bearer test-token' } });
  });

  it('treats a fully clouded window as a failure', async () => {
    mockedAxios.post
      .mockResolvedValueOnce(axiosResponse(TOKEN_BODY))
      .mockResolvedValueOnce(axiosResponse(statisticsBody([
        { min: 0, max: 0, mean: 0, sampleCount: 100, noDataCount: 100 },
      ])));
    const source = new SentinelVegetationIndexSource(createClient());

    await expect(source.fetch(BBOX, WINDOW)).rejects.toThrow('No cloud-free pixels in the acquisition window');
  });
});

describe('SentinelSoilMoistureSource', () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it('returns the mean backscatter ratio from Sentinel-1', async () => {
    mockedAxios.post
      .mockResolvedValueOnce(axiosResponse(TOKEN_BODY))
      .mockResolvedValueOnce(axiosResponse(statisticsBody([
        { min: 0.1, max: 0.4, mean: 0.25, sampleCount: 50, noDataCount: 0 },
      ])));
    const source = new SentinelSoilMoistureSource(createClient());

    await expect(source.fetch(BBOX, WINDOW)).resolves.toBe(0.25);
    expect(mockedAxios.post.mock.calls[1][1]).toMatchObject({ input: { data: [{ type: 'sentinel-1-grd' }] } });
  });
});
