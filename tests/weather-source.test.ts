import axios from 'axios';
import { NasaPowerWeatherSource, parsePowerResponse } from '../src/data-ingestion/weather-source';
import { ValidationError } from '../src/shared/utils/errors';
import { axiosResponse, testLogger } from './helpers/fixtures';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

const API_URL = 'https://power.test/api/temporal/daily/point';
const LOCATION = { latitude: 30.905, longitude: 75.805 };
const NOW = new Date('2026-04-15T09:00:00.000Z');

function powerBody(overrides: Record<string, Record<string, number>> = {}) {
  return {
    type: 'Feature',
    properties: {
      parameter: {
        T2M: { '20260410': 20, '20260411': 22, '20260412': -999 },
        PRECTOTCORR: { '20260410': 1.5, '20260411': 0, '20260412': 4.5 },
        RH2M: { '20260410': 60, '20260411': 70, '20260412': 80 },
        WS2M: { '20260410': 2, '20260411': 4, '20260412': -999 },
        ...overrides,
      },
    },
  };
}

describe('parsePowerResponse', () => {
  it('aggregates daily values and drops the fill value', () => {
    expect(parsePowerResponse(powerBody())).toEqual({
      tempMean: 21,
      rainfallTotal: 6,
      humidityMean: 70,
      windSpeedMean: 3,
    });
  });

  it('rejects a response without a parameter block', () => {
    expect(() => parsePowerResponse({ messages: ['quota exceeded'] })).toThrow('NASA POWER response has no parameter block');
  });

  it('rejects a parameter with only fill values', () => {
    expect(() => parsePowerResponse(powerBody({ T2M: { '20260410': -999 } })))
      .toThrow('NASA POWER returned no usable T2M values');
  });
});

describe('NasaPowerWeatherSource', () => {
  beforeEach(() => {
    mockedAxios.get.mockReset();
  });

  it('requests the trailing window for the field centroid', async () => {
    mockedAxios.get.mockResolvedValueOnce(axiosResponse(powerBody()));
    const source = new NasaPowerWeatherSource({ apiUrl: API_URL, timeoutMs: 5000, maxRetries: 1 }, testLogger());

    await expect(source.fetch(LOCATION, 7, NOW)).resolves.toEqual({
      tempMean: 21,
      rainfallTotal: 6,
      humidityMean: 70,
      windSpeedMean: 3,
    });
    expect(mockedAxios.get).toHaveBeenCalledWith(API_URL, {
      params: {
        parameters: 'T2M,PRECTOTCORR,RH2M,WS2M',
        community: 'AG',
        longitude: 75.805,
        latitude: 30.905,
        start: '20260408',
        end: '20260415',
        format: 'JSON',
      },
      timeout: 5000,
      headers: { Accept: 'application/json' },
    });
  });

  it('hands the abort signal to axios', async () => {
    mockedAxios.get.mockResolvedValueOnce(axiosResponse(powerBody()));
    const source = new NasaPowerWeatherSource({ apiUrl: API_URL, timeoutMs: 5000, maxRetries: 1 }, testLogger());
    const controller = new AbortController();

    await source.fetch(LOCATION, 7, NOW, controller.signal);

    expect(mockedAxios.get).toHaveBeenCalledWith(API_URL, expect.objectContaining({ signal: controller.signal }));
  });

  it('rejects invalid coordinates without calling the API', async () => {
    const source = new NasaPowerWeatherSource({ apiUrl: API_URL, timeoutMs: 5000, maxRetries: 1 }, testLogger());

    await expect(source.fetch({ latitude: 95, longitude: 75 }, 7, NOW)).rejects.toThrow(ValidationError);
    expect(mockedAxios.get).not.toHaveBeenCalled();
  });

  it('retries a failed request', async () => {
    mockedAxios.get
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(axiosResponse(powerBody()));
    const source = new NasaPowerWeatherSource({ apiUrl: API_URL, timeoutMs: 5000, maxRetries: 2 }, testLogger());

    await expect(source.fetch(LOCATION, 7, NOW)).resolves.toMatchObject({ tempMean: 21 });
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    mockedAxios.get.mockRejectedValue(new Error('Network Error'));
    const source = new NasaPowerWeatherSource({ apiUrl: API_URL, timeoutMs: 5000, maxRetries: 1 }, testLogger());

    await expect(source.fetch(LOCATION, 7, NOW)).rejects.toThrow('NASA POWER failed after 1 attempt(s): Network Error');
  });
});
