/**
 * NASA POWER weather source
 * Daily point aggregates: mean temperature, total rainfall, mean humidity and mean wind speed
 */

import axios from 'axios';
import { Coordinates } from '../types/core';
import { WeatherAggregates, WeatherSource } from '../types/external-data';
import { Logger } from '../shared/utils/logger';
import { Validator } from '../shared/utils/validation';
import { daysBefore, toCompactDate } from '../shared/utils/dates';
import { callWithRetry, isRecord } from './http-retry';

export interface NasaPowerConfig {
  apiUrl: string;
  timeoutMs: number;
  maxRetries: number;
}

const PARAMETERS = ['T2M', 'PRECTOTCORR', 'RH2M', 'WS2M'] as const;
type PowerParameter = typeof PARAMETERS[number];

// POWER marks days without data with this value
const FILL_VALUE = -999;

function dailyValues(parameters: Record<string, unknown>, name: PowerParameter): number[] {
  const series = parameters[name];
  if (!isRecord(series)) {
    throw new Error(`NASA POWER response is missing ${name}`);
  }
  const values = Object.values(series).filter(
    (value): value is number => typeof value === 'number' && Number.isFinite(value) && value !== FILL_VALUE
  );
  if (values.length === 0) {
    throw new Error(`NASA POWER returned no usable ${name} values`);
  }
  return values;
}

function sum(values: number[]) {
  return values.reduce((acc, value) => acc + value, 0);
}

function average(values: number[]) {
  return sum(values) / values.length;
}

/**
 * Reduce a POWER daily point response to weather aggregates
 */
export function parsePowerResponse(body: unknown): WeatherAggregates {
  const properties = isRecord(body) && isRecord(body.properties) ? body.properties : undefined;
  const parameters = properties && isRecord(properties.parameter) ? properties.parameter : undefined;
  if (!parameters) {
    throw new Error('NASA POWER response has no parameter block');
  }

  return {
    tempMean: average(dailyValues(parameters, 'T2M')),
    rainfallTotal: sum(dailyValues(parameters, 'PRECTOTCORR')),
    humidityMean: average(dailyValues(parameters, 'RH2M')),
    windSpeedMean: average(dailyValues(parameters, 'WS2M')),
  };
}

export class NasaPowerWeatherSource implements WeatherSource {
  readonly name = 'nasa-power-weather';

  constructor(private readonly config: NasaPowerConfig, private readonly logger: Logger) {}

  async fetch(location: Coordinates, days: number, now: Date, signal?: AbortSignal): Promise<WeatherAggregates> {
    Validator.throwIfInvalid(Validator.validateCoordinates(location));

    const params = {
      parameters: PARAMETERS.join(','),
      community: 'AG',
      longitude: location.longitude,
      latitude: location.latitude,
      start: toCompactDate(daysBefore(now, days)),
      end: toCompactDate(now),
      format: 'JSON',
    };

    const response = await callWithRetry(this.logger, 'NASA POWER', this.config.maxRetries, () =>
      axios.get<unknown>(this.config.apiUrl, {
        params,
        timeout: this.config.timeoutMs,
        headers: { Accept: 'application/json' },
        signal,
      }),
      signal
    );

    return parsePowerResponse(response.data);
  }
}
