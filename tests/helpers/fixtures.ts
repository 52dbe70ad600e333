/**
 * Shared test fixtures: geometry, samples, bundles and in-process sources
 */

import { AxiosHeaders, AxiosResponse } from 'axios';
import type { Polygon } from 'geojson';
import { BoundingBox, Coordinates, TimeWindow } from '../../src/types/core';
import {
  MetricsBundle,
  SoilMoistureSource,
  VegetationIndexReading,
  VegetationIndexSource,
  WeatherAggregates,
  WeatherSource,
} from '../../src/types/external-data';
import { MetricSample } from '../../src/types/field';
import { Logger, MemorySink } from '../../src/shared/utils/logger';

export const UNIT_SQUARE: Polygon = {
  type: 'Polygon',
  coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]],
};

export const LUDHIANA_PLOT: Polygon = {
  type: 'Polygon',
  coordinates: [[
    [75.80, 30.90],
    [75.81, 30.90],
    [75.81, 30.91],
    [75.80, 30.91],
    [75.80, 30.90],
  ]],
};

export function testLogger(): Logger {
  return new Logger({ test: true }, { sink: new MemorySink() });
}

export function axiosResponse<T>(data: T, status: number = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function makeSample(fieldId: string, date: string, overrides: Partial<MetricSample> = {}): MetricSample {
  return {
    sampleId: `sample-${fieldId}-${date}`,
    fieldId,
    date,
    ndviMean: 0.6,
    ndviMin: 0.5,
    ndviMax: 0.7,
    eviMean: 0,
    tempMean: 24,
    rainfallTotal: 3,
    humidityMean: 55,
    windSpeedMean: 2.5,
    cloudCoverage: 0.1,
    validPixels: 900,
    soilMoistureEst: 0.4,
    dataSource: 'Sentinel/NASA',
    createdAt: `${date}T06:00:00.000Z`,
    ...overrides,
  };
}

export function makeBundle(overrides: Partial<MetricsBundle> = {}): MetricsBundle {
  return {
    ndviMean: 0.6,
    ndviMin: 0.5,
    ndviMax: 0.7,
    cloudCoverage: 0.1,
    validPixels: 900,
    tempMean: 24,
    rainfallTotal: 3,
    humidityMean: 55,
    windSpeedMean: 2.5,
    soilMoistureEst: 0.4,
    eviMean: 0,
    sources: {
      vegetation: { source: 'fake-vegetation', degraded: false },
      soilMoisture: { source: 'fake-soil', degraded: false },
      weather: { source: 'fake-weather', degraded: false },
    },
    ...overrides,
  };
}

type Behaviour<T> = T | Error | 'hang';

async function respond<T>(behaviour: Behaviour<T>): Promise<T> {
  if (behaviour === 'hang') {
    return new Promise<T>(() => undefined);
  }
  if (behaviour instanceof Error) {
    throw behaviour;
  }
  return behaviour;
}

export class FakeVegetationSource implements VegetationIndexSource {
  readonly name = 'fake-vegetation';
  readonly requests: Array<{ bbox: BoundingBox; window: TimeWindow }> = [];

  constructor(public behaviour: Behaviour<VegetationIndexReading>) {}

  async fetch(bbox: BoundingBox, window: TimeWindow): Promise<VegetationIndexReading> {
    this.requests.push({ bbox, window });
    return respond(this.behaviour);
  }
}

export class FakeSoilMoistureSource implements SoilMoistureSource {
  readonly name = 'fake-soil';
  readonly requests: Array<{ bbox: BoundingBox; window: TimeWindow }> = [];

  constructor(public behaviour: Behaviour<number>) {}

  async fetch(bbox: BoundingBox, window: TimeWindow): Promise<number> {
    this.requests.push({ bbox, window });
    return respond(this.behaviour);
  }
}

export class FakeWeatherSource implements WeatherSource {
  readonly name = 'fake-weather';
  readonly requests: Array<{ location: Coordinates; days: number; now: Date }> = [];

  constructor(public behaviour: Behaviour<WeatherAggregates>) {}

  async fetch(location: Coordinates, days: number, now: Date): Promise<WeatherAggregates> {
    this.requests.push({ location, days, now });
    return respond(this.behaviour);
  }
}
