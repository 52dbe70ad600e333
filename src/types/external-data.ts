/**
 * External data source types
 * Readings returned by the vegetation, soil-moisture and weather sources and the fused bundle
 */

import { BoundingBox, Coordinates, TimeWindow } from './core';

export interface VegetationIndexReading {
  ndviMean: number;
  ndviMin: number;
  ndviMax: number;
  cloudCoverage: number; // fraction of masked samples, 0-1
  validPixels: number;
}

export interface WeatherAggregates {
  tempMean: number; // °C
  rainfallTotal: number; // mm
  humidityMean: number; // %
  windSpeedMean: number; // m/s
}

export interface VegetationIndexSource {
  readonly name: string;
  fetch(bbox: BoundingBox, window: TimeWindow, signal?: AbortSignal): Promise<VegetationIndexReading>;
}

export interface SoilMoistureSource {
  readonly name: string;
  fetch(bbox: BoundingBox, window: TimeWindow, signal?: AbortSignal): Promise<number>;
}

export interface WeatherSource {
  readonly name: string;
  fetch(location: Coordinates, days: number, now: Date, signal?: AbortSignal): Promise<WeatherAggregates>;
}

/**
 * Result of a source call: either the live value or the documented default
 */
export type SourceOutcome<T> =
  | { status: 'ok'; source: string; value: T }
  | { status: 'degraded'; source: string; value: T; reason: string };

export interface SourceStatus {
  source: string;
  degraded: boolean;
  reason?: string;
}

export interface MetricsBundle extends VegetationIndexReading, WeatherAggregates {
  soilMoistureEst: number;
  eviMean: number;
  sources: {
    vegetation: SourceStatus;
    soilMoisture: SourceStatus;
    weather: SourceStatus;
  };
}
