/**
 * Field and metric sample models
 */

import type { Polygon } from 'geojson';
import { Coordinates, HealthCategory } from './core';

export interface Field {
  fieldId: string;
  userId: string;
  name: string;
  boundary?: Polygon;
  centroid?: Coordinates;
  areaHa?: number;
  region?: string;
  district?: string;
  cropType?: string;
  cropStage?: string;
  season?: string;
  // Snapshot of the latest analysis run
  soilMoisture?: number;
  temperature?: number;
  healthStatus?: HealthCategory;
  createdAt: string;
  updatedAt: string;
}

export interface FieldSnapshot {
  soilMoisture: number;
  temperature: number;
  healthStatus: HealthCategory;
}

/**
 * One persisted observation per field and calendar day.
 * `date` is YYYY-MM-DD (UTC) and is the ordering key.
 */
export interface MetricSample {
  sampleId: string;
  fieldId: string;
  date: string;
  ndviMean: number;
  ndviMin: number;
  ndviMax: number;
  eviMean: number;
  tempMean: number;
  rainfallTotal: number;
  humidityMean: number;
  windSpeedMean: number;
  cloudCoverage: number;
  validPixels: number;
  soilMoistureEst: number;
  dataSource: string;
  createdAt: string;
}

export interface CreateFieldInput {
  userId: string;
  name: string;
  boundary: Polygon;
  region?: string;
  district?: string;
  cropType?: string;
  cropStage?: string;
  season?: string;
}

export type UpdateFieldInput = Partial<Omit<CreateFieldInput, 'userId'>>;
