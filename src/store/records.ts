/**
 * Mapping between DynamoDB items and domain records.
 * Items come back untyped from the DocumentClient; every attribute is checked here.
 */

import type { Polygon } from 'geojson';
import { AdvisoryLevel, Coordinates, HealthCategory, RuleLayer } from '../types/core';
import { FieldAdvisory } from '../types/advisory';
import { Field, MetricSample } from '../types/field';
import { Item } from '../shared/utils/dynamodb-helper';
import { toPolygon } from '../shared/utils/validation';
import { priorityForLevel } from '../advisory-engine/severity-policy';

class MalformedRecordError extends Error {
  constructor(attribute: string) {
    super(`Stored record has a missing or malformed attribute: ${attribute}`);
    this.name = 'MalformedRecordError';
  }
}

function readString(item: Item, key: string): string {
  const value: unknown = item[key];
  if (typeof value !== 'string') {
    throw new MalformedRecordError(key);
  }
  return value;
}

function readNumber(item: Item, key: string): number {
  const value: unknown = item[key];
  if (typeof value !== 'number') {
    throw new MalformedRecordError(key);
  }
  return value;
}

function optionalString(item: Item, key: string): string | undefined {
  return item[key] === undefined || item[key] === null ? undefined : readString(item, key);
}

function optionalNumber(item: Item, key: string): number | undefined {
  return item[key] === undefined || item[key] === null ? undefined : readNumber(item, key);
}

function isEnumValue<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(candidate => candidate === value);
}

const HEALTH_VALUES = Object.values(HealthCategory);
const LEVEL_VALUES = Object.values(AdvisoryLevel);
const LAYER_VALUES = Object.values(RuleLayer);

function readBoundary(item: Item): Polygon | undefined {
  const value: unknown = item.boundary;
  if (value === undefined || value === null) {
    return undefined;
  }
  const boundary = toPolygon(value);
  if (!boundary) {
    throw new MalformedRecordError('boundary');
  }
  return boundary;
}

function readCentroid(item: Item): Coordinates | undefined {
  const value: unknown = item.centroid;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (
    typeof value !== 'object' ||
    !('latitude' in value) || typeof value.latitude !== 'number' ||
    !('longitude' in value) || typeof value.longitude !== 'number'
  ) {
    throw new MalformedRecordError('centroid');
  }
  return { latitude: value.latitude, longitude: value.longitude };
}

export function fieldFromItem(item: Item): Field {
  const healthStatus: unknown = item.healthStatus;
  if (healthStatus !== undefined && healthStatus !== null && !isEnumValue(HEALTH_VALUES, healthStatus)) {
    throw new MalformedRecordError('healthStatus');
  }

  return {
    fieldId: readString(item, 'fieldId'),
    userId: readString(item, 'userId'),
    name: readString(item, 'name'),
    boundary: readBoundary(item),
    centroid: readCentroid(item),
    areaHa: optionalNumber(item, 'areaHa'),
    region: optionalString(item, 'region'),
    district: optionalString(item, 'district'),
    cropType: optionalString(item, 'cropType'),
    cropStage: optionalString(item, 'cropStage'),
    season: optionalString(item, 'season'),
    soilMoisture: optionalNumber(item, 'soilMoisture'),
    temperature: optionalNumber(item, 'temperature'),
    healthStatus: isEnumValue(HEALTH_VALUES, healthStatus) ? healthStatus : undefined,
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export function sampleFromItem(item: Item): MetricSample {
  return {
    sampleId: readString(item, 'sampleId'),
    fieldId: readString(item, 'fieldId'),
    date: readString(item, 'date'),
    ndviMean: readNumber(item, 'ndviMean'),
    ndviMin: readNumber(item, 'ndviMin'),
    ndviMax: readNumber(item, 'ndviMax'),
    eviMean: readNumber(item, 'eviMean'),
    tempMean: readNumber(item, 'tempMean'),
    rainfallTotal: readNumber(item, 'rainfallTotal'),
    humidityMean: readNumber(item, 'humidityMean'),
    windSpeedMean: readNumber(item, 'windSpeedMean'),
    cloudCoverage: readNumber(item, 'cloudCoverage'),
    validPixels: readNumber(item, 'validPixels'),
    soilMoistureEst: readNumber(item, 'soilMoistureEst'),
    dataSource: readString(item, 'dataSource'),
    createdAt: readString(item, 'createdAt'),
  };
}

export function advisoryFromItem(item: Item): FieldAdvisory {
  const level: unknown = item.level;
  const ruleLayer: unknown = item.ruleLayer;
  if (!isEnumValue(LEVEL_VALUES, level)) {
    throw new MalformedRecordError('level');
  }
  if (!isEnumValue(LAYER_VALUES, ruleLayer)) {
    throw new MalformedRecordError('ruleLayer');
  }

  return {
    advisoryId: readString(item, 'advisoryId'),
    fieldId: readString(item, 'fieldId'),
    sampleId: optionalString(item, 'sampleId') ?? null,
    ruleLayer,
    level,
    message: readString(item, 'message'),
    priority: priorityForLevel(level),
    createdAt: readString(item, 'createdAt'),
  };
}

/**
 * DocumentClient rejects undefined attribute values
 */
export function toItem<T extends object>(record: T): Item {
  const item: Item = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      item[key] = value;
    }
  }
  return item;
}
