/**
 * Core data types for the field advisory engine
 * These interfaces define the fundamental data structures used throughout the system
 */

// Geographic and location types
export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * WGS84 bounding box as [minLon, minLat, maxLon, maxLat]
 */
export type BoundingBox = [number, number, number, number];

export interface TimeWindow {
  from: Date;
  to: Date;
}

// Inclusive numeric range
export interface NumericRange {
  min: number;
  max: number;
}

export enum HealthCategory {
  EXCELLENT = 'Excellent',
  GOOD = 'Good',
  MODERATE = 'Moderate',
  POOR = 'Poor'
}

export enum AdvisoryLevel {
  CRITICAL = 'critical',
  WARNING = 'warning',
  INFO = 'info'
}

export enum RuleLayer {
  REGION_PEST = 'region_pest',
  REGION_DISEASE = 'region_disease',
  CROP_THRESHOLD = 'crop_threshold',
  GLOBAL = 'global'
}

// Validation result type
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
