/**
 * Validation utilities for the field advisory engine
 * Provides input validation functions for field records and request parameters
 */

import type { Polygon, Position } from 'geojson';
import { Coordinates, ValidationResult } from '../../types/core';
import { ValidationError } from './errors';

function isPositionList(ring: unknown): ring is number[][] {
  return Array.isArray(ring) && ring.every(
    position => Array.isArray(position) && position.every(coordinate => typeof coordinate === 'number')
  );
}

/**
 * Narrow untrusted JSON to a GeoJSON Polygon shape. Ring closure and
 * position counts are checked by Validator.validateBoundary.
 */
export function toPolygon(value: unknown): Polygon | undefined {
  if (typeof value !== 'object' || value === null || !('type' in value) || value.type !== 'Polygon') {
    return undefined;
  }
  const coordinates: unknown = 'coordinates' in value ? value.coordinates : undefined;
  if (!Array.isArray(coordinates) || !coordinates.every(isPositionList)) {
    return undefined;
  }
  return { type: 'Polygon', coordinates };
}

function validateRing(ring: Position[], label: string): string[] {
  if (!Array.isArray(ring) || ring.length < 4) {
    return [`${label} must have at least 4 positions`];
  }

  const errors: string[] = [];
  if (ring.some(position => !Array.isArray(position) || position.length < 2 || !position.every(Number.isFinite))) {
    errors.push(`${label} positions must be [longitude, latitude] numbers`);
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) {
    errors.push(`${label} must be closed (first position equals last)`);
  }
  return errors;
}

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Validate required string field
   */
  static validateRequiredString(value: unknown, fieldName: string): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!value || typeof value !== 'string') {
      errors.push(`${fieldName} is required and must be a string`);
    } else if (value.trim().length === 0) {
      errors.push(`${fieldName} cannot be empty`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Validate a GeoJSON polygon boundary: the outer ring and every interior
   * ring must be closed and hold at least four positions
   */
  static validateBoundary(boundary: Polygon | undefined): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!boundary || boundary.type !== 'Polygon' || !Array.isArray(boundary.coordinates) || boundary.coordinates.length === 0) {
      errors.push('Boundary must be a GeoJSON Polygon');
      return { isValid: false, errors, warnings };
    }

    boundary.coordinates.forEach((ring, index) => {
      const label = index === 0 ? 'Boundary ring' : `Interior ring ${index}`;
      errors.push(...validateRing(ring, label));
    });

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Validate coordinates
   */
  static validateCoordinates(coordinates: Coordinates): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isFinite(coordinates.latitude) || coordinates.latitude < -90 || coordinates.latitude > 90) {
      errors.push('Invalid latitude: must be between -90 and 90');
    }

    if (!Number.isFinite(coordinates.longitude) || coordinates.longitude < -180 || coordinates.longitude > 180) {
      errors.push('Invalid longitude: must be between -180 and 180');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Validate a trailing-window length in days
   */
  static validateWindowDays(days: number, max: number = 365): ValidationResult {
    const errors: string[] = [];

    if (!Number.isInteger(days) || days < 1 || days > max) {
      errors.push(`Window must be a whole number of days between 1 and ${max}`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: []
    };
  }

  /**
   * Combine multiple validation results
   */
  static combineValidationResults(results: ValidationResult[]): ValidationResult {
    const allErrors: string[] = [];
    const allWarnings: string[] = [];

    for (const result of results) {
      allErrors.push(...result.errors);
      allWarnings.push(...result.warnings);
    }

    return {
      isValid: allErrors.length === 0,
      errors: allErrors,
      warnings: allWarnings
    };
  }

  /**
   * Throw error if validation fails
   */
  static throwIfInvalid(result: ValidationResult): void {
    if (!result.isValid) {
      throw new ValidationError(result.errors.join('; '));
    }
  }
}
