/**
 * Field Manager
 * Registers and edits fields. Centroid and area are always derived from the
 * boundary here and never accepted from the caller.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Polygon } from 'geojson';
import { ValidationResult } from '../types/core';
import { CreateFieldInput, Field, UpdateFieldInput } from '../types/field';
import { FieldStore } from '../store/field-store';
import { FieldNotFoundError } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import { Validator } from '../shared/utils/validation';
import { GeometryProvider } from './geometry';

export class FieldManager {
  constructor(
    private readonly store: FieldStore,
    private readonly geometry: GeometryProvider,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async createField(input: CreateFieldInput): Promise<Field> {
    Validator.throwIfInvalid(Validator.combineValidationResults([
      Validator.validateRequiredString(input.userId, 'userId'),
      Validator.validateRequiredString(input.name, 'name'),
      Validator.validateBoundary(input.boundary),
      ...this.validateOptionalStrings(input),
    ]));

    const now = this.clock().toISOString();
    const field: Field = {
      fieldId: `field_${uuidv4()}`,
      userId: input.userId,
      name: input.name.trim(),
      region: input.region,
      district: input.district,
      cropType: input.cropType,
      cropStage: input.cropStage,
      season: input.season,
      ...this.deriveGeometry(input.boundary),
      createdAt: now,
      updatedAt: now,
    };

    await this.store.putField(field);
    this.logger.audit('field.create', field.fieldId, field.userId, { areaHa: field.areaHa, region: field.region });
    return field;
  }

  async getField(fieldId: string): Promise<Field> {
    const field = await this.store.getField(fieldId);
    if (!field) {
      throw new FieldNotFoundError(fieldId);
    }
    return field;
  }

  async updateField(fieldId: string, changes: UpdateFieldInput): Promise<Field> {
    const results: ValidationResult[] = [...this.validateOptionalStrings(changes)];
    if (changes.name !== undefined) {
      results.push(Validator.validateRequiredString(changes.name, 'name'));
    }
    if (changes.boundary !== undefined) {
      results.push(Validator.validateBoundary(changes.boundary));
    }
    Validator.throwIfInvalid(Validator.combineValidationResults(results));

    const existing = await this.getField(fieldId);
    const updated: Field = {
      ...existing,
      ...definedEntries(changes),
      ...(changes.name !== undefined ? { name: changes.name.trim() } : {}),
      ...(changes.boundary !== undefined ? this.deriveGeometry(changes.boundary) : {}),
      updatedAt: this.clock().toISOString(),
    };

    await this.store.putField(updated);
    this.logger.audit('field.update', fieldId, updated.userId, {
      changed: Object.entries(changes).filter(([, value]) => value !== undefined).map(([key]) => key),
    });
    return updated;
  }

  async deleteField(fieldId: string): Promise<void> {
    const existing = await this.getField(fieldId);
    await this.store.deleteField(fieldId);
    this.logger.audit('field.delete', fieldId, existing.userId);
  }

  private deriveGeometry(boundary: Polygon): Pick<Field, 'boundary' | 'centroid' | 'areaHa'> {
    return {
      boundary,
      centroid: this.geometry.centroid(boundary),
      areaHa: this.geometry.areaHectares(boundary),
    };
  }

  private validateOptionalStrings(input: UpdateFieldInput): ValidationResult[] {
    const optional = {
      region: input.region,
      district: input.district,
      cropType: input.cropType,
      cropStage: input.cropStage,
      season: input.season,
    };
    return Object.entries(optional)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => Validator.validateRequiredString(value, key));
  }
}

function definedEntries(changes: UpdateFieldInput): UpdateFieldInput {
  const defined: UpdateFieldInput = {};
  if (changes.region !== undefined) defined.region = changes.region;
  if (changes.district !== undefined) defined.district = changes.district;
  if (changes.cropType !== undefined) defined.cropType = changes.cropType;
  if (changes.cropStage !== undefined) defined.cropStage = changes.cropStage;
  if (changes.season !== undefined) defined.season = changes.season;
  return defined;
}
