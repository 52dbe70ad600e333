/**
 * Process-local field store with the same contract as the DynamoDB store.
 * Used by tests and local runs.
 */

import { FieldAdvisory } from '../types/advisory';
import { Field, FieldSnapshot, MetricSample } from '../types/field';
import { PersistenceError } from '../shared/utils/errors';
import { FieldStore } from './field-store';

export class InMemoryFieldStore implements FieldStore {
  private readonly fields = new Map<string, Field>();
  private readonly samples = new Map<string, Map<string, MetricSample>>();
  private readonly advisories = new Map<string, FieldAdvisory>();

  async getField(fieldId: string): Promise<Field | null> {
    const field = this.fields.get(fieldId);
    return field ? structuredClone(field) : null;
  }

  async putField(field: Field): Promise<void> {
    this.fields.set(field.fieldId, structuredClone(field));
  }

  async deleteField(fieldId: string): Promise<void> {
    this.fields.delete(fieldId);
    this.samples.delete(fieldId);
    for (const [advisoryId, advisory] of this.advisories) {
      if (advisory.fieldId === fieldId) {
        this.advisories.delete(advisoryId);
      }
    }
  }

  async listSamples(fieldId: string, fromDate: string): Promise<MetricSample[]> {
    const byDate = this.samples.get(fieldId);
    if (!byDate) {
      return [];
    }
    return [...byDate.values()]
      .filter(sample => sample.date >= fromDate)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(sample => ({ ...sample }));
  }

  async recordAnalysis(sample: MetricSample, advisories: FieldAdvisory[], snapshot: FieldSnapshot): Promise<void> {
    // Check every condition before touching state
    const field = this.fields.get(sample.fieldId);
    if (!field) {
      throw new PersistenceError(`Cannot record analysis: field ${sample.fieldId} does not exist`);
    }
    const byDate = this.samples.get(sample.fieldId) ?? new Map<string, MetricSample>();
    if (byDate.has(sample.date)) {
      throw new PersistenceError(`A sample for field ${sample.fieldId} on ${sample.date} already exists`);
    }
    const duplicate = advisories.find(advisory => this.advisories.has(advisory.advisoryId));
    if (duplicate) {
      throw new PersistenceError(`Advisory ${duplicate.advisoryId} already exists`);
    }

    byDate.set(sample.date, { ...sample });
    this.samples.set(sample.fieldId, byDate);
    for (const advisory of advisories) {
      this.advisories.set(advisory.advisoryId, { ...advisory });
    }
    this.fields.set(field.fieldId, { ...field, ...snapshot, updatedAt: sample.createdAt });
  }

  async deleteSample(fieldId: string, date: string): Promise<void> {
    const byDate = this.samples.get(fieldId);
    const sample = byDate?.get(date);
    if (!byDate || !sample) {
      return;
    }
    byDate.delete(date);
    for (const advisory of this.advisories.values()) {
      if (advisory.sampleId === sample.sampleId) {
        advisory.sampleId = null;
      }
    }
  }

  async listAdvisories(fieldId: string): Promise<FieldAdvisory[]> {
    return [...this.advisories.values()]
      .filter(advisory => advisory.fieldId === fieldId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(advisory => ({ ...advisory }));
  }
}
