/**
 * Persistence boundary for fields, metric samples and advisories
 */

import { FieldAdvisory } from '../types/advisory';
import { Field, FieldSnapshot, MetricSample } from '../types/field';

export interface FieldStore {
  getField(fieldId: string): Promise<Field | null>;
  putField(field: Field): Promise<void>;

  /**
   * Removes the field together with its samples and advisories
   */
  deleteField(fieldId: string): Promise<void>;

  /**
   * Samples with date >= fromDate (YYYY-MM-DD), date ascending
   */
  listSamples(fieldId: string, fromDate: string): Promise<MetricSample[]>;

  /**
   * Writes the sample, its advisories and the field snapshot in one unit.
   * Rejects with PersistenceError when a sample already exists for the
   * same field and date, leaving nothing behind.
   */
  recordAnalysis(sample: MetricSample, advisories: FieldAdvisory[], snapshot: FieldSnapshot): Promise<void>;

  /**
   * Removes one sample; advisories that referenced it keep their content with sampleId null
   */
  deleteSample(fieldId: string, date: string): Promise<void>;

  /**
   * All advisories of a field, creation order
   */
  listAdvisories(fieldId: string): Promise<FieldAdvisory[]>;
}
