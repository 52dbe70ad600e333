/**
 * History Aggregator
 * Reads trailing-window samples and advisories for presentation.
 * Health status is re-derived from the field's current region on every read.
 */

import { AdvisoryFeed, FieldHistory } from '../types/analysis';
import { AdvisoryFeedEntry } from '../types/advisory';
import { Field } from '../types/field';
import { FieldStore } from '../store/field-store';
import { HealthClassifier } from '../field-health/health-classifier';
import { FieldNotFoundError } from '../shared/utils/errors';
import { Validator } from '../shared/utils/validation';
import { daysBefore, toIsoDate } from '../shared/utils/dates';

export const DEFAULT_HISTORY_DAYS = 7;

export class HistoryAggregator {
  constructor(
    private readonly store: FieldStore,
    private readonly classifier: HealthClassifier,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async getFieldHistory(fieldId: string, days: number = DEFAULT_HISTORY_DAYS): Promise<FieldHistory> {
    Validator.throwIfInvalid(Validator.validateWindowDays(days));
    const field = await this.requireField(fieldId);
    const samples = await this.store.listSamples(fieldId, this.windowStart(days));

    return {
      fieldId,
      region: field.region,
      windowDays: days,
      entries: samples.map(sample => ({
        ...sample,
        healthStatus: this.classifier.classify(sample.ndviMean, field.region),
      })),
    };
  }

  async getAdvisoryFeed(fieldId: string, days: number = DEFAULT_HISTORY_DAYS): Promise<AdvisoryFeed> {
    Validator.throwIfInvalid(Validator.validateWindowDays(days));
    await this.requireField(fieldId);

    const samples = await this.store.listSamples(fieldId, this.windowStart(days));
    const dateBySample = new Map(samples.map(sample => [sample.sampleId, sample.date]));
    const advisories = await this.store.listAdvisories(fieldId);

    const entries: AdvisoryFeedEntry[] = [];
    for (const advisory of advisories) {
      const date = advisory.sampleId === null ? undefined : dateBySample.get(advisory.sampleId);
      if (date === undefined) {
        continue;
      }
      entries.push({
        advisoryId: advisory.advisoryId,
        level: advisory.level,
        priority: advisory.priority,
        message: advisory.message,
        date,
        createdAt: advisory.createdAt,
      });
    }

    // Stable sort keeps rule order within one run
    entries.sort((a, b) => a.priority - b.priority || a.createdAt.localeCompare(b.createdAt));
    return { fieldId, windowDays: days, advisories: entries };
  }

  private windowStart(days: number): string {
    return toIsoDate(daysBefore(this.clock(), days));
  }

  private async requireField(fieldId: string): Promise<Field> {
    const field = await this.store.getField(fieldId);
    if (!field) {
      throw new FieldNotFoundError(fieldId);
    }
    return field;
  }
}
