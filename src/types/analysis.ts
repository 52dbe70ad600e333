/**
 * Analysis result models
 * Serializable structures handed to the presentation layer
 */

import { AdvisoryLevel, HealthCategory } from './core';
import { AdvisoryFeedEntry, AdvisoryPriority } from './advisory';
import { MetricsBundle } from './external-data';
import { MetricSample } from './field';

export interface AnalysisAdvisory {
  advisoryId: string;
  level: AdvisoryLevel;
  priority: AdvisoryPriority;
  message: string;
}

export interface AnalysisResult {
  fieldId: string;
  sampleId: string;
  date: string;
  metrics: MetricsBundle;
  healthStatus: HealthCategory;
  predictedNdvi: number;
  advisories: AnalysisAdvisory[];
}

export interface HistoryEntry extends MetricSample {
  healthStatus: HealthCategory;
}

export interface FieldHistory {
  fieldId: string;
  region?: string;
  windowDays: number;
  entries: HistoryEntry[];
}

export interface AdvisoryFeed {
  fieldId: string;
  windowDays: number;
  advisories: AdvisoryFeedEntry[];
}
