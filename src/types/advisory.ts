/**
 * Advisory data models
 * Defines the structure for leveled field advisories produced by the rule engine
 */

import { AdvisoryLevel, RuleLayer } from './core';

export type AdvisoryPriority = 1 | 2;

/**
 * Rule engine output, before it is attached to a field and sample
 */
export interface AdvisoryDraft {
  ruleLayer: RuleLayer;
  level: AdvisoryLevel;
  message: string;
}

export interface FieldAdvisory extends AdvisoryDraft {
  advisoryId: string;
  fieldId: string;
  sampleId: string | null; // detached when the sample is removed
  priority: AdvisoryPriority;
  createdAt: string;
}

export interface AdvisoryFeedEntry {
  advisoryId: string;
  level: AdvisoryLevel;
  priority: AdvisoryPriority;
  message: string;
  date: string;
  createdAt: string;
}
