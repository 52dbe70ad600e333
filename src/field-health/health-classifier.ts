/**
 * Health Classifier
 * Maps a mean NDVI value and the field's region to an ordinal health category
 */

import { HealthCategory } from '../types/core';
import { HEALTH_THRESHOLDS } from '../shared/config/constants';
import { ProfileRegistry } from '../profile-registry/profile-registry';

export class HealthClassifier {
  constructor(private readonly registry: ProfileRegistry) {}

  /**
   * First match wins: Excellent above 0.7, Good above the region's pest
   * threshold, Moderate above 0.3, otherwise Poor. Non-finite input is Poor.
   */
  classify(ndviMean: number, region: string | undefined): HealthCategory {
    if (!Number.isFinite(ndviMean)) {
      return HealthCategory.POOR;
    }
    const pestThreshold = this.registry.pestThresholdFor(region);

    if (ndviMean > HEALTH_THRESHOLDS.EXCELLENT) {
      return HealthCategory.EXCELLENT;
    }
    if (ndviMean > pestThreshold) {
      return HealthCategory.GOOD;
    }
    if (ndviMean > HEALTH_THRESHOLDS.MODERATE) {
      return HealthCategory.MODERATE;
    }
    return HealthCategory.POOR;
  }
}

// Ordinal rank, higher is healthier
export const HEALTH_RANK: Record<HealthCategory, number> = {
  [HealthCategory.POOR]: 0,
  [HealthCategory.MODERATE]: 1,
  [HealthCategory.GOOD]: 2,
  [HealthCategory.EXCELLENT]: 3,
};
