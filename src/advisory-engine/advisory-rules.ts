/**
 * Advisory Rule Engine
 * Evaluates region, crop and global rule layers against a fused metrics
 * bundle. Output order is evaluation order; layers are independent and
 * nothing is deduplicated across them.
 */

import { AdvisoryLevel, NumericRange, RuleLayer } from '../types/core';
import { AdvisoryDraft } from '../types/advisory';
import { CropProfile, DiseaseDefinition, RegionProfile } from '../types/profiles';
import { GLOBAL_RULE_LIMITS } from '../shared/config/constants';
import { diseaseAdvisoryLevel } from './severity-policy';

export type RuleMetrics = {
  ndviMean: number;
  tempMean: number;
  rainfallTotal: number;
  humidityMean: number;
  soilMoistureEst: number;
};

export interface RuleInput {
  metrics: RuleMetrics;
  cropType?: string;
  regionProfile?: RegionProfile;
  cropProfile?: CropProfile;
}

function withinRange(value: number, range: NumericRange): boolean {
  return value >= range.min && value <= range.max;
}

function isPlausible(value: unknown, range: NumericRange): boolean {
  return typeof value === 'number' && Number.isFinite(value) && withinRange(value, range);
}

/**
 * Disjunctive risk: any configured condition holding puts the disease at risk
 */
export function isDiseaseAtRisk(disease: DiseaseDefinition, metrics: RuleMetrics): boolean {
  if (disease.ndviThreshold !== undefined && metrics.ndviMean < disease.ndviThreshold) {
    return true;
  }
  if (disease.humidityThreshold !== undefined && metrics.humidityMean > disease.humidityThreshold) {
    return true;
  }
  if (disease.temperatureRange !== undefined && !withinRange(metrics.tempMean, disease.temperatureRange)) {
    return true;
  }
  if (disease.rainfallThreshold !== undefined && metrics.rainfallTotal > disease.rainfallThreshold) {
    return true;
  }
  if (disease.soilMoistureThreshold !== undefined && metrics.soilMoistureEst < disease.soilMoistureThreshold) {
    return true;
  }
  return false;
}

export class AdvisoryRuleEngine {
  evaluate(input: RuleInput): AdvisoryDraft[] {
    const { metrics, regionProfile, cropProfile } = input;
    const advisories: AdvisoryDraft[] = [];

    if (regionProfile) {
      advisories.push(...this.evaluateRegionRules(metrics, regionProfile));
    }

    if (cropProfile) {
      advisories.push(...this.evaluateCropRules(metrics, cropProfile, input.cropType ?? cropProfile.crop));
    }

    advisories.push(...this.evaluateGlobalRules(metrics));

    return advisories;
  }

  private evaluateRegionRules(metrics: RuleMetrics, profile: RegionProfile): AdvisoryDraft[] {
    const advisories: AdvisoryDraft[] = [];

    if (metrics.ndviMean < profile.pestThreshold) {
      advisories.push({
        ruleLayer: RuleLayer.REGION_PEST,
        level: AdvisoryLevel.WARNING,
        message: `Pest risk high. NDVI below ${profile.pestThreshold}.`,
      });
    }

    for (const disease of profile.diseases) {
      if (isDiseaseAtRisk(disease, metrics)) {
        advisories.push({
          ruleLayer: RuleLayer.REGION_DISEASE,
          level: diseaseAdvisoryLevel(disease.name),
          message: profile.advisoryTemplate.split('{disease}').join(disease.name),
        });
      }
    }

    return advisories;
  }

  private evaluateCropRules(metrics: RuleMetrics, profile: CropProfile, crop: string): AdvisoryDraft[] {
    const advisories: AdvisoryDraft[] = [];

    if (metrics.ndviMean < profile.optimalNdvi.min) {
      advisories.push({
        ruleLayer: RuleLayer.CROP_THRESHOLD,
        level: AdvisoryLevel.CRITICAL,
        message: `NDVI low for ${crop}. Check nutrients/pests.`,
      });
    }

    if (!withinRange(metrics.tempMean, profile.optimalTemperature)) {
      advisories.push({
        ruleLayer: RuleLayer.CROP_THRESHOLD,
        level: AdvisoryLevel.WARNING,
        message: `Temperature out of range for ${crop}.`,
      });
    }

    if (metrics.soilMoistureEst < profile.optimalSoilMoisture.min) {
      advisories.push({
        ruleLayer: RuleLayer.CROP_THRESHOLD,
        level: AdvisoryLevel.CRITICAL,
        message: `Irrigate: Soil moisture low for ${crop}.`,
      });
    } else if (metrics.soilMoistureEst > profile.optimalSoilMoisture.max) {
      advisories.push({
        ruleLayer: RuleLayer.CROP_THRESHOLD,
        level: AdvisoryLevel.WARNING,
        message: `Check drainage: Soil moisture high for ${crop}.`,
      });
    }

    return advisories;
  }

  private evaluateGlobalRules(metrics: RuleMetrics): AdvisoryDraft[] {
    const advisories: AdvisoryDraft[] = [];
    const limits = GLOBAL_RULE_LIMITS;

    if (metrics.soilMoistureEst < limits.SOIL_MOISTURE_CRITICAL_LOW) {
      advisories.push({
        ruleLayer: RuleLayer.GLOBAL,
        level: AdvisoryLevel.CRITICAL,
        message: 'Irrigate immediately to raise soil moisture above 15%.',
      });
    } else if (metrics.soilMoistureEst > limits.SOIL_MOISTURE_HIGH) {
      advisories.push({
        ruleLayer: RuleLayer.GLOBAL,
        level: AdvisoryLevel.WARNING,
        message: 'Reduce irrigation to lower soil moisture below 70%.',
      });
    }

    if (metrics.tempMean > limits.HEAT_STRESS_TEMPERATURE) {
      advisories.push({
        ruleLayer: RuleLayer.GLOBAL,
        level: AdvisoryLevel.WARNING,
        message: 'Implement shading or cooling measures for heat stress.',
      });
    }

    if (
      !isPlausible(metrics.soilMoistureEst, limits.SOIL_MOISTURE_PLAUSIBLE) ||
      !isPlausible(metrics.tempMean, limits.TEMPERATURE_PLAUSIBLE)
    ) {
      advisories.push({
        ruleLayer: RuleLayer.GLOBAL,
        level: AdvisoryLevel.CRITICAL,
        message: 'Check sensors for invalid data.',
      });
    }

    return advisories;
  }
}
