/**
 * Profile Registry
 * Immutable lookup of region and crop rule tables, built once and injected
 * into the health classifier and advisory rule engine
 */

import { NumericRange } from '../types/core';
import { CropProfile, RegionProfile } from '../types/profiles';
import { ValidationError } from '../shared/utils/errors';
import { HEALTH_THRESHOLDS } from '../shared/config/constants';
import { DEFAULT_CROP_PROFILES, DEFAULT_REGION_PROFILES } from './default-profiles';

const DISEASE_CONDITIONS = [
  'ndviThreshold',
  'humidityThreshold',
  'temperatureRange',
  'rainfallThreshold',
  'soilMoistureThreshold',
] as const;

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

function freezeRange(range: NumericRange): NumericRange {
  return Object.freeze({ min: range.min, max: range.max });
}

export class ProfileRegistry {
  private readonly regions: ReadonlyMap<string, RegionProfile>;
  private readonly crops: ReadonlyMap<string, CropProfile>;

  constructor(regions: RegionProfile[], crops: CropProfile[]) {
    const regionMap = new Map<string, RegionProfile>();
    for (const profile of regions) {
      ProfileRegistry.validateRegion(profile);
      regionMap.set(normalizeKey(profile.region), ProfileRegistry.freezeRegion(profile));
    }

    const cropMap = new Map<string, CropProfile>();
    for (const profile of crops) {
      ProfileRegistry.validateCrop(profile);
      cropMap.set(normalizeKey(profile.crop), Object.freeze({
        crop: profile.crop,
        optimalNdvi: freezeRange(profile.optimalNdvi),
        optimalTemperature: freezeRange(profile.optimalTemperature),
        optimalSoilMoisture: freezeRange(profile.optimalSoilMoisture),
      }));
    }

    this.regions = regionMap;
    this.crops = cropMap;
  }

  static withDefaults(): ProfileRegistry {
    return new ProfileRegistry(DEFAULT_REGION_PROFILES, DEFAULT_CROP_PROFILES);
  }

  getRegionProfile(region: string | undefined): RegionProfile | undefined {
    return region ? this.regions.get(normalizeKey(region)) : undefined;
  }

  getCropProfile(crop: string | undefined): CropProfile | undefined {
    return crop ? this.crops.get(normalizeKey(crop)) : undefined;
  }

  /**
   * Pest-risk NDVI cutoff for a region, falling back to the global default
   */
  pestThresholdFor(region: string | undefined): number {
    return this.getRegionProfile(region)?.pestThreshold ?? HEALTH_THRESHOLDS.DEFAULT_PEST_THRESHOLD;
  }

  listRegions(): string[] {
    return Array.from(this.regions.values(), profile => profile.region);
  }

  listCrops(): string[] {
    return Array.from(this.crops.values(), profile => profile.crop);
  }

  private static freezeRegion(profile: RegionProfile): RegionProfile {
    const diseases = profile.diseases.map(disease => Object.freeze({
      ...disease,
      temperatureRange: disease.temperatureRange ? freezeRange(disease.temperatureRange) : undefined,
    }));
    return Object.freeze({
      region: profile.region,
      pestThreshold: profile.pestThreshold,
      diseases: Object.freeze(diseases),
      advisoryTemplate: profile.advisoryTemplate,
    });
  }

  private static validateRegion(profile: RegionProfile): void {
    if (!profile.region.trim()) {
      throw new ValidationError('Region profile must have a name');
    }
    if (!profile.advisoryTemplate.includes('{disease}')) {
      throw new ValidationError(`Advisory template for ${profile.region} must contain {disease}`);
    }
    for (const disease of profile.diseases) {
      const configured = DISEASE_CONDITIONS.filter(condition => disease[condition] !== undefined);
      if (configured.length === 0) {
        throw new ValidationError(`Disease ${disease.name} in ${profile.region} has no conditions`);
      }
      if (disease.temperatureRange) {
        ProfileRegistry.validateRange(disease.temperatureRange, `${disease.name} temperature range`);
      }
    }
  }

  private static validateCrop(profile: CropProfile): void {
    ProfileRegistry.validateRange(profile.optimalNdvi, `${profile.crop} NDVI range`);
    ProfileRegistry.validateRange(profile.optimalTemperature, `${profile.crop} temperature range`);
    ProfileRegistry.validateRange(profile.optimalSoilMoisture, `${profile.crop} soil moisture range`);
  }

  private static validateRange(range: NumericRange, label: string): void {
    if (!(range.min <= range.max)) {
      throw new ValidationError(`Invalid ${label}: min ${range.min} exceeds max ${range.max}`);
    }
  }
}
