/**
 * Static region and crop rule tables
 */

import { NumericRange } from './core';

/**
 * A disease is at risk when any configured condition holds.
 * At least one condition must be present.
 */
export interface DiseaseDefinition {
  name: string;
  ndviThreshold?: number;
  humidityThreshold?: number;
  temperatureRange?: NumericRange;
  rainfallThreshold?: number;
  soilMoistureThreshold?: number;
}

export interface RegionProfile {
  region: string;
  pestThreshold: number;
  diseases: readonly DiseaseDefinition[];
  // "{disease}" is replaced with the disease name
  advisoryTemplate: string;
}

export interface CropProfile {
  crop: string;
  optimalNdvi: NumericRange;
  optimalTemperature: NumericRange;
  optimalSoilMoisture: NumericRange;
}
