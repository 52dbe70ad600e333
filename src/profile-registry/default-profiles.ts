/**
 * Region and crop rule tables shipped with the engine
 */

import { CropProfile, RegionProfile } from '../types/profiles';

export const DEFAULT_REGION_PROFILES: RegionProfile[] = [
  {
    region: 'Gujarat',
    pestThreshold: 0.4,
    diseases: [
      { name: 'Rice Blast', ndviThreshold: 0.4, humidityThreshold: 75.0, temperatureRange: { min: 25, max: 35 }, rainfallThreshold: 10.0 },
      { name: 'Bacterial Leaf Blight', ndviThreshold: 0.45, humidityThreshold: 80.0, rainfallThreshold: 15.0 },
    ],
    advisoryTemplate: 'Check for {disease} due to high humidity in Gujarat.',
  },
  {
    region: 'Maharashtra',
    pestThreshold: 0.45,
    diseases: [
      { name: 'Powdery Mildew', ndviThreshold: 0.45, humidityThreshold: 70.0, temperatureRange: { min: 20, max: 30 } },
      { name: 'Downy Mildew', ndviThreshold: 0.5, humidityThreshold: 85.0, rainfallThreshold: 15.0 },
    ],
    advisoryTemplate: 'Monitor {disease} in Maharashtra, especially during monsoon.',
  },
  {
    region: 'Rajasthan',
    pestThreshold: 0.35,
    diseases: [
      { name: 'Wilt', ndviThreshold: 0.35, soilMoistureThreshold: 0.3, temperatureRange: { min: 30, max: 40 } },
      { name: 'Root Rot', ndviThreshold: 0.4, rainfallThreshold: 20.0 },
    ],
    advisoryTemplate: 'Watch for {disease} in dry Rajasthan conditions.',
  },
  {
    region: 'Punjab',
    pestThreshold: 0.5,
    diseases: [
      { name: 'Yellow Rust', ndviThreshold: 0.5, humidityThreshold: 60.0, temperatureRange: { min: 10, max: 25 } },
      { name: 'Karnal Bunt', ndviThreshold: 0.45, rainfallThreshold: 10.0 },
    ],
    advisoryTemplate: 'Inspect for {disease} in Punjab wheat fields.',
  },
];

export const DEFAULT_CROP_PROFILES: CropProfile[] = [
  { crop: 'wheat', optimalNdvi: { min: 0.6, max: 0.85 }, optimalTemperature: { min: 15, max: 30 }, optimalSoilMoisture: { min: 0.3, max: 0.7 } },
  { crop: 'rice', optimalNdvi: { min: 0.65, max: 0.9 }, optimalTemperature: { min: 20, max: 35 }, optimalSoilMoisture: { min: 0.5, max: 0.8 } },
  { crop: 'cotton', optimalNdvi: { min: 0.55, max: 0.85 }, optimalTemperature: { min: 20, max: 35 }, optimalSoilMoisture: { min: 0.4, max: 0.7 } },
  { crop: 'sugarcane', optimalNdvi: { min: 0.7, max: 0.95 }, optimalTemperature: { min: 25, max: 35 }, optimalSoilMoisture: { min: 0.5, max: 0.8 } },
  { crop: 'maize', optimalNdvi: { min: 0.6, max: 0.9 }, optimalTemperature: { min: 20, max: 30 }, optimalSoilMoisture: { min: 0.4, max: 0.7 } },
];
