/**
 * Application constants and configuration
 */

// Acquisition defaults substituted when a source degrades
export const SOURCE_DEFAULTS = {
  VEGETATION: {
    ndviMean: 0.5,
    ndviMin: 0.4,
    ndviMax: 0.6,
    cloudCoverage: 0,
    validPixels: 1000,
  },
  SOIL_MOISTURE: 0.3,
  WEATHER: {
    tempMean: 25.0,
    rainfallTotal: 0.0,
    humidityMean: 50.0,
    windSpeedMean: 2.0,
  },
} as const;

// Vegetation and soil signals always cover the trailing week
export const ACQUISITION_WINDOW_DAYS = 7;

// Health classification
export const HEALTH_THRESHOLDS = {
  EXCELLENT: 0.7,
  MODERATE: 0.3,
  DEFAULT_PEST_THRESHOLD: 0.5,
} as const;

// Global sanity rules
export const GLOBAL_RULE_LIMITS = {
  SOIL_MOISTURE_CRITICAL_LOW: 0.15,
  SOIL_MOISTURE_HIGH: 0.7,
  HEAT_STRESS_TEMPERATURE: 30,
  SOIL_MOISTURE_PLAUSIBLE: { min: 0, max: 1 },
  TEMPERATURE_PLAUSIBLE: { min: 0, max: 50 },
} as const;

// Trend model
export const TREND_MODEL = {
  MIN_TRAINING_SAMPLES: 5,
  ESTIMATORS: 100,
  SEED: 42,
  PREDICTION_BOUNDS: { min: 0.1, max: 0.95 },
} as const;

export const DATA_SOURCE_TAG = 'Sentinel/NASA';
