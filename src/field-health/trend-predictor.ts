/**
 * Trend Predictor
 * Holds one regression forest per field, trained from that field's history,
 * and forecasts the next NDVI value from the current weather and soil signals
 */

import { MetricsBundle } from '../types/external-data';
import { MetricSample } from '../types/field';
import { TREND_MODEL } from '../shared/config/constants';
import { Logger } from '../shared/utils/logger';
import { RandomForestRegressor } from './random-forest';

type FeatureSource = Pick<MetricSample, 'tempMean' | 'rainfallTotal' | 'humidityMean' | 'windSpeedMean' | 'soilMoistureEst'>;

export interface TrendPredictorOptions {
  nEstimators?: number;
  seed?: number;
}

export function toFeatureVector(source: FeatureSource): number[] {
  return [
    source.tempMean,
    source.rainfallTotal,
    source.humidityMean,
    source.windSpeedMean,
    source.soilMoistureEst,
  ];
}

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

export class TrendPredictor {
  private readonly models = new Map<string, RandomForestRegressor>();
  private readonly nEstimators: number;
  private readonly seed: number;

  constructor(private readonly logger: Logger, options: TrendPredictorOptions = {}) {
    this.nEstimators = options.nEstimators ?? TREND_MODEL.ESTIMATORS;
    this.seed = options.seed ?? TREND_MODEL.SEED;
  }

  /**
   * Fit a fresh model from the field's history. With too few samples the
   * previous model, if any, is kept. Returns whether a model was fitted.
   */
  retrain(fieldId: string, history: MetricSample[]): boolean {
    const usable = history.filter(sample =>
      Number.isFinite(sample.ndviMean) && toFeatureVector(sample).every(Number.isFinite)
    );

    if (usable.length < TREND_MODEL.MIN_TRAINING_SAMPLES) {
      this.logger.debug('Skipping trend model training', {
        fieldId,
        samples: usable.length,
        required: TREND_MODEL.MIN_TRAINING_SAMPLES,
        keptPreviousModel: this.models.has(fieldId),
      });
      return false;
    }

    const model = new RandomForestRegressor({ nEstimators: this.nEstimators, seed: this.seed });
    model.fit(usable.map(toFeatureVector), usable.map(sample => sample.ndviMean));
    this.models.set(fieldId, model);

    this.logger.info('Trend model trained', { fieldId, samples: usable.length });
    return true;
  }

  /**
   * Untrained fields pass the bundle's NDVI mean through unchanged
   */
  predict(fieldId: string, bundle: MetricsBundle): number {
    const model = this.models.get(fieldId);
    if (!model) {
      return bundle.ndviMean;
    }

    const { min, max } = TREND_MODEL.PREDICTION_BOUNDS;
    return clamp(model.predict(toFeatureVector(bundle)), min, max);
  }

  isTrained(fieldId: string): boolean {
    return this.models.has(fieldId);
  }

  forget(fieldId: string): void {
    this.models.delete(fieldId);
  }
}
