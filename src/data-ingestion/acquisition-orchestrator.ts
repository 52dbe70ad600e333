/**
 * Acquisition Orchestrator
 * Fetches vegetation index, soil moisture and weather for a field concurrently.
 * Each source degrades independently to its documented default, so acquire()
 * always resolves with a complete bundle.
 */

import { BoundingBox, Coordinates } from '../types/core';
import {
  MetricsBundle,
  SoilMoistureSource,
  SourceOutcome,
  SourceStatus,
  VegetationIndexReading,
  VegetationIndexSource,
  WeatherAggregates,
  WeatherSource,
} from '../types/external-data';
import { ACQUISITION_WINDOW_DAYS, SOURCE_DEFAULTS } from '../shared/config/constants';
import { ResilienceService } from '../shared/services/resilience-service';
import { Logger } from '../shared/utils/logger';
import { daysBefore } from '../shared/utils/dates';

export interface AcquisitionSources {
  vegetation: VegetationIndexSource;
  soilMoisture: SoilMoistureSource;
  weather: WeatherSource;
}

export interface AcquisitionOptions {
  timeoutMs: number;
  weatherDays: number;
}

export interface AcquisitionRequest {
  bbox: BoundingBox;
  centroid: Coordinates;
  now: Date;
}

function toStatus<T>(outcome: SourceOutcome<T>): SourceStatus {
  return outcome.status === 'ok'
    ? { source: outcome.source, degraded: false }
    : { source: outcome.source, degraded: true, reason: outcome.reason };
}

export class AcquisitionOrchestrator {
  constructor(
    private readonly sources: AcquisitionSources,
    private readonly resilience: ResilienceService,
    private readonly options: AcquisitionOptions,
    private readonly logger: Logger
  ) {}

  async acquire(request: AcquisitionRequest): Promise<MetricsBundle> {
    const window = { from: daysBefore(request.now, ACQUISITION_WINDOW_DAYS), to: request.now };
    const fallback = { timeoutMs: this.options.timeoutMs };
    const { vegetation, soilMoisture, weather } = this.sources;

    const [vegetationOutcome, soilOutcome, weatherOutcome] = await Promise.all([
      this.resilience.withFallback<VegetationIndexReading>(
        vegetation.name,
        signal => vegetation.fetch(request.bbox, window, signal),
        { ...SOURCE_DEFAULTS.VEGETATION },
        fallback
      ),
      this.resilience.withFallback<number>(
        soilMoisture.name,
        signal => soilMoisture.fetch(request.bbox, window, signal),
        SOURCE_DEFAULTS.SOIL_MOISTURE,
        fallback
      ),
      this.resilience.withFallback<WeatherAggregates>(
        weather.name,
        signal => weather.fetch(request.centroid, this.options.weatherDays, request.now, signal),
        { ...SOURCE_DEFAULTS.WEATHER },
        fallback
      ),
    ]);

    const bundle: MetricsBundle = {
      ...vegetationOutcome.value,
      ...weatherOutcome.value,
      soilMoistureEst: soilOutcome.value,
      eviMean: 0.0,
      sources: {
        vegetation: toStatus(vegetationOutcome),
        soilMoisture: toStatus(soilOutcome),
        weather: toStatus(weatherOutcome),
      },
    };

    const degraded = Object.values(bundle.sources).filter(status => status.degraded).map(status => status.source);
    this.logger.info('Metrics acquired', {
      ndviMean: bundle.ndviMean,
      soilMoistureEst: bundle.soilMoistureEst,
      degradedSources: degraded,
    });

    return bundle;
  }
}
