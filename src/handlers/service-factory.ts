/**
 * Wires the analysis services from a validated environment configuration
 */

import { EnvironmentConfig } from '../shared/config/environment';
import { ResilienceService } from '../shared/services/resilience-service';
import { DynamoDBHelper } from '../shared/utils/dynamodb-helper';
import { Logger } from '../shared/utils/logger';
import { FieldStore } from '../store/field-store';
import { DynamoDbFieldStore } from '../store/dynamodb-field-store';
import { ProfileRegistry } from '../profile-registry/profile-registry';
import { HealthClassifier } from '../field-health/health-classifier';
import { TrendPredictor } from '../field-health/trend-predictor';
import { AdvisoryRuleEngine } from '../advisory-engine/advisory-rules';
import { AcquisitionOrchestrator, AcquisitionSources } from '../data-ingestion/acquisition-orchestrator';
import { SentinelHubClient } from '../data-ingestion/sentinel-hub-client';
import { SentinelVegetationIndexSource } from '../data-ingestion/vegetation-index-source';
import { SentinelSoilMoistureSource } from '../data-ingestion/soil-moisture-source';
import { NasaPowerWeatherSource } from '../data-ingestion/weather-source';
import { TurfGeometryProvider } from '../field-analysis/geometry';
import { FieldManager } from '../field-analysis/field-manager';
import { HistoryAggregator } from '../field-analysis/history-aggregator';
import { FieldAnalysisService } from '../field-analysis/field-analysis-service';

export interface FieldServices {
  fieldManager: FieldManager;
  analysisService: FieldAnalysisService;
  historyAggregator: HistoryAggregator;
  historyDays: number;
}

export interface ServiceOverrides {
  store?: FieldStore;
  sources?: AcquisitionSources;
  registry?: ProfileRegistry;
  clock?: () => Date;
}

export function createSources(config: EnvironmentConfig, logger: Logger): AcquisitionSources {
  const sentinel = new SentinelHubClient(
    {
      baseUrl: config.sentinelHubBaseUrl,
      clientId: config.sentinelHubClientId,
      clientSecret: config.sentinelHubClientSecret,
      timeoutMs: config.sourceTimeoutMs,
      maxRetries: config.maxRetries,
    },
    logger.child({ source: 'sentinel-hub' })
  );

  if (!sentinel.isConfigured) {
    logger.warn('Sentinel Hub credentials not set, vegetation and soil moisture will use default values');
  }

  return {
    vegetation: new SentinelVegetationIndexSource(sentinel),
    soilMoisture: new SentinelSoilMoistureSource(sentinel),
    weather: new NasaPowerWeatherSource(
      { apiUrl: config.nasaPowerApiUrl, timeoutMs: config.sourceTimeoutMs, maxRetries: config.maxRetries },
      logger.child({ source: 'nasa-power' })
    ),
  };
}

export function createFieldServices(
  config: EnvironmentConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): FieldServices {
  const store = overrides.store ?? new DynamoDbFieldStore(new DynamoDBHelper(), config, logger);
  const registry = overrides.registry ?? ProfileRegistry.withDefaults();
  const geometry = new TurfGeometryProvider();
  const classifier = new HealthClassifier(registry);

  const acquisition = new AcquisitionOrchestrator(
    overrides.sources ?? createSources(config, logger),
    new ResilienceService(logger),
    { timeoutMs: config.sourceTimeoutMs, weatherDays: config.weatherDays },
    logger
  );

  return {
    fieldManager: new FieldManager(store, geometry, logger, overrides.clock),
    analysisService: new FieldAnalysisService({
      store,
      acquisition,
      registry,
      classifier,
      predictor: new TrendPredictor(logger),
      rules: new AdvisoryRuleEngine(),
      geometry,
      logger,
      trainingWindowDays: config.trainingWindowDays,
      clock: overrides.clock,
    }),
    historyAggregator: new HistoryAggregator(store, classifier, overrides.clock),
    historyDays: config.historyDays,
  };
}
