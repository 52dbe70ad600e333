/**
 * Field Analysis Service
 * Runs one analysis for a field: retrain the trend model, acquire signals,
 * classify, predict, evaluate rules and persist the outcome atomically.
 * Callers only ever see ValidationError or PersistenceError.
 */

import { v4 as uuidv4 } from 'uuid';
import { AnalysisResult } from '../types/analysis';
import { FieldAdvisory } from '../types/advisory';
import { MetricsBundle } from '../types/external-data';
import { Field, MetricSample } from '../types/field';
import { FieldStore } from '../store/field-store';
import { AcquisitionOrchestrator } from '../data-ingestion/acquisition-orchestrator';
import { HealthClassifier } from '../field-health/health-classifier';
import { TrendPredictor } from '../field-health/trend-predictor';
import { AdvisoryRuleEngine } from '../advisory-engine/advisory-rules';
import { priorityForLevel } from '../advisory-engine/severity-policy';
import { ProfileRegistry } from '../profile-registry/profile-registry';
import { DATA_SOURCE_TAG } from '../shared/config/constants';
import { FieldNotFoundError, IncompleteFieldError, PersistenceError, ValidationError } from '../shared/utils/errors';
import { KeyedMutex } from '../shared/utils/keyed-mutex';
import { Logger } from '../shared/utils/logger';
import { daysBefore, toIsoDate } from '../shared/utils/dates';
import { GeometryProvider } from './geometry';

export interface FieldAnalysisDependencies {
  store: FieldStore;
  acquisition: AcquisitionOrchestrator;
  registry: ProfileRegistry;
  classifier: HealthClassifier;
  predictor: TrendPredictor;
  rules: AdvisoryRuleEngine;
  geometry: GeometryProvider;
  logger: Logger;
  trainingWindowDays: number;
  clock?: () => Date;
}

export class FieldAnalysisService {
  private readonly locks = new KeyedMutex();
  private readonly clock: () => Date;

  constructor(private readonly deps: FieldAnalysisDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async analyzeField(fieldId: string): Promise<AnalysisResult> {
    return this.locks.runExclusive(fieldId, async () => {
      const startTime = Date.now();
      try {
        const result = await this.runAnalysis(fieldId);
        this.deps.logger.performance('analyzeField', Date.now() - startTime, {
          fieldId,
          healthStatus: result.healthStatus,
          advisories: result.advisories.length,
        });
        return result;
      } catch (error) {
        if (error instanceof ValidationError || error instanceof PersistenceError) {
          throw error;
        }
        this.deps.logger.error('Analysis run failed', error, { fieldId });
        throw new PersistenceError(`Analysis of field ${fieldId} failed`, { cause: error });
      }
    });
  }

  private async runAnalysis(fieldId: string): Promise<AnalysisResult> {
    const { store, acquisition, registry, classifier, predictor, rules, geometry, logger } = this.deps;
    const log = logger.child({ fieldId });

    const field = await store.getField(fieldId);
    if (!field) {
      throw new FieldNotFoundError(fieldId);
    }
    const { boundary, centroid } = requireGeometry(field);

    const now = this.clock();
    const date = toIsoDate(now);

    const history = await store.listSamples(fieldId, toIsoDate(daysBefore(now, this.deps.trainingWindowDays)));
    predictor.retrain(fieldId, history);

    const metrics = await acquisition.acquire({ bbox: geometry.bbox(boundary), centroid, now });
    const healthStatus = classifier.classify(metrics.ndviMean, field.region);
    const predictedNdvi = predictor.predict(fieldId, metrics);

    const drafts = rules.evaluate({
      metrics,
      cropType: field.cropType,
      regionProfile: registry.getRegionProfile(field.region),
      cropProfile: registry.getCropProfile(field.cropType),
    });

    const createdAt = now.toISOString();
    const sample = buildSample(fieldId, date, metrics, createdAt);
    const advisories: FieldAdvisory[] = drafts.map(draft => ({
      ...draft,
      advisoryId: `adv_${uuidv4()}`,
      fieldId,
      sampleId: sample.sampleId,
      priority: priorityForLevel(draft.level),
      createdAt,
    }));

    await store.recordAnalysis(sample, advisories, {
      soilMoisture: metrics.soilMoistureEst,
      temperature: metrics.tempMean,
      healthStatus,
    });

    log.audit('field.analyze', fieldId, field.userId, {
      sampleId: sample.sampleId,
      date,
      healthStatus,
      predictedNdvi,
      advisories: advisories.length,
    });

    return {
      fieldId,
      sampleId: sample.sampleId,
      date,
      metrics,
      healthStatus,
      predictedNdvi,
      advisories: advisories.map(({ advisoryId, level, priority, message }) => ({ advisoryId, level, priority, message })),
    };
  }
}

function requireGeometry(field: Field): Required<Pick<Field, 'boundary' | 'centroid'>> {
  const { boundary, centroid } = field;
  if (!boundary || !centroid) {
    const missing = [!boundary ? 'boundary' : undefined, !centroid ? 'centroid' : undefined]
      .filter((name): name is string => name !== undefined);
    throw new IncompleteFieldError(field.fieldId, missing);
  }
  return { boundary, centroid };
}

function buildSample(fieldId: string, date: string, metrics: MetricsBundle, createdAt: string): MetricSample {
  return {
    sampleId: `sample_${uuidv4()}`,
    fieldId,
    date,
    ndviMean: metrics.ndviMean,
    ndviMin: metrics.ndviMin,
    ndviMax: metrics.ndviMax,
    eviMean: metrics.eviMean,
    tempMean: metrics.tempMean,
    rainfallTotal: metrics.rainfallTotal,
    humidityMean: metrics.humidityMean,
    windSpeedMean: metrics.windSpeedMean,
    cloudCoverage: metrics.cloudCoverage,
    validPixels: metrics.validPixels,
    soilMoistureEst: metrics.soilMoistureEst,
    dataSource: DATA_SOURCE_TAG,
    createdAt,
  };
}
