/**
 * Field Health Analysis & Advisory Engine
 */

export * from './types';
export * from './shared';
export * from './profile-registry/profile-registry';
export * from './profile-registry/default-profiles';
export * from './field-health/health-classifier';
export * from './field-health/random-forest';
export * from './field-health/trend-predictor';
export * from './advisory-engine/severity-policy';
export * from './advisory-engine/advisory-rules';
export * from './data-ingestion/acquisition-orchestrator';
export * from './data-ingestion/sentinel-hub-client';
export * from './data-ingestion/vegetation-index-source';
export * from './data-ingestion/soil-moisture-source';
export * from './data-ingestion/weather-source';
export * from './store';
export * from './field-analysis';
export { createFieldServices, createSources, FieldServices, ServiceOverrides } from './handlers/service-factory';
export { createFieldHandlers, parseCreateFieldRequest, ApiEvent, ApiHandler, FieldHandlers } from './handlers/field-handlers';
