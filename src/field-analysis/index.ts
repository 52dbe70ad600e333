export * from './geometry';
export * from './field-manager';
export * from './history-aggregator';
export * from './field-analysis-service';
