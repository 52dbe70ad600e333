/**
 * Shared utilities and configuration exports
 */

export * from './utils';
export * from './services/resilience-service';
export * from './config';
