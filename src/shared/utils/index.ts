/**
 * Shared utilities index file
 * Exports all utility functions and classes
 */

export * from './dynamodb-helper';
export * from './lambda-response';
export * from './validation';
export * from './errors';
export * from './logger';
export * from './keyed-mutex';
export * from './dates';
