export * from './field-store';
export * from './dynamodb-field-store';
export * from './in-memory-field-store';
