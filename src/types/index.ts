/**
 * Main types export file for the field advisory engine
 * Exports all type definitions for use throughout the application
 */

// Core types
export * from './core';

// Field and sample types
export * from './field';

// Advisory types
export * from './advisory';

// Profile types
export * from './profiles';

// External data types
export * from './external-data';

// Analysis result types
export * from './analysis';
