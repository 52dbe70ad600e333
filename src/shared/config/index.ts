export * from './environment';
export * from './constants';
