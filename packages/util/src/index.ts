export * from './deepMerge';
export * from './serviceEndpoints';
export * from './clock';
export * from './writeQueue';
