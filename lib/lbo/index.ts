// lib/lbo/index.ts
// LBO Returns Engine - Module Exports

export * from './types';
export * from './errors';
export * from './trace';
export * from './validation';
export * from './projection-engine';
export * from './irr-solver';
export * from './return-analyzer';
export * from './labels';
export * from './checks';
export * from './model-builder';
export * from './serialize';
