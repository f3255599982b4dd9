export * from './types.js';
export * from './errors.js';
export * from './policy-evaluator.js';
export * from './safety-guard.js';
export * from './executor.js';
export * from './instance-sizing.js';
export * from './async-query.js';
export * from './anomaly-detector.js';
export * from './report-aggregator.js';
export * from './config.js';
export * from './engine.js';
