/**
 * Host Monitor
 *
 * Samples CPU, memory, swap, disk and temperature, evaluates thresholds,
 * dispatches alerts and renders the top-process report.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config/index.js';
export * from './system/index.js';
export * from './sampler/index.js';
export * from './alerting/index.js';
export * from './process-ranker/index.js';
export * from './report/index.js';
export * from './loop-controller/index.js';
