/**
 * Alerting Component
 *
 * Threshold evaluation and multi-sink alert dispatch.
 */

export * from './threshold-evaluator.js';
export * from './notification-sink.js';
export * from './log-sink.js';
export * from './console-sink.js';
export * from './desktop-sink.js';
export * from './alert-dispatcher.js';
