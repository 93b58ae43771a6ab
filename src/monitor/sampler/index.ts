/**
 * Sampler Component
 *
 * Reads raw OS counters and derives utilization percentages.
 */

export * from './parsers.js';
export * from './temperature.js';
export * from './system-sampler.js';
