/**
 * Host Monitor - Type Definitions
 */

export * from './snapshot.js';
export * from './alert.js';
export * from './process-entry.js';
export * from './monitor-config.js';
