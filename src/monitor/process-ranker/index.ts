export * from './process-ranker.js';
