export * from './auxiliary.js';
export * from './report-renderer.js';
