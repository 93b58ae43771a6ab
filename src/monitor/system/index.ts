export * from './commands.js';
export * from './detection.js';
