export * from './loop-controller.js';
