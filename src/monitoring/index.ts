export * from './monitor.js';
export * from './system.js';
