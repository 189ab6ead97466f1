export * from './task.js';
export * from './chart.js';
