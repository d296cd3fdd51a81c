export * from './results.js';
export * from './task-queries.js';
export * from './category-queries.js';
export * from './stats-queries.js';
