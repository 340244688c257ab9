export * from './cluster-stats.js';
export * from './nodes-stats.js';
