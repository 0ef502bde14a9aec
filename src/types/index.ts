export * from './endpoint.js';
export * from './analysis.js';
