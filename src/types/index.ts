export * from './run.js';
export * from './citation.js';
