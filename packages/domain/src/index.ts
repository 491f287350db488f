export * from './models.js';
export * from './extraction.js';
