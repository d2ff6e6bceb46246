/**
 * Diagnostics exports barrel file.
 */
export * from './types.js';
export * from './stats.js';
export * from './advisor.js';
