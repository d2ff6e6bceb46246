/**
 * Pattern detector exports barrel file.
 */
export * from './types.js';
export * from './composite.js';
export * from './tearoff.js';
export * from './type-literal.js';
export * from './registry.js';
