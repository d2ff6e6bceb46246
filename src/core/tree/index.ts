/**
 * Syntax tree exports barrel file.
 */
export * from './types.js';
export * as nodes from './nodes.js';
export * from './walker.js';
