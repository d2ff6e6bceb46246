/**
 * Resolver exports barrel file.
 */
export * from './types.js';
export * from './manifest.js';
export * from './symbols.js';
export * from './tree-builder.js';
export * from './ts-morph-resolver.js';
