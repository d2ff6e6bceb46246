/**
 * Evidence exports barrel file.
 */
export * from './types.js';
export * from './aggregator.js';
