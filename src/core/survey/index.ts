/**
 * Survey driver exports barrel file.
 */
export * from './types.js';
export * from './driver.js';
