/**
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Syntax tree model and traversal
export * from './core/tree/index.js';

// Evidence and aggregation
export * from './core/evidence/index.js';

// Pattern detectors
export * from './core/detectors/index.js';

// Diagnostics
export * from './core/diagnostics/index.js';

// Package discovery, resolution and installation
export * from './core/discovery/packages.js';
export * from './core/resolver/index.js';
export * from './core/packages/installer.js';

// Survey driver
export * from './core/survey/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
