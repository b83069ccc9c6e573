/**
 * Library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Targets in configuration documents
export * from './core/targets/index.js';
export * from './core/documents/index.js';

// Module resolution
export * from './core/resolution/index.js';
export * from './core/environment/index.js';

// Python signatures
export * from './core/signatures/index.js';

// Findings and the analysis facade
export * from './core/diagnostics/index.js';
export * from './core/analysis/index.js';
export * from './core/cache/index.js';

// Language server
export * from './server/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
