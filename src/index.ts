/**
 * layerviz library exports.
 */

// Image model, hierarchy and renderers
export * from './core/images/index.js';

// Configuration
export * from './core/config/index.js';

// Image sources
export * from './engine/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
