/**
 * @modelvault/core - Main entry point
 *
 * Model catalog, download engine and local install tracking for Node.js.
 */

// Engine facade
export * from './vault/index.js';

// Catalog
export * from './catalog/index.js';

// Downloads
export * from './acquisition/index.js';

// Installed models
export * from './storage/index.js';
export * from './reconciler/index.js';
export * from './poller/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Utilities
export * from './utils/index.js';
