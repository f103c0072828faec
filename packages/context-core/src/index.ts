/**
 * @repo-context/core
 * Core utilities, errors, configuration and constants for repo-context
 */

export * from './types/index.js';

// Errors
export * from './error/context-error.js';

// Utils
export * from './utils/token.js';
export * from './utils/paths.js';
export * from './utils/logger.js';

// Configuration
export * from './config/schema.js';
export * from './defaults.js';
