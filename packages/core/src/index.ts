/**
 * @regwatch/core
 *
 * Domain types, error taxonomy and shared utilities for registry change tracking
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
