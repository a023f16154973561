/**
 * @termrecon/core
 *
 * Data model and shared plumbing for term sheet reconciliation
 */

// Types
export * from './types/index.js';

// Models
export * from './models/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';
