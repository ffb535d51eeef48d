/**
 * @rowbridge/core
 *
 * Canonical schema and row model shared by the warehouse converters
 */

// Types
export * from './types/index.js';

// Canonical values
export * from './values/decimal.js';
export * from './values/local-date-time.js';

// Schema builders and helpers
export * from './schema/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
