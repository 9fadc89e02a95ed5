/**
 * @candlelab/shared - Shared types, schemas, and utilities
 *
 * This package contains the feature-vector contract and the domain types
 * shared between the engine and whatever consumes its output.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './utils/load-env.js';
