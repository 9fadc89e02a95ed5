/**
 * Shared types for candlelab
 */

export * from './market.js';
export * from './position.js';
export * from './features.js';
export * from './indicator.js';
