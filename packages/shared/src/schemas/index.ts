export * from './bar.schema.js';
export * from './exit-spec.schema.js';
export * from './simulator-config.schema.js';
