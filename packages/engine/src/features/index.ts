/**
 * Feature pipeline
 */

export { FeaturePipeline, type FeaturePipelineOptions } from './feature-pipeline.js';
export { sanitizeFeatureValue, finalizeFeatures } from './sanitize.js';
