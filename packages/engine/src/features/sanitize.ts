/**
 * Feature value sanitization
 *
 * Every emitted value is finite. Derived values are also clamped to
 * ±FEATURE_CLAMP; raw prices and quantities are passed through.
 */

import {
  FEATURE_CLAMP,
  FEATURE_KEYS,
  RAW_FEATURE_KEYS,
  type FeatureKey,
  type FeatureVector,
} from '@candlelab/shared';

export function sanitizeFeatureValue(key: FeatureKey, value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  if (value === Infinity) {
    return FEATURE_CLAMP;
  }
  if (value === -Infinity) {
    return -FEATURE_CLAMP;
  }
  if (RAW_FEATURE_KEYS.has(key)) {
    return value;
  }
  return Math.min(FEATURE_CLAMP, Math.max(-FEATURE_CLAMP, value));
}

/**
 * Sanitize in place and freeze
 */
export function finalizeFeatures(values: Record<FeatureKey, number>): FeatureVector {
  for (const key of FEATURE_KEYS) {
    values[key] = sanitizeFeatureValue(key, values[key]);
  }
  return Object.freeze(values);
}
