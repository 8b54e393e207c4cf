/**
 * @conformance/cache-analysis
 * Freshness, cacheability, validator and content-negotiation analysis across headers
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';
export type { CacheabilityInput } from './cacheability.mjs';
export type { Freshness, FreshnessInput } from './freshness.mjs';
export type { ValidatorKind } from './relations.mjs';

export { analyzeResponse } from './analyze.mjs';
export {
  CACHEABILITY_NOTES,
  CACHEABLE_METHODS,
  HEURISTICALLY_CACHEABLE_STATUS,
  determineCacheability,
  isCacheableMethod,
  isCacheableStatus,
} from './cacheability.mjs';
export {
  FRESHNESS_NOTES,
  HEURISTIC_FRACTION,
  HEURISTIC_FRESHNESS_CAP,
  computeFreshness,
  currentAge,
} from './freshness.mjs';
export { VALIDATOR_NOTES, determineValidators } from './validators.mjs';
export {
  MESSAGE_NOTES,
  CLOCK_SKEW_TOLERANCE,
  checkContentLength,
  checkDate,
  checkRedirect,
} from './message-checks.mjs';
export { NEGOTIATION_NOTES, evaluateVaryAgainst } from './negotiation.mjs';
export { RELATION_NOTES, evaluateConditional, evaluateRange } from './relations.mjs';
export { statusOf } from './util.mjs';
