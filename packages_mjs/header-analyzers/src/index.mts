/**
 * @conformance/header-analyzers
 * Per-header grammar and semantic checks with typed results
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';
export type { HttpDate, HttpDateFormat, NameValue } from './syntax.mjs';

export { HeaderSyntaxError } from './errors.mjs';
export {
  DELTA_SECONDS_MAX,
  isToken,
  isQuotedString,
  unquote,
  splitOutsideQuotes,
  splitList,
  parseNameValue,
  parseParameters,
  parseDeltaSeconds,
  parseHttpDate,
  formatHttpDate,
} from './syntax.mjs';
export { COMMON_NOTES } from './notes.mjs';
export { defineHeader, combineFields } from './analyzer.mjs';
export { analyzeGeneric, isRegisteredField, REGISTERED_FIELDS } from './generic.mjs';
export {
  ANALYZERS,
  HeaderIndex,
  analyzeHeader,
  analyzeHeaders,
  getAnalyzer,
  isKnownHeader,
  checkRegistryCoverage,
  listImplicitCombinationRules,
} from './registry.mjs';

// Per-header note catalogues and helpers
export { CACHING_NOTES } from './analyzers/caching.mjs';
export { DATE_NOTES } from './analyzers/dates.mjs';
export { VARY_NOTES } from './analyzers/vary.mjs';
export { CONTENT_NOTES, parseMediaType } from './analyzers/content.mjs';
export { CONNECTION_NOTES } from './analyzers/connection.mjs';
export { RANGE_NOTES, parseContentRange } from './analyzers/range.mjs';
export { REDIRECTION_NOTES } from './analyzers/redirection.mjs';
export { COOKIE_NOTES } from './analyzers/cookies.mjs';
export { SECURITY_NOTES } from './analyzers/security.mjs';
export { GENERAL_NOTES } from './analyzers/general.mjs';
export { parseEntityTag, strongMatch, weakMatch } from './analyzers/validators.mjs';
