/**
 * @conformance/resource-check
 * Fetch orchestration and diagnosis aggregation
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';
export type { AnalyzeExchangeOptions, ExchangeAnalysis } from './analysis.mjs';
export type { CheckerConfig, CheckerConfigInput } from './config.mjs';
export type { CheckerOptions, ResourceChecker } from './checker.mjs';
export type {
  DiagnosticsEvent,
  FetchEndEvent,
  FetchErrorEvent,
  FetchStartEvent,
  StateChangeEvent,
} from './diagnostics.mjs';
export type {
  DiagnosisDocument,
  HeaderDocument,
  JsonValue,
  MessageDocument,
  NoteDocument,
} from './document.mjs';
export type { TransportErrorCode } from './errors.mjs';
export type { Logger } from './logger.mjs';
export type { SocketFetcherOptions } from './fetcher.mjs';

export { Checker, createResourceChecker } from './checker.mjs';
export { analyzeCapture, analyzeExchange } from './analysis.mjs';
export { deepFreeze, finishDiagnosis } from './aggregate.mjs';
export {
  CheckerConfigSchema,
  DEFAULT_CHECKER_CONFIG,
  DEFAULT_USER_AGENT,
  configFromEnv,
  mergeConfig,
} from './config.mjs';
export {
  CHANNELS,
  onAllEvents,
  onFetchEnd,
  onFetchError,
  onFetchStart,
  onStateChange,
} from './diagnostics.mjs';
export { toDocument, toJsonValue } from './document.mjs';
export { ConfigurationError, TransportError, toTransportError } from './errors.mjs';
export { buildRequestBytes, connectOptions, createSocketFetcher } from './fetcher.mjs';
export { createLogger, logger } from './logger.mjs';
export { FETCH_NOTES } from './notes.mjs';
export { PARSER_NOTES } from './parser-notes.mjs';
export { planProbes } from './probes.mjs';
