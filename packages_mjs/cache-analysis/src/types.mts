/**
 * Types for cross-header analysis
 */

import type { EntityTag, HeaderIndex } from '@conformance/header-analyzers';
import type { HttpMessage } from '@conformance/http-wire-parser';
import type { Note } from '@conformance/notes';

/**
 * Which caches may store the response
 */
export type CacheableBy = 'none' | 'private' | 'shared';

/**
 * Where the freshness lifetime came from
 */
export type FreshnessSource = 's-maxage' | 'max-age' | 'expires' | 'heuristic' | 'none';

export type ValidatorStrength = 'strong' | 'weak' | 'none';

/**
 * What the analysis needs to know about the exchange beyond the response
 */
export interface ResponseContext {
  /** Method of the request that produced the response. Default: GET */
  requestMethod?: string;
  /** Header fields of that request */
  requestHeaders?: ReadonlyArray<{ readonly name: string; readonly value: string }>;
  /** Local time the response was received, in epoch seconds */
  receivedAt: number;
}

export interface Validators {
  strength: ValidatorStrength;
  etag?: EntityTag;
  /** Last-Modified in epoch seconds */
  lastModified?: number;
}

/**
 * Facts derived from several headers together
 */
export interface ResponseFacts {
  /** Freshness lifetime in seconds */
  freshnessLifetime: number | 'uncacheable';
  freshnessSource: FreshnessSource;
  /** Current age in seconds */
  currentAge: number;
  /** Seconds until the response becomes stale; 0 once stale */
  remainingFreshness: number;
  cacheableBy: CacheableBy;
  validators: Validators;
}

export interface CrossHeaderResult {
  readonly facts: ResponseFacts;
  readonly notes: readonly Note[];
}

/**
 * A parsed response together with its analyzed headers
 */
export interface AnalyzedResponse {
  message: HttpMessage;
  headers: HeaderIndex;
}

/**
 * Outcome of comparing a response with its content-negotiated variant
 */
export interface NegotiationFacts {
  /** The negotiated variant came back gzip-encoded */
  supported: boolean;
  /** Bytes saved by the encoding, as a percentage of the original; negative when larger */
  savings?: number;
  originalLength?: number;
  encodedLength?: number;
}

export interface NegotiationResult {
  readonly facts: NegotiationFacts;
  readonly notes: readonly Note[];
}
