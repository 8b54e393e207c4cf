/**
 * Types for resource checking
 */

import type { Buffer } from 'node:buffer';
import type { NegotiationFacts, ResponseFacts } from '@conformance/cache-analysis';
import type { HeaderResult } from '@conformance/header-analyzers';
import type { HttpMessage } from '@conformance/http-wire-parser';
import type { Note } from '@conformance/notes';
import type { TransportErrorCode } from './errors.mjs';

export interface RequestHeader {
  readonly name: string;
  readonly value: string;
}

/**
 * A request handed to the fetch capability
 */
export interface ExchangeRequest {
  /** Absolute http(s) URI */
  uri: string;
  method: string;
  /** Header fields to send, in order; Host and Connection are added by the fetcher */
  headers: readonly RequestHeader[];
  /** Aborted when the fetch times out */
  signal: AbortSignal;
  /** Stop reading once this many response bytes have arrived */
  maxResponseBytes: number;
}

/**
 * Bytes exchanged on the wire, verbatim
 */
export interface RawExchange {
  request: Buffer;
  response: Buffer;
  /** Reading stopped at maxResponseBytes before the peer finished */
  truncated: boolean;
}

/**
 * The fetch capability. Rejects with TransportError on network failure.
 */
export type ExchangeFetcher = (request: ExchangeRequest) => Promise<RawExchange>;

/**
 * How an auxiliary fetch relates to the Diagnosis that issued it
 */
export type RelationKind = 'redirect-target' | 'conditional-retry' | 'range-retry' | 'negotiation-retry';

export type DiagnosisState =
  | 'fetching'
  | 'parsed'
  | 'analyzed'
  | 'following-redirect'
  | 'retrying-conditional'
  | 'retrying-range'
  | 'retrying-negotiation'
  | 'done'
  | 'failed';

export type FinalState = Extract<DiagnosisState, 'done' | 'failed'>;

/**
 * The request as it was actually sent
 */
export interface SentRequest {
  readonly method: string;
  readonly headers: readonly RequestHeader[];
  /** Parsed from the bytes the fetcher wrote */
  readonly message?: HttpMessage;
}

export interface DiagnosisFacts extends ResponseFacts {
  /** Present when a negotiation-retry was made */
  readonly negotiation?: NegotiationFacts;
}

export interface Timing {
  /** Epoch milliseconds */
  readonly startedAt: number;
  /** Milliseconds from the start of the fetch to the finished Diagnosis */
  readonly elapsed: number;
}

export interface RelatedDiagnosis {
  readonly relation: RelationKind;
  readonly diagnosis: Diagnosis;
}

/**
 * Complete analysis of one fetched resource. Deep-frozen.
 */
export interface Diagnosis {
  readonly uri: string;
  readonly request: SentRequest;
  readonly state: FinalState;
  /** Absent when nothing could be parsed */
  readonly response?: HttpMessage;
  /** Header results keyed by lower-cased name, in header-field order */
  readonly headers: Readonly<Record<string, HeaderResult>>;
  readonly notes: readonly Note[];
  readonly facts?: DiagnosisFacts;
  /** Transport failure that left the Diagnosis without a response */
  readonly error?: { readonly code: TransportErrorCode; readonly message: string };
  readonly timing: Timing;
  readonly related: readonly RelatedDiagnosis[];
}

export interface CheckOptions {
  /** Default: GET */
  method?: string;
  headers?: readonly RequestHeader[];
}
