/**
 * Types for per-header analysis
 */

import type { Note, NoteCategory, NoteDefinition, NoteVars, SpecReference } from '@conformance/notes';
import type { HttpDate } from './syntax.mjs';

/**
 * What an analyzer may know about the message its field came from
 */
export interface FieldContext {
  /** Response status code; absent for requests */
  statusCode?: number;
  /** Method of the request (the message itself, or the one a response answers) */
  requestMethod?: string;
  /** URI the message was fetched from, for resolving references */
  baseUri?: string;
}

/**
 * How repeated field lines are combined before parsing
 *
 * - list: comma-joined and split into elements
 * - singleton: only one value is allowed; the last one is used
 * - separate: each field line is parsed on its own and never joined
 */
export type CombinePolicy = 'list' | 'singleton' | 'separate';

/**
 * Outcome of analyzing every line of one header field
 */
export interface HeaderResult<T = unknown> {
  /** Field name as first received */
  readonly name: string;
  /** Lower-cased field name */
  readonly key: string;
  /** Raw values, one per field line, in order */
  readonly values: readonly string[];
  /** Typed value; undefined when the value could not be parsed */
  readonly value: T | undefined;
  readonly notes: readonly Note[];
  /** Produced by a dedicated analyzer rather than the generic fallback */
  readonly dedicated: boolean;
}

/**
 * Input handed to an analyzer's parse step
 */
export interface AnalyzerInput {
  /** Field lines as received */
  fields: readonly string[];
  /** Combined value: comma-joined for lists, last line for singletons */
  value: string;
  /** List elements (for singletons, the single value) */
  elements: string[];
}

/**
 * Notes and message details available while parsing a header
 */
export interface AnalyzerContext {
  readonly field: FieldContext;
  /** Attach a note to the header being analyzed */
  note(definition: NoteDefinition, vars?: NoteVars): void;
}

/**
 * Declarative description of a header analyzer
 */
export interface HeaderSpec<T> {
  /** Canonical display name, e.g. "Cache-Control" */
  name: string;
  category: NoteCategory;
  reference: SpecReference;
  combine: CombinePolicy;
  /**
   * The combination rule comes from the header's definition.
   * False means comma-joining was chosen as a default and needs review.
   */
  combineDocumented?: boolean;
  /** Repeated identical values are not reported (e.g. Content-Length) */
  allowIdenticalRepeats?: boolean;
  /** Parse and check the value; throw HeaderSyntaxError when it cannot be parsed */
  parse(input: AnalyzerInput, context: AnalyzerContext): T | undefined;
}

/**
 * A header analyzer: consumes one field's values and returns a typed result
 */
export interface HeaderAnalyzer<T = unknown> {
  readonly name: string;
  readonly key: string;
  readonly category: NoteCategory;
  readonly reference: SpecReference;
  readonly combine: CombinePolicy;
  readonly combineDocumented: boolean;
  analyze(values: readonly string[], context?: FieldContext, displayName?: string): HeaderResult<T>;
}

// --- typed values ---

/**
 * Cache-Control directives, keyed by lower-cased name.
 * Delta-seconds directives are numbers; directives without a value are true.
 */
export type CacheDirectives = Readonly<Record<string, number | string | true>>;

export interface EntityTag {
  weak: boolean;
  /** Opaque tag, without quotes */
  tag: string;
}

export interface MediaType {
  /** "type/subtype", lower-cased */
  mediaType: string;
  type: string;
  subtype: string;
  params: Readonly<Record<string, string>>;
}

export interface ContentRange {
  unit: string;
  /** Absent for unsatisfied ranges ("bytes *\/1234") */
  first?: number;
  last?: number;
  /** Complete length, or "*" when unknown */
  complete: number | '*';
}

export interface ContentDisposition {
  type: string;
  params: Readonly<Record<string, string>>;
}

export interface CookieValue {
  name: string;
  value: string;
  /** Attributes keyed by lower-cased name; flags are true */
  attributes: Readonly<Record<string, string | true>>;
}

export interface LinkValue {
  target: string;
  params: Readonly<Record<string, string>>;
}

export interface StrictTransportSecurity {
  maxAge: number;
  includeSubDomains: boolean;
  preload: boolean;
}

export type RetryAfter = { seconds: number } | { date: HttpDate };

export interface FrameOptions {
  policy: 'deny' | 'sameorigin' | 'allow-from';
  origin?: string;
}

export interface XssProtection {
  enabled: boolean;
  mode?: string;
  report?: string;
}

/**
 * Typed value of each header with a dedicated analyzer, keyed by lower-cased name
 */
export interface HeaderTypes {
  'accept-ranges': string[];
  'access-control-allow-origin': string;
  age: number;
  allow: string[];
  'cache-control': CacheDirectives;
  connection: string[];
  'content-disposition': ContentDisposition;
  'content-encoding': string[];
  'content-language': string[];
  'content-length': number;
  'content-range': ContentRange;
  'content-type': MediaType;
  date: HttpDate;
  etag: EntityTag;
  expires: HttpDate;
  'keep-alive': Readonly<Record<string, string | true>>;
  'last-modified': HttpDate;
  link: LinkValue[];
  location: string;
  pragma: string[];
  'retry-after': RetryAfter;
  server: string;
  'set-cookie': CookieValue[];
  'strict-transport-security': StrictTransportSecurity;
  trailer: string[];
  'transfer-encoding': string[];
  upgrade: string[];
  vary: string[];
  via: string[];
  warning: string[];
  'x-content-type-options': string;
  'x-frame-options': FrameOptions;
  'x-xss-protection': XssProtection;
}

export type KnownHeader = keyof HeaderTypes;
