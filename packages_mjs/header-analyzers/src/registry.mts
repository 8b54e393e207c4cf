/**
 * Registry of header analyzers and the typed index of analyzed fields
 */

import type { Note } from '@conformance/notes';
import { acceptRanges, contentRange } from './analyzers/range.mjs';
import { age, cacheControl, pragma, warning } from './analyzers/caching.mjs';
import { allow, link, server, via } from './analyzers/general.mjs';
import { connection, keepAlive, trailer, transferEncoding, upgrade } from './analyzers/connection.mjs';
import {
  contentDisposition,
  contentEncoding,
  contentLanguage,
  contentLength,
  contentType,
} from './analyzers/content.mjs';
import { date, expires, lastModified } from './analyzers/dates.mjs';
import { location, retryAfter } from './analyzers/redirection.mjs';
import { setCookie } from './analyzers/cookies.mjs';
import {
  accessControlAllowOrigin,
  strictTransportSecurity,
  xContentTypeOptions,
  xFrameOptions,
  xXssProtection,
} from './analyzers/security.mjs';
import { etag } from './analyzers/validators.mjs';
import { vary } from './analyzers/vary.mjs';
import { analyzeGeneric, isRegisteredField } from './generic.mjs';
import type { FieldContext, HeaderAnalyzer, HeaderResult, HeaderTypes, KnownHeader } from './types.mjs';

type AnalyzerMap = { readonly [K in KnownHeader]: HeaderAnalyzer<HeaderTypes[K]> };

type TypedResults = { [K in KnownHeader]?: HeaderResult<HeaderTypes[K]> };

/**
 * Dedicated analyzers, keyed by lower-cased field name
 */
export const ANALYZERS: AnalyzerMap = Object.freeze({
  'accept-ranges': acceptRanges,
  'access-control-allow-origin': accessControlAllowOrigin,
  age,
  allow,
  'cache-control': cacheControl,
  connection,
  'content-disposition': contentDisposition,
  'content-encoding': contentEncoding,
  'content-language': contentLanguage,
  'content-length': contentLength,
  'content-range': contentRange,
  'content-type': contentType,
  date,
  etag,
  expires,
  'keep-alive': keepAlive,
  'last-modified': lastModified,
  link,
  location,
  pragma,
  'retry-after': retryAfter,
  server,
  'set-cookie': setCookie,
  'strict-transport-security': strictTransportSecurity,
  trailer,
  'transfer-encoding': transferEncoding,
  upgrade,
  vary,
  via,
  warning,
  'x-content-type-options': xContentTypeOptions,
  'x-frame-options': xFrameOptions,
  'x-xss-protection': xXssProtection,
});

/**
 * Whether a lower-cased name has a dedicated analyzer
 */
export function isKnownHeader(key: string): key is KnownHeader {
  return Object.hasOwn(ANALYZERS, key);
}

/**
 * Look up the dedicated analyzer for a field name (case-insensitive)
 */
export function getAnalyzer(name: string): HeaderAnalyzer | undefined {
  const key = name.toLowerCase();
  return isKnownHeader(key) ? ANALYZERS[key] : undefined;
}

function analyzeKnown<K extends KnownHeader>(
  key: K,
  values: readonly string[],
  context: FieldContext,
  displayName: string,
  typed: { [P in K]?: HeaderResult<HeaderTypes[P]> }
): HeaderResult {
  const result = ANALYZERS[key].analyze(values, context, displayName);
  typed[key] = result;
  return result;
}

/**
 * Analyze every line of one header field
 *
 * @example
 * const result = analyzeHeader('Cache-Control', ['max-age=60', 'public']);
 * result.value; // { 'max-age': 60, public: true }
 */
export function analyzeHeader(
  name: string,
  values: readonly string[],
  context: FieldContext = {}
): HeaderResult {
  const analyzer = getAnalyzer(name);
  return analyzer ? analyzer.analyze(values, context, name) : analyzeGeneric(name, values, context);
}

/**
 * Analyzed header fields in the order their names were first received
 */
export class HeaderIndex implements Iterable<HeaderResult> {
  private readonly ordered: readonly HeaderResult[];
  private readonly byKey: ReadonlyMap<string, HeaderResult>;

  constructor(results: readonly HeaderResult[], private readonly typed: Readonly<TypedResults>) {
    this.ordered = Object.freeze([...results]);
    this.byKey = new Map(results.map((r) => [r.key, r]));
  }

  /**
   * Result for a field name (case-insensitive)
   */
  get<K extends KnownHeader>(name: K): HeaderResult<HeaderTypes[K]> | undefined;
  get(name: string): HeaderResult | undefined;
  get(name: string): HeaderResult | undefined {
    return this.byKey.get(name.toLowerCase());
  }

  /**
   * Typed value of a header with a dedicated analyzer
   */
  value<K extends KnownHeader>(name: K): HeaderTypes[K] | undefined {
    return this.typed[name]?.value;
  }

  has(name: string): boolean {
    return this.byKey.has(name.toLowerCase());
  }

  get size(): number {
    return this.ordered.length;
  }

  results(): readonly HeaderResult[] {
    return this.ordered;
  }

  /**
   * Every analyzer note, in header order
   */
  notes(): Note[] {
    return this.ordered.flatMap((r) => r.notes);
  }

  [Symbol.iterator](): Iterator<HeaderResult> {
    return this.ordered[Symbol.iterator]();
  }
}

/**
 * Analyze a message's header fields.
 *
 * Fields sharing a name are grouped (in received order) and analyzed together;
 * groups are ordered by the first appearance of their name.
 */
export function analyzeHeaders(
  fields: ReadonlyArray<{ readonly name: string; readonly value: string }>,
  context: FieldContext = {}
): HeaderIndex {
  const groups = new Map<string, { name: string; values: string[] }>();
  for (const field of fields) {
    const key = field.name.toLowerCase();
    const group = groups.get(key);
    if (group) {
      group.values.push(field.value);
    } else {
      groups.set(key, { name: field.name, values: [field.value] });
    }
  }

  const typed: TypedResults = {};
  const results: HeaderResult[] = [];
  for (const [key, { name, values }] of groups) {
    results.push(
      isKnownHeader(key)
        ? analyzeKnown(key, values, context, name, typed)
        : analyzeGeneric(name, values, context)
    );
  }

  return new HeaderIndex(results, typed);
}

/**
 * Names with neither a dedicated analyzer nor acceptance by the fallback
 *
 * Used to check that every registered field name is covered.
 */
export function checkRegistryCoverage(names: Iterable<string>): string[] {
  const missing: string[] = [];
  for (const name of names) {
    const key = name.toLowerCase();
    if (!isKnownHeader(key) && !isRegisteredField(key)) {
      missing.push(name);
    }
  }
  return missing;
}

/**
 * Analyzers whose repeat handling is a comma-join default rather than part
 * of the header's definition
 */
export function listImplicitCombinationRules(): string[] {
  return Object.values(ANALYZERS)
    .filter((a) => !a.combineDocumented)
    .map((a) => a.name);
}
