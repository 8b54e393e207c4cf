/**
 * Which caches may store a response (RFC 9111 §3)
 */

import { defineNotes, rfc } from '@conformance/notes';
import type { NoteList, NoteSubject } from '@conformance/notes';
import type { CacheDirectives, HeaderIndex } from '@conformance/header-analyzers';
import type { CacheableBy } from './types.mjs';

export const CACHEABILITY_NOTES = defineNotes({
  METHOD_UNCACHEABLE: {
    level: 'info',
    category: 'caching',
    summary: 'Responses to the {method} method can\'t be stored by caches.',
    detail: 'Caches only store responses to GET and HEAD here; the response to {method} will not be reused.',
    reference: rfc(9111, '3'),
  },
  NO_STORE: {
    level: 'info',
    category: 'caching',
    summary: 'This response can\'t be stored by a cache.',
    detail: 'The no-store Cache-Control directive forbids any cache from storing this response.',
    reference: rfc(9111, '5.2.2.5'),
  },
  STATUS_UNCACHEABLE: {
    level: 'info',
    category: 'caching',
    summary: 'Responses with status {status} can\'t be stored without explicit freshness.',
    detail:
      'Caches can only store a {status} response when it carries explicit freshness information ' +
      '(max-age, s-maxage, Expires) or the public directive, and this one does not.',
    reference: rfc(9111, '3'),
  },
  PRIVATE_CC: {
    level: 'info',
    category: 'caching',
    summary: 'Only browser caches can store this response.',
    detail: 'The private Cache-Control directive keeps shared caches (proxies, CDNs) from storing it.',
    reference: rfc(9111, '5.2.2.7'),
  },
  PRIVATE_AUTH: {
    level: 'info',
    category: 'caching',
    summary: 'Only browser caches can store this response, because the request was authenticated.',
    detail:
      'Shared caches cannot store responses to requests with Authorization unless the response ' +
      'has public, s-maxage or must-revalidate.',
    reference: rfc(9111, '3.5'),
  },
  STOREABLE: {
    level: 'info',
    category: 'caching',
    summary: 'This response allows all caches to store it.',
    detail: 'Both browser caches and shared caches (proxies, CDNs) may store and reuse this response.',
    reference: rfc(9111, '3'),
  },
});

/**
 * Status codes that are heuristically cacheable by default (RFC 9110 §15.1)
 */
export const HEURISTICALLY_CACHEABLE_STATUS: ReadonlySet<number> = new Set([
  200, 203, 204, 206, 300, 301, 308, 404, 405, 410, 414, 501,
]);

export function isCacheableStatus(statusCode: number): boolean {
  return HEURISTICALLY_CACHEABLE_STATUS.has(statusCode);
}

export const CACHEABLE_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

export function isCacheableMethod(method: string): boolean {
  return CACHEABLE_METHODS.has(method.toUpperCase());
}

/**
 * Whether the response carries explicit freshness or public
 */
function hasExplicitFreshness(directives: CacheDirectives, headers: HeaderIndex): boolean {
  return (
    typeof directives['max-age'] === 'number' ||
    typeof directives['s-maxage'] === 'number' ||
    'public' in directives ||
    headers.has('expires')
  );
}

export interface CacheabilityInput {
  statusCode: number;
  requestMethod: string;
  /** The request carried Authorization */
  authorized: boolean;
  headers: HeaderIndex;
}

/**
 * Decide which caches may store the response; the deciding rule is recorded
 * as a note.
 */
export function determineCacheability(
  { statusCode, requestMethod, authorized, headers }: CacheabilityInput,
  notes: NoteList,
  subject: NoteSubject
): CacheableBy {
  const directives = headers.value('cache-control') ?? {};

  if (!isCacheableMethod(requestMethod)) {
    notes.emit(subject, CACHEABILITY_NOTES.METHOD_UNCACHEABLE, { method: requestMethod });
    return 'none';
  }
  if ('no-store' in directives) {
    notes.emit(subject, CACHEABILITY_NOTES.NO_STORE);
    return 'none';
  }
  if (!isCacheableStatus(statusCode) && !hasExplicitFreshness(directives, headers)) {
    notes.emit(subject, CACHEABILITY_NOTES.STATUS_UNCACHEABLE, { status: statusCode });
    return 'none';
  }
  if ('private' in directives) {
    notes.emit(subject, CACHEABILITY_NOTES.PRIVATE_CC);
    return 'private';
  }
  if (authorized && !('public' in directives || 's-maxage' in directives || 'must-revalidate' in directives)) {
    notes.emit(subject, CACHEABILITY_NOTES.PRIVATE_AUTH);
    return 'private';
  }

  notes.emit(subject, CACHEABILITY_NOTES.STOREABLE);
  return 'shared';
}
