/**
 * Freshness lifetime and age calculation (RFC 9111 §4.2)
 */

import { defineNotes, rfc } from '@conformance/notes';
import type { NoteList, NoteSubject } from '@conformance/notes';
import type { HeaderIndex } from '@conformance/header-analyzers';
import { isCacheableStatus } from './cacheability.mjs';
import type { CacheableBy, FreshnessSource } from './types.mjs';

export const FRESHNESS_NOTES = defineNotes({
  FRESHNESS_FRESH: {
    level: 'good',
    category: 'caching',
    summary: 'This response is fresh for {remaining} seconds.',
    detail:
      'Its freshness lifetime is {lifetime} seconds (from {source}) and its current age is ' +
      '{age} seconds, so caches can reuse it without contacting the server.',
    reference: rfc(9111, '4.2'),
  },
  FRESHNESS_STALE: {
    level: 'info',
    category: 'caching',
    summary: 'This response is already stale.',
    detail:
      'Its freshness lifetime is {lifetime} seconds (from {source}) but its current age is ' +
      '{age} seconds. Caches have to revalidate it before reuse.',
    reference: rfc(9111, '4.2'),
  },
  FRESHNESS_HEURISTIC: {
    level: 'info',
    category: 'caching',
    summary: 'Caches can assign a heuristic freshness of {lifetime} seconds to this response.',
    detail:
      'There is no explicit freshness information, so caches may calculate one from Last-Modified: ' +
      '10% of the time since the response last changed, up to a day.',
    reference: rfc(9111, '4.2.2'),
  },
  FRESHNESS_NONE: {
    level: 'info',
    category: 'caching',
    summary: 'This response has no freshness information.',
    detail: 'Caches can store it, but have to revalidate it every time it is used.',
    reference: rfc(9111, '4.2.1'),
  },
  FRESHNESS_CLOCKLESS: {
    level: 'warning',
    category: 'caching',
    summary: 'Expires is used without a valid Date header.',
    detail:
      'Without Date the freshness lifetime depends on the recipient\'s clock; it was calculated ' +
      'against the local time the response was received.',
    reference: rfc(9111, '5.3'),
  },
  EXPIRES_INVALID: {
    level: 'info',
    category: 'caching',
    summary: 'The invalid Expires value makes this response already expired.',
    detail: 'Caches treat an Expires value they cannot parse as a time in the past.',
    reference: rfc(9111, '5.3'),
  },
  NO_CACHE: {
    level: 'info',
    category: 'caching',
    summary: 'This response cannot be served from cache without validation.',
    detail: 'The no-cache directive requires caches to check with the server before every reuse.',
    reference: rfc(9111, '5.2.2.4'),
  },
  MUST_REVALIDATE: {
    level: 'info',
    category: 'caching',
    summary: 'Caches must revalidate this response once it becomes stale.',
    detail: 'must-revalidate forbids serving the response stale, even when the server cannot be reached.',
    reference: rfc(9111, '5.2.2.2'),
  },
});

/**
 * Upper bound for heuristic freshness: one day
 */
export const HEURISTIC_FRESHNESS_CAP = 86400;

/**
 * Fraction of the time since Last-Modified used as heuristic freshness
 */
export const HEURISTIC_FRACTION = 0.1;

export interface FreshnessInput {
  statusCode: number;
  headers: HeaderIndex;
  cacheableBy: CacheableBy;
  /** Local receive time, epoch seconds */
  receivedAt: number;
}

export interface Freshness {
  lifetime: number | 'uncacheable';
  source: FreshnessSource;
  currentAge: number;
  remaining: number;
}

/**
 * Current age: the larger of the Age header and the apparent age
 */
export function currentAge(headers: HeaderIndex, receivedAt: number): number {
  const ageValue = headers.value('age') ?? 0;
  const date = headers.value('date');
  const apparentAge = date ? Math.max(0, receivedAt - date.time) : 0;
  return Math.max(ageValue, apparentAge);
}

function lifetimeOf(
  { statusCode, headers, cacheableBy, receivedAt }: FreshnessInput,
  notes: NoteList,
  subject: NoteSubject
): { lifetime: number; source: FreshnessSource } {
  const directives = headers.value('cache-control') ?? {};
  const sMaxAge = directives['s-maxage'];
  const maxAge = directives['max-age'];

  if (cacheableBy === 'shared' && typeof sMaxAge === 'number') {
    return { lifetime: sMaxAge, source: 's-maxage' };
  }
  if (typeof maxAge === 'number') {
    return { lifetime: maxAge, source: 'max-age' };
  }

  const date = headers.value('date');
  const base = date ? date.time : receivedAt;

  if (headers.has('expires')) {
    const expires = headers.value('expires');
    if (!expires) {
      notes.emit(subject, FRESHNESS_NOTES.EXPIRES_INVALID);
      return { lifetime: 0, source: 'expires' };
    }
    if (!date) {
      notes.emit(subject, FRESHNESS_NOTES.FRESHNESS_CLOCKLESS);
    }
    return { lifetime: Math.max(0, expires.time - base), source: 'expires' };
  }

  const lastModified = headers.value('last-modified');
  if (lastModified && isCacheableStatus(statusCode) && base > lastModified.time) {
    const sinceModified = base - lastModified.time;
    const lifetime = Math.min(Math.floor(sinceModified * HEURISTIC_FRACTION), HEURISTIC_FRESHNESS_CAP);
    notes.emit(subject, FRESHNESS_NOTES.FRESHNESS_HEURISTIC, { lifetime });
    return { lifetime, source: 'heuristic' };
  }

  return { lifetime: 0, source: 'none' };
}

/**
 * Calculate freshness lifetime, current age and remaining freshness.
 *
 * Remaining freshness never goes below zero; a stale response gets a note.
 *
 * @example
 * // Cache-Control: max-age=100, Age: 40
 * computeFreshness(input, notes, MESSAGE); // { lifetime: 100, currentAge: 40, remaining: 60, ... }
 */
export function computeFreshness(input: FreshnessInput, notes: NoteList, subject: NoteSubject): Freshness {
  const age = currentAge(input.headers, input.receivedAt);
  const directives = input.headers.value('cache-control') ?? {};

  if ('no-cache' in directives) {
    notes.emit(subject, FRESHNESS_NOTES.NO_CACHE);
  }
  if ('must-revalidate' in directives) {
    notes.emit(subject, FRESHNESS_NOTES.MUST_REVALIDATE);
  }

  if (input.cacheableBy === 'none') {
    return { lifetime: 'uncacheable', source: 'none', currentAge: age, remaining: 0 };
  }

  const { lifetime, source } = lifetimeOf(input, notes, subject);
  const remaining = Math.max(0, lifetime - age);

  if (source === 'none') {
    notes.emit(subject, FRESHNESS_NOTES.FRESHNESS_NONE);
  } else if (lifetime - age > 0) {
    notes.emit(subject, FRESHNESS_NOTES.FRESHNESS_FRESH, { remaining, lifetime, source, age });
  } else {
    notes.emit(subject, FRESHNESS_NOTES.FRESHNESS_STALE, { lifetime, source, age });
  }

  return { lifetime, source, currentAge: age, remaining };
}
