/**
 * Evaluation of conditional and partial-content follow-up requests
 */

import { MESSAGE, NoteList, defineNotes, rfc } from '@conformance/notes';
import type { Note } from '@conformance/notes';
import { statusOf } from './util.mjs';
import type { AnalyzedResponse } from './types.mjs';

export const RELATION_NOTES = defineNotes({
  CONDITIONAL_304: {
    level: 'good',
    category: 'validation',
    summary: '{validator} validation is supported.',
    detail:
      'A conditional request with {validator} received 304 (Not Modified), so caches can revalidate cheaply.',
    reference: rfc(9110, '13.1'),
  },
  CONDITIONAL_IGNORED: {
    level: 'warning',
    category: 'validation',
    summary: '{validator} validation isn\'t supported.',
    detail:
      'A conditional request with {validator} returned the full response again instead of 304 ' +
      '(Not Modified). Caches will have to download the whole body to revalidate it.',
    reference: rfc(9110, '13.1'),
  },
  CONDITIONAL_CHANGED: {
    level: 'info',
    category: 'validation',
    summary: 'The resource changed between requests, so {validator} could not be checked.',
    detail: 'The conditional request returned a full response with a different body.',
    reference: rfc(9110, '13.1'),
  },
  CONDITIONAL_STATUS: {
    level: 'info',
    category: 'validation',
    summary: 'A {validator} conditional request returned {status}.',
    detail: 'Expected either 304 (Not Modified) or the same status as the original response ({expected}).',
    reference: rfc(9110, '13.1'),
  },
  MISSING_HDRS_304: {
    level: 'warning',
    category: 'validation',
    summary: 'The 304 response is missing required headers: {headers}.',
    detail:
      'A 304 response has to carry the headers that would have been sent in a 200 response to the ' +
      'same request; caches use them to update their stored copy.',
    reference: rfc(9110, '15.4.5'),
  },
  RANGE_CORRECT: {
    level: 'good',
    category: 'range',
    summary: 'A ranged request returned the correct partial content.',
    detail:
      'Requesting bytes {first}-{last} returned 206 (Partial Content) with the matching part of the body.',
    reference: rfc(9110, '14.2'),
  },
  RANGE_WRONG_RANGE: {
    level: 'bad',
    category: 'range',
    summary: 'A ranged request returned a different range than requested.',
    detail: 'Bytes {first}-{last} were requested, but Content-Range is "{contentRange}".',
    reference: rfc(9110, '14.4'),
  },
  RANGE_INCORRECT: {
    level: 'bad',
    category: 'range',
    summary: 'A ranged request returned partial content that does not match the full body.',
    detail: 'Bytes {first}-{last} of the partial response differ from the same bytes of the full response.',
    reference: rfc(9110, '14.2'),
  },
  RANGE_FULL: {
    level: 'warning',
    category: 'range',
    summary: 'A ranged request returned the full content instead of partial content.',
    detail: 'The response advertises Accept-Ranges: bytes, but a Range request got a {status} response.',
    reference: rfc(9110, '14.3'),
  },
  RANGE_STATUS: {
    level: 'info',
    category: 'range',
    summary: 'A ranged request returned {status}.',
    detail: 'Expected 206 (Partial Content) or a full response.',
    reference: rfc(9110, '14.2'),
  },
});

/**
 * Headers a 304 has to include when the 200 would have (RFC 9110 §15.4.5)
 */
const HEADERS_304 = ['cache-control', 'content-location', 'date', 'etag', 'expires', 'vary'];

export type ValidatorKind = 'etag' | 'last-modified';

const VALIDATOR_FIELD: Record<ValidatorKind, string> = {
  etag: 'If-None-Match',
  'last-modified': 'If-Modified-Since',
};

function comparable(a: AnalyzedResponse, b: AnalyzedResponse): boolean {
  return a.message.complete && b.message.complete && !a.message.truncated && !b.message.truncated;
}

/**
 * Evaluate the response to a conditional request built from one of the
 * primary response's validators.
 */
export function evaluateConditional(
  primary: AnalyzedResponse,
  retry: AnalyzedResponse,
  kind: ValidatorKind
): readonly Note[] {
  const notes = new NoteList();
  const validator = VALIDATOR_FIELD[kind];
  const status = statusOf(retry.message);
  const expected = statusOf(primary.message);

  if (status === 304) {
    notes.emit(MESSAGE, RELATION_NOTES.CONDITIONAL_304, { validator });
    const missing = HEADERS_304.filter((h) => primary.headers.has(h) && !retry.headers.has(h)).map(
      (h) => primary.headers.get(h)?.name ?? h
    );
    if (missing.length > 0) {
      notes.emit(MESSAGE, RELATION_NOTES.MISSING_HDRS_304, { headers: missing.join(', ') });
    }
  } else if (status === expected) {
    if (!comparable(primary, retry) || retry.message.body.equals(primary.message.body)) {
      notes.emit(MESSAGE, RELATION_NOTES.CONDITIONAL_IGNORED, { validator });
    } else {
      notes.emit(MESSAGE, RELATION_NOTES.CONDITIONAL_CHANGED, { validator });
    }
  } else {
    notes.emit(MESSAGE, RELATION_NOTES.CONDITIONAL_STATUS, {
      validator,
      status: status ?? '',
      expected: expected ?? '',
    });
  }

  return notes.toArray();
}

/**
 * Evaluate the response to a request for bytes first-last of the primary
 * response's body.
 */
export function evaluateRange(
  primary: AnalyzedResponse,
  retry: AnalyzedResponse,
  range: { first: number; last: number }
): readonly Note[] {
  const notes = new NoteList();
  const status = statusOf(retry.message);
  const last = Math.min(range.last, primary.message.bodyLength - 1);
  const { first } = range;

  if (status === 206) {
    const contentRange = retry.headers.value('content-range');
    if (!contentRange || contentRange.first !== first || contentRange.last !== last) {
      notes.emit(MESSAGE, RELATION_NOTES.RANGE_WRONG_RANGE, {
        first,
        last,
        contentRange: retry.headers.get('content-range')?.values.join(', ') ?? '',
      });
    } else if (
      comparable(primary, retry) &&
      !retry.message.body.equals(primary.message.body.subarray(first, last + 1))
    ) {
      notes.emit(MESSAGE, RELATION_NOTES.RANGE_INCORRECT, { first, last });
    } else {
      notes.emit(MESSAGE, RELATION_NOTES.RANGE_CORRECT, { first, last });
    }
  } else if (status === statusOf(primary.message)) {
    notes.emit(MESSAGE, RELATION_NOTES.RANGE_FULL, { status: status ?? '' });
  } else {
    notes.emit(MESSAGE, RELATION_NOTES.RANGE_STATUS, { status: status ?? '' });
  }

  return notes.toArray();
}
