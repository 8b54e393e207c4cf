/**
 * Checks that relate headers to the message: Date, Content-Length, redirects
 */

import { defineNotes, rfc } from '@conformance/notes';
import type { NoteList, NoteSubject } from '@conformance/notes';
import type { HeaderIndex } from '@conformance/header-analyzers';
import type { HttpMessage } from '@conformance/http-wire-parser';

export const MESSAGE_NOTES = defineNotes({
  DATE_MISSING: {
    level: 'bad',
    category: 'general',
    summary: 'A Date header is required for {status} responses.',
    detail:
      'Origin servers with a clock have to send Date on 2xx, 3xx and 4xx responses; caches use ' +
      'it to calculate the age of the response.',
    reference: rfc(9110, '6.6.1'),
  },
  DATE_CORRECT: {
    level: 'good',
    category: 'general',
    summary: "The server's clock is correct.",
    detail: 'The Date header is within {tolerance} seconds of the time the response was received.',
    reference: rfc(9110, '6.6.1'),
  },
  DATE_INCORRECT: {
    level: 'bad',
    category: 'general',
    summary: 'The server\'s clock is {skew} seconds off.',
    detail:
      'The Date header differs from the time the response was received by more than {tolerance} ' +
      'seconds, which confuses freshness calculations.',
    reference: rfc(9110, '6.6.1'),
  },
  CL_CORRECT: {
    level: 'good',
    category: 'connection',
    summary: 'The Content-Length header is correct.',
    detail: 'Content-Length matches the {length} body bytes received.',
    reference: rfc(9110, '8.6'),
  },
  CL_INCORRECT: {
    level: 'bad',
    category: 'connection',
    summary: 'The Content-Length header is incorrect.',
    detail:
      'Content-Length says the body is {declared} bytes, but {received} bytes were received. ' +
      'Clients may truncate the body or hang waiting for more.',
    reference: rfc(9110, '8.6'),
  },
  REDIRECT_WITHOUT_LOCATION: {
    level: 'bad',
    category: 'redirection',
    summary: 'The {status} redirect has no Location header.',
    detail: 'Clients need Location to know where to go; without it the redirect cannot be followed.',
    reference: rfc(9110, '15.4'),
  },
});

/**
 * Allowed difference between Date and the local receive time, in seconds
 */
export const CLOCK_SKEW_TOLERANCE = 5;

const REDIRECT_STATUS = new Set([301, 302, 303, 307, 308]);

export function checkDate(
  statusCode: number,
  headers: HeaderIndex,
  receivedAt: number,
  notes: NoteList,
  subject: NoteSubject
): void {
  if (!headers.has('date')) {
    if (statusCode >= 200 && statusCode < 500) {
      notes.emit(subject, MESSAGE_NOTES.DATE_MISSING, { status: statusCode });
    }
    return;
  }

  const date = headers.value('date');
  if (!date) return;
  const skew = date.time - receivedAt;
  if (Math.abs(skew) > CLOCK_SKEW_TOLERANCE) {
    notes.emit(subject, MESSAGE_NOTES.DATE_INCORRECT, { skew, tolerance: CLOCK_SKEW_TOLERANCE });
  } else {
    notes.emit(subject, MESSAGE_NOTES.DATE_CORRECT, { tolerance: CLOCK_SKEW_TOLERANCE });
  }
}

/**
 * Compare Content-Length with the body actually received.
 * Only complete messages framed by Content-Length are checked; under
 * Transfer-Encoding the header is ignored and the parser reports the conflict.
 */
export function checkContentLength(
  message: HttpMessage,
  headers: HeaderIndex,
  notes: NoteList,
  subject: NoteSubject
): void {
  const declared = headers.value('content-length');
  const { framing } = message;
  if (declared === undefined || framing.kind !== 'content-length' || message.truncated || !message.complete) {
    return;
  }
  if (message.bodyLength !== declared) {
    notes.emit(subject, MESSAGE_NOTES.CL_INCORRECT, { declared, received: message.bodyLength });
  } else {
    notes.emit(subject, MESSAGE_NOTES.CL_CORRECT, { length: declared });
  }
}

export function checkRedirect(
  statusCode: number,
  headers: HeaderIndex,
  notes: NoteList,
  subject: NoteSubject
): void {
  if (REDIRECT_STATUS.has(statusCode) && !headers.has('location')) {
    notes.emit(subject, MESSAGE_NOTES.REDIRECT_WITHOUT_LOCATION, { status: statusCode });
  }
}
