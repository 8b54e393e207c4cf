/**
 * Location and Retry-After
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { parseDeltaSeconds, parseHttpDate } from '../syntax.mjs';
import type { RetryAfter } from '../types.mjs';

export const REDIRECTION_NOTES = defineNotes({
  LOCATION_UNDEFINED: {
    level: 'info',
    category: 'redirection',
    summary: 'Location has no defined meaning on a {status} response.',
    detail: 'Location is only defined for 201 (Created) and 3xx (Redirection) responses.',
    reference: rfc(9110, '10.2.2'),
  },
  LOCATION_NOT_URI: {
    level: 'bad',
    category: 'redirection',
    summary: 'The Location header does not contain a URI reference.',
    detail: '"{value}" cannot be resolved against {base}.',
    reference: rfc(9110, '10.2.2'),
  },
});

const URI_CHARS_RE = /^[\x21-\x7e]+$/;
const PLACEHOLDER_BASE = 'http://placeholder.invalid/';

/**
 * Location (RFC 9110 §10.2.2)
 *
 * The typed value is the reference resolved against the message's URI when
 * one is known, otherwise the reference as sent.
 */
export const location = defineHeader<string>({
  name: 'Location',
  category: 'redirection',
  reference: rfc(9110, '10.2.2'),
  combine: 'singleton',
  parse({ value }, context) {
    if (!URI_CHARS_RE.test(value)) {
      throw new HeaderSyntaxError('a URI reference cannot contain spaces or non-ASCII characters', value);
    }

    const status = context.field.statusCode;
    if (status !== undefined && status !== 201 && (status < 300 || status > 399)) {
      context.note(REDIRECTION_NOTES.LOCATION_UNDEFINED, { status });
    }

    const base = context.field.baseUri ?? PLACEHOLDER_BASE;
    if (!URL.canParse(value, base)) {
      context.note(REDIRECTION_NOTES.LOCATION_NOT_URI, { value, base });
      return undefined;
    }
    return context.field.baseUri ? new URL(value, base).href : value;
  },
});

/**
 * Retry-After (RFC 9110 §10.2.3)
 */
export const retryAfter = defineHeader<RetryAfter>({
  name: 'Retry-After',
  category: 'general',
  reference: rfc(9110, '10.2.3'),
  combine: 'singleton',
  parse({ value }) {
    const seconds = parseDeltaSeconds(value);
    if (seconds !== undefined) return { seconds };
    const date = parseHttpDate(value);
    if (date) return { date };
    throw new HeaderSyntaxError('expected delay-seconds or an HTTP-date', value);
  },
});
