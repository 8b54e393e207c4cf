/**
 * Date, Expires and Last-Modified
 */

import { defineNotes, rfc } from '@conformance/notes';
import type { NoteCategory, SpecReference } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { parseHttpDate } from '../syntax.mjs';
import type { HttpDate } from '../syntax.mjs';
import type { HeaderAnalyzer } from '../types.mjs';

export const DATE_NOTES = defineNotes({
  DATE_OBSOLETE_FORMAT: {
    level: 'warning',
    category: 'general',
    summary: 'The {field} header uses an obsolete date format.',
    detail:
      'HTTP-dates should be sent as IMF-fixdate (e.g. "Sun, 06 Nov 1994 08:49:37 GMT"). ' +
      'This value uses the {format} format, which recipients only have to accept for compatibility.',
    reference: rfc(9110, '5.6.7'),
  },
});

/**
 * Build an analyzer for a singleton HTTP-date header
 */
function dateHeader(name: string, category: NoteCategory, reference: SpecReference): HeaderAnalyzer<HttpDate> {
  return defineHeader<HttpDate>({
    name,
    category,
    reference,
    combine: 'singleton',
    parse({ value }, context) {
      const date = parseHttpDate(value);
      if (!date) {
        throw new HeaderSyntaxError(`"${value}" is not a valid HTTP-date`, value);
      }
      if (date.format !== 'imf-fixdate') {
        context.note(DATE_NOTES.DATE_OBSOLETE_FORMAT, { format: date.format });
      }
      return date;
    },
  });
}

export const date = dateHeader('Date', 'general', rfc(9110, '6.6.1'));

/**
 * An invalid Expires value means "already expired" to caches (RFC 9111 §5.3)
 */
export const expires = dateHeader('Expires', 'caching', rfc(9111, '5.3'));

export const lastModified = dateHeader('Last-Modified', 'validation', rfc(9110, '8.8.2'));
