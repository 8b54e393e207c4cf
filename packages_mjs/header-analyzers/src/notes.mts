/**
 * Notes shared by every header analyzer
 */
import { defineNotes, rfc } from '@conformance/notes';

export const COMMON_NOTES = defineNotes({
  SINGLE_HEADER_REPEAT: {
    level: 'bad',
    category: 'general',
    summary: 'Only one {field} header is allowed in a response.',
    detail:
      'This header is designed to only occur once in a message. When it occurs more than once, ' +
      'a receiver needs to choose the one to use, which can lead to interoperability problems, ' +
      'since different implementations may make different choices. The last value ("{value}") is used here.',
    reference: rfc(9110, '5.3'),
  },
  BAD_SYNTAX: {
    level: 'bad',
    category: 'general',
    summary: "The {field} header's syntax isn't valid.",
    detail:
      'The value for this header doesn\'t conform to its specified syntax ({problem}); ' +
      'it is ignored for the rest of the analysis.',
    reference: rfc(9110, '5.5'),
  },
  HEADER_CONTROL_CHARS: {
    level: 'bad',
    category: 'general',
    summary: 'The {field} header contains control characters.',
    detail:
      'Field values are not allowed to contain control characters other than horizontal tab. ' +
      'Recipients are likely to reject or mangle this value.',
    reference: rfc(9110, '5.5'),
  },
  HEADER_NON_ASCII: {
    level: 'warning',
    category: 'general',
    summary: 'The {field} header contains non-ASCII characters.',
    detail:
      'Field values outside of US-ASCII are treated as opaque data; their interpretation varies ' +
      'between implementations, so they should be avoided.',
    reference: rfc(9110, '5.5'),
  },
  HEADER_NAME_INVALID: {
    level: 'bad',
    category: 'general',
    summary: 'The {field} header name contains characters that are not allowed.',
    detail: 'Field names have to be a token: letters, digits and a limited set of punctuation.',
    reference: rfc(9110, '5.1'),
  },
  HEADER_NOT_RECOGNIZED: {
    level: 'info',
    category: 'general',
    summary: 'The {field} header is not recognized.',
    detail:
      'This header is not defined by any specification known to this checker. It may be an ' +
      'application-specific extension; its value has not been checked beyond basic syntax.',
    reference: rfc(9110, '5.1'),
  },
  HEADER_DEPRECATED: {
    level: 'warning',
    category: 'general',
    summary: 'The {field} header is deprecated.',
    detail: '{field} has been deprecated ({reason}) and should no longer be sent.',
    reference: rfc(9111, '5.4'),
  },
});
