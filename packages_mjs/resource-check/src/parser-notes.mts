/**
 * Notes for problems the wire parser reports
 */

import { MESSAGE, defineNotes, headerSubject, rfc } from '@conformance/notes';
import type { NoteDefinition, NoteList } from '@conformance/notes';
import type { ParseError, ParseIssue, ParseIssueKind } from '@conformance/http-wire-parser';

export const PARSER_NOTES = defineNotes({
  PARSE_ERROR: {
    level: 'bad',
    category: 'general',
    summary: 'The response could not be parsed past byte {offset}.',
    detail: 'Parsing stopped at byte {offset} because the {rule} was malformed: {problem}.',
    reference: rfc(9112, '2.2'),
  },
  BARE_LF: {
    level: 'warning',
    category: 'general',
    summary: 'A line in the response ends with a bare LF.',
    detail:
      'HTTP/1.1 lines end with CRLF. The line at byte {offset} ends with LF alone, which some recipients reject.',
    reference: rfc(9112, '2.2'),
  },
  OBS_FOLD: {
    level: 'bad',
    category: 'general',
    summary: 'The {field} header uses obsolete line folding.',
    detail:
      'The value of {field} is continued on a line starting with whitespace (byte {offset}). Line ' +
      'folding is deprecated and recipients may reject the message or treat the line as a new field.',
    reference: rfc(9112, '5.2'),
  },
  HEADER_NO_COLON: {
    level: 'bad',
    category: 'general',
    summary: 'A header line has no colon.',
    detail: 'The line "{line}" at byte {offset} is not a valid field line and was ignored.',
    reference: rfc(9112, '5'),
  },
  WHITESPACE_BEFORE_COLON: {
    level: 'bad',
    category: 'general',
    summary: 'The {field} header has whitespace before its colon.',
    detail:
      'Whitespace is not allowed between a field name and the colon; servers must reject such requests ' +
      'and proxies must remove it.',
    reference: rfc(9112, '5.1'),
  },
  INVALID_FIELD_NAME: {
    level: 'bad',
    category: 'general',
    summary: '"{field}" is not a valid header name.',
    detail: 'Field names are tokens; the name at byte {offset} contains characters that are not allowed.',
    reference: rfc(9110, '5.1'),
  },
  FRAMING_CONFLICT: {
    level: 'bad',
    category: 'connection',
    summary: 'The response has both Content-Length and Transfer-Encoding.',
    detail:
      'A message with both headers is ambiguous about where the body ends, and can be used for ' +
      'request smuggling. Transfer-Encoding was used to read the body.',
    reference: rfc(9112, '6.3'),
  },
  CONTENT_LENGTH_INVALID: {
    level: 'bad',
    category: 'connection',
    summary: 'The Content-Length header is not a valid length.',
    detail: 'Content-Length "{value}" could not be used to delimit the body.',
    reference: rfc(9110, '8.6'),
  },
  CONTENT_LENGTH_CONFLICT: {
    level: 'bad',
    category: 'connection',
    summary: 'The response has conflicting Content-Length values.',
    detail: 'Several different lengths ({value}) were sent, so the body cannot be delimited reliably.',
    reference: rfc(9112, '6.3'),
  },
  TRANSFER_ENCODING_NOT_CHUNKED: {
    level: 'bad',
    category: 'connection',
    summary: 'The final transfer coding is not chunked.',
    detail:
      'When chunked is not the last transfer coding of a response, the body is delimited by closing the ' +
      'connection.',
    reference: rfc(9112, '6.3'),
  },
  BAD_CHUNK_SIZE: {
    level: 'bad',
    category: 'connection',
    summary: 'The chunked body has an invalid chunk size.',
    detail: 'The chunk-size line "{value}" at byte {offset} is not hexadecimal; the body ends there.',
    reference: rfc(9112, '7.1'),
  },
  BAD_CHUNK_DELIMITER: {
    level: 'bad',
    category: 'connection',
    summary: 'A chunk is not followed by CRLF.',
    detail: 'The chunk data ending at byte {offset} is not followed by CRLF; the body ends there.',
    reference: rfc(9112, '7.1'),
  },
  INCOMPLETE_BODY: {
    level: 'bad',
    category: 'connection',
    summary: 'The body ended before its framing said it would.',
    detail: 'The connection closed at byte {offset} while more body was expected.',
    reference: rfc(9112, '6.3'),
  },
  EXTRA_DATA: {
    level: 'warning',
    category: 'connection',
    summary: 'There are {value} extra bytes after the body.',
    detail:
      'Bytes followed the end of the message at byte {offset}; they may be taken as the start of another ' +
      'response.',
    reference: rfc(9112, '6.3'),
  },
  BODY_TRUNCATED: {
    level: 'info',
    category: 'general',
    summary: 'Only the first {value} bytes of the body were kept.',
    detail: 'The body is larger than the capture limit; checks that need the whole body were skipped.',
    reference: rfc(9110, '6.4'),
  },
});

const ISSUE_NOTES: Record<ParseIssueKind, NoteDefinition> = {
  'bare-lf': PARSER_NOTES.BARE_LF,
  'obs-fold': PARSER_NOTES.OBS_FOLD,
  'header-no-colon': PARSER_NOTES.HEADER_NO_COLON,
  'whitespace-before-colon': PARSER_NOTES.WHITESPACE_BEFORE_COLON,
  'invalid-field-name': PARSER_NOTES.INVALID_FIELD_NAME,
  'framing-conflict': PARSER_NOTES.FRAMING_CONFLICT,
  'content-length-invalid': PARSER_NOTES.CONTENT_LENGTH_INVALID,
  'content-length-conflict': PARSER_NOTES.CONTENT_LENGTH_CONFLICT,
  'transfer-encoding-not-chunked': PARSER_NOTES.TRANSFER_ENCODING_NOT_CHUNKED,
  'bad-chunk-size': PARSER_NOTES.BAD_CHUNK_SIZE,
  'bad-chunk-delimiter': PARSER_NOTES.BAD_CHUNK_DELIMITER,
  'incomplete-body': PARSER_NOTES.INCOMPLETE_BODY,
  'extra-data': PARSER_NOTES.EXTRA_DATA,
  'body-truncated': PARSER_NOTES.BODY_TRUNCATED,
};

/**
 * Emit one note per parse issue, in the order the parser found them
 */
export function emitParseIssues(issues: readonly ParseIssue[], notes: NoteList): void {
  for (const issue of issues) {
    const subject = issue.field ? headerSubject(issue.field.toLowerCase()) : MESSAGE;
    notes.emit(subject, ISSUE_NOTES[issue.kind], {
      offset: issue.offset,
      field: issue.field ?? '',
      line: issue.detail ?? '',
      value: issue.detail ?? '',
    });
  }
}

export function emitParseError(error: ParseError, notes: NoteList): void {
  notes.emit(MESSAGE, PARSER_NOTES.PARSE_ERROR, {
    offset: error.offset,
    rule: error.rule,
    problem: error.message,
  });
}
