/**
 * Types for the HTTP/1.1 wire parser
 */

import type { Buffer } from 'node:buffer';
import type { ParseError } from './errors.mjs';

/**
 * Parsed status line: "HTTP/1.1 200 OK"
 */
export interface StatusLine {
  kind: 'status';
  /** Protocol version as sent, e.g. "HTTP/1.1" */
  version: string;
  statusCode: number;
  reason: string;
}

/**
 * Parsed request line: "GET /path HTTP/1.1"
 */
export interface RequestLine {
  kind: 'request';
  method: string;
  target: string;
  version: string;
}

export type StartLine = StatusLine | RequestLine;

/**
 * A single header field line, in the order it was received
 */
export interface HeaderField {
  /** Field name with its original case */
  name: string;
  /** Field value with leading and trailing whitespace removed */
  value: string;
  /** Byte offset of the field line within the raw message */
  offset: number;
  /** True when the value was continued with obsolete line folding */
  folded: boolean;
}

/**
 * How the body of the message is delimited
 */
export type BodyFraming =
  | { kind: 'content-length'; length: number }
  | { kind: 'chunked' }
  | { kind: 'close' }
  | { kind: 'none' };

/**
 * Structured HTTP message
 */
export interface HttpMessage {
  startLine: StartLine;
  headers: readonly HeaderField[];
  framing: BodyFraming;
  /** Captured (decoded) body, never longer than the capture cap */
  body: Buffer;
  /** Total decoded body bytes observed, including any beyond the cap */
  bodyLength: number;
  /** Body was cut at the capture cap */
  truncated: boolean;
  /** The message ended where its framing said it would */
  complete: boolean;
  /** Byte length of the header section, including the terminating empty line */
  headerLength: number;
  /** Trailer fields from a chunked body */
  trailers: readonly HeaderField[];
}

/**
 * Problems found while parsing that do not prevent a message from being built
 */
export type ParseIssueKind =
  | 'bare-lf'
  | 'obs-fold'
  | 'header-no-colon'
  | 'whitespace-before-colon'
  | 'invalid-field-name'
  | 'framing-conflict'
  | 'content-length-invalid'
  | 'content-length-conflict'
  | 'transfer-encoding-not-chunked'
  | 'bad-chunk-size'
  | 'bad-chunk-delimiter'
  | 'incomplete-body'
  | 'extra-data'
  | 'body-truncated';

export interface ParseIssue {
  kind: ParseIssueKind;
  /** Byte offset in the raw input where the problem was found */
  offset: number;
  /** Field the issue relates to, when there is one */
  field?: string;
  /** Extra detail: the offending text, a count, etc. */
  detail?: string;
}

/**
 * Options for parsing a raw message
 */
export interface ParseOptions {
  /** Maximum body bytes to keep. Default: 8 MiB */
  bodyCaptureCap?: number;
  /** Method of the request this response answers; HEAD responses carry no body */
  requestMethod?: string;
  /** The transport stopped reading before the peer finished sending */
  inputTruncated?: boolean;
}

/**
 * Result of parsing; a partial message is returned whenever one could be built
 */
export interface ParseOutcome {
  message?: HttpMessage;
  issues: ParseIssue[];
  error?: ParseError;
}

/**
 * Result of decoding a chunked body
 */
export interface ChunkedDecodeResult {
  body: Buffer;
  /** Total decoded bytes, including those beyond the cap */
  bodyLength: number;
  truncated: boolean;
  trailers: HeaderField[];
  issues: ParseIssue[];
  /** The last-chunk and trailer section were seen */
  complete: boolean;
  /** Offset just past the chunked body */
  end: number;
}
