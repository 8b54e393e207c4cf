/**
 * HTTP/1.1 message parser.
 * Turns the raw bytes of one message into a structured HttpMessage, recording
 * framing problems as issues rather than failing whenever it can.
 */
import { Buffer } from 'node:buffer';
import { BodyCapture } from './body.mjs';
import { decodeChunked } from './chunked.mjs';
import { ParseError } from './errors.mjs';
import { fieldValues, parseFieldSection } from './fields.mjs';
import { readLine } from './lines.mjs';
import { parseRequestLine, parseStatusLine } from './start-line.mjs';
import type {
  BodyFraming,
  HeaderField,
  HttpMessage,
  ParseIssue,
  ParseOptions,
  ParseOutcome,
  StartLine,
} from './types.mjs';

/**
 * Default body capture cap: 8 MiB
 */
export const DEFAULT_BODY_CAPTURE_CAP = 8 * 1024 * 1024;

const DIGITS_RE = /^\d+$/;

/**
 * Parse a raw HTTP/1.1 response
 *
 * @example
 * const { message, issues } = parseResponse(Buffer.from('HTTP/1.1 204 No Content\r\n\r\n'));
 */
export function parseResponse(data: Buffer, options: ParseOptions = {}): ParseOutcome {
  return parseMessage(data, options, (line, offset) => parseStatusLine(line, offset));
}

/**
 * Parse a raw HTTP/1.1 request
 */
export function parseRequest(data: Buffer, options: ParseOptions = {}): ParseOutcome {
  return parseMessage(data, options, (line, offset) => parseRequestLine(line, offset));
}

function parseMessage(
  data: Buffer,
  options: ParseOptions,
  parseStart: (line: string, offset: number) => StartLine
): ParseOutcome {
  const issues: ParseIssue[] = [];
  const cap = options.bodyCaptureCap ?? DEFAULT_BODY_CAPTURE_CAP;

  const first = readLine(data, 0);
  if (first === null) {
    const rule = data.length === 0 ? 'message' : 'start-line';
    return {
      issues,
      error: new ParseError('Start line not terminated', rule, data.length),
    };
  }

  let startLine: StartLine;
  try {
    startLine = parseStart(first.text, 0);
  } catch (error) {
    if (error instanceof ParseError) {
      return { issues, error };
    }
    throw error;
  }
  if (first.bareLf) {
    issues.push({ kind: 'bare-lf', offset: 0 });
  }

  const section = parseFieldSection(data, first.next, issues);
  const framing = determineFraming(startLine, section.fields, options, issues);

  if (!section.terminated) {
    return {
      message: {
        startLine,
        headers: section.fields,
        framing,
        body: Buffer.alloc(0),
        bodyLength: 0,
        truncated: false,
        complete: false,
        headerLength: section.end,
        trailers: [],
      },
      issues,
      error: new ParseError('Header section not terminated', 'field-section', section.end),
    };
  }

  const body = readBody(data, section.end, framing, cap, options.inputTruncated ?? false, issues);

  return {
    message: {
      startLine,
      headers: section.fields,
      framing,
      headerLength: section.end,
      ...body,
    },
    issues,
  };
}

/**
 * Decide how the body is delimited (RFC 9112 §6.3)
 */
export function determineFraming(
  startLine: StartLine,
  fields: readonly HeaderField[],
  options: Pick<ParseOptions, 'requestMethod'>,
  issues: ParseIssue[]
): BodyFraming {
  const transferEncoding = findField(fields, 'transfer-encoding');
  const contentLength = findField(fields, 'content-length');

  if (transferEncoding && contentLength) {
    issues.push({ kind: 'framing-conflict', offset: contentLength.offset, field: contentLength.name });
  }

  if (startLine.kind === 'status') {
    const { statusCode } = startLine;
    if (
      options.requestMethod?.toUpperCase() === 'HEAD' ||
      (statusCode >= 100 && statusCode < 200) ||
      statusCode === 204 ||
      statusCode === 304
    ) {
      return { kind: 'none' };
    }
  }

  if (transferEncoding) {
    const codings = splitCommas(fieldValues(fields, 'transfer-encoding')).map((c) =>
      c.split(';')[0].trim().toLowerCase()
    );
    if (codings[codings.length - 1] === 'chunked') {
      return { kind: 'chunked' };
    }
    issues.push({
      kind: 'transfer-encoding-not-chunked',
      offset: transferEncoding.offset,
      field: transferEncoding.name,
      detail: codings.join(', '),
    });
    return startLine.kind === 'status' ? { kind: 'close' } : { kind: 'none' };
  }

  if (contentLength) {
    const values = splitCommas(fieldValues(fields, 'content-length'));
    const invalid = values.find((v) => !DIGITS_RE.test(v));
    if (invalid !== undefined || values.length === 0) {
      issues.push({
        kind: 'content-length-invalid',
        offset: contentLength.offset,
        field: contentLength.name,
        detail: invalid ?? '',
      });
    } else if (new Set(values.map((v) => parseInt(v, 10))).size > 1) {
      issues.push({
        kind: 'content-length-conflict',
        offset: contentLength.offset,
        field: contentLength.name,
        detail: values.join(', '),
      });
    } else {
      const length = parseInt(values[0], 10);
      if (Number.isSafeInteger(length)) {
        return { kind: 'content-length', length };
      }
      issues.push({
        kind: 'content-length-invalid',
        offset: contentLength.offset,
        field: contentLength.name,
        detail: values[0],
      });
    }
  }

  return startLine.kind === 'status' ? { kind: 'close' } : { kind: 'none' };
}

type BodyParts = Pick<HttpMessage, 'body' | 'bodyLength' | 'truncated' | 'complete' | 'trailers'>;

function readBody(
  data: Buffer,
  start: number,
  framing: BodyFraming,
  cap: number,
  inputTruncated: boolean,
  issues: ParseIssue[]
): BodyParts {
  const available = data.length - start;

  switch (framing.kind) {
    case 'none': {
      if (available > 0) {
        issues.push({ kind: 'extra-data', offset: start, detail: `${available}` });
      }
      return { body: Buffer.alloc(0), bodyLength: 0, truncated: false, complete: true, trailers: [] };
    }

    case 'content-length': {
      const capture = new BodyCapture(cap);
      const received = Math.min(framing.length, available);
      capture.push(data.subarray(start, start + received));
      const complete = received === framing.length;
      const truncated = capture.truncated || (inputTruncated && framing.length > cap);

      if (!complete && !inputTruncated) {
        issues.push({
          kind: 'incomplete-body',
          offset: data.length,
          detail: `${framing.length - received}`,
        });
      }
      if (available > framing.length) {
        issues.push({
          kind: 'extra-data',
          offset: start + framing.length,
          detail: `${available - framing.length}`,
        });
      }
      if (truncated) {
        issues.push({ kind: 'body-truncated', offset: start + cap, detail: `${cap}` });
      }
      return { body: capture.toBuffer(), bodyLength: received, truncated, complete, trailers: [] };
    }

    case 'chunked': {
      const decoded = decodeChunked(data, start, cap);
      for (const issue of decoded.issues) {
        if (inputTruncated && issue.kind === 'incomplete-body') continue;
        issues.push(issue);
      }
      const truncated = decoded.truncated || (inputTruncated && decoded.bodyLength >= cap);
      if (decoded.complete && decoded.end < data.length) {
        issues.push({ kind: 'extra-data', offset: decoded.end, detail: `${data.length - decoded.end}` });
      }
      if (truncated) {
        issues.push({ kind: 'body-truncated', offset: decoded.end, detail: `${cap}` });
      }
      return {
        body: decoded.body,
        bodyLength: decoded.bodyLength,
        truncated,
        complete: decoded.complete,
        trailers: decoded.trailers,
      };
    }

    case 'close': {
      const capture = new BodyCapture(cap);
      capture.push(data.subarray(start));
      const truncated = capture.truncated || (inputTruncated && available >= cap);
      if (truncated) {
        issues.push({ kind: 'body-truncated', offset: start + cap, detail: `${cap}` });
      }
      return {
        body: capture.toBuffer(),
        bodyLength: available,
        truncated,
        complete: !inputTruncated,
        trailers: [],
      };
    }
  }
}

function findField(fields: readonly HeaderField[], name: string): HeaderField | undefined {
  return fields.find((f) => f.name.toLowerCase() === name);
}

function splitCommas(values: string[]): string[] {
  return values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}
