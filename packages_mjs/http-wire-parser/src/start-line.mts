/**
 * Status-line and request-line parsing (RFC 9112 §3, §4)
 */
import { ParseError } from './errors.mjs';
import type { RequestLine, StatusLine } from './types.mjs';

const VERSION_RE = /^HTTP\/\d\.\d$/;
const STATUS_CODE_RE = /^\d{3}$/;
const METHOD_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Parse "HTTP/1.1 200 OK".
 * The reason phrase may be empty; the status code must be three digits in [100, 599].
 */
export function parseStatusLine(line: string, offset = 0): StatusLine {
  const firstSpace = line.indexOf(' ');
  if (firstSpace === -1) {
    throw new ParseError(`Malformed status line: "${line}"`, 'status-line', offset);
  }

  const version = line.substring(0, firstSpace);
  if (!VERSION_RE.test(version)) {
    throw new ParseError(`Invalid HTTP version: "${version}"`, 'HTTP-version', offset);
  }

  const rest = line.substring(firstSpace + 1);
  const secondSpace = rest.indexOf(' ');
  const code = secondSpace === -1 ? rest : rest.substring(0, secondSpace);

  if (!STATUS_CODE_RE.test(code)) {
    throw new ParseError(
      `Invalid status code: "${code}"`,
      'status-code',
      offset + firstSpace + 1
    );
  }

  const statusCode = parseInt(code, 10);
  if (statusCode < 100 || statusCode > 599) {
    throw new ParseError(
      `Status code out of range: ${statusCode}`,
      'status-code',
      offset + firstSpace + 1
    );
  }

  return {
    kind: 'status',
    version,
    statusCode,
    reason: secondSpace === -1 ? '' : rest.substring(secondSpace + 1),
  };
}

/**
 * Parse "GET /path HTTP/1.1"
 */
export function parseRequestLine(line: string, offset = 0): RequestLine {
  const parts = line.split(' ');
  if (parts.length !== 3) {
    throw new ParseError(`Malformed request line: "${line}"`, 'request-line', offset);
  }

  const [method, target, version] = parts;
  if (!METHOD_RE.test(method)) {
    throw new ParseError(`Invalid method: "${method}"`, 'method', offset);
  }
  if (target.length === 0) {
    throw new ParseError('Empty request target', 'request-target', offset + method.length + 1);
  }
  if (!VERSION_RE.test(version)) {
    throw new ParseError(
      `Invalid HTTP version: "${version}"`,
      'HTTP-version',
      offset + method.length + target.length + 2
    );
  }

  return { kind: 'request', method, target, version };
}
