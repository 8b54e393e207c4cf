/**
 * @conformance/http-wire-parser
 * HTTP/1.1 message parsing at the wire level, with framing diagnostics
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

export { ParseError } from './errors.mjs';
export { parseStatusLine, parseRequestLine } from './start-line.mjs';
export { parseFieldSection, fieldValues } from './fields.mjs';
export { decodeChunked, parseChunkSize } from './chunked.mjs';
export { BodyCapture } from './body.mjs';
export {
  parseResponse,
  parseRequest,
  determineFraming,
  DEFAULT_BODY_CAPTURE_CAP,
} from './parser.mjs';
