/**
 * Chunked transfer coding decoder (RFC 9112 §7.1)
 *
 * Works over bytes that have already been received. Malformed framing ends
 * decoding with an issue instead of throwing, so a partial body is still
 * available to the caller.
 */
import type { Buffer } from 'node:buffer';
import { BodyCapture } from './body.mjs';
import { parseFieldSection } from './fields.mjs';
import { readLine, terminatorAt } from './lines.mjs';
import type { ChunkedDecodeResult, ParseIssue } from './types.mjs';

const CHUNK_SIZE_RE = /^([0-9A-Fa-f]+)[ \t]*(?:;.*)?$/;

/**
 * Parse a chunk-size line, ignoring any chunk extensions.
 * Returns null when the line is not a valid chunk size.
 */
export function parseChunkSize(line: string): number | null {
  const match = CHUNK_SIZE_RE.exec(line);
  if (!match) return null;
  const size = parseInt(match[1], 16);
  return Number.isSafeInteger(size) ? size : null;
}

/**
 * Decode a chunked body starting at `start`.
 *
 * @param cap - Maximum decoded bytes to keep
 */
export function decodeChunked(data: Buffer, start: number, cap: number): ChunkedDecodeResult {
  const capture = new BodyCapture(cap);
  const issues: ParseIssue[] = [];
  let offset = start;

  const result = (
    complete: boolean,
    end: number,
    trailers: ChunkedDecodeResult['trailers'] = []
  ): ChunkedDecodeResult => ({
    body: capture.toBuffer(),
    bodyLength: capture.length,
    truncated: capture.truncated,
    trailers,
    issues,
    complete,
    end,
  });

  for (;;) {
    const line = readLine(data, offset);
    if (line === null) {
      issues.push({ kind: 'incomplete-body', offset });
      return result(false, data.length);
    }

    const size = parseChunkSize(line.text);
    if (size === null) {
      issues.push({ kind: 'bad-chunk-size', offset: line.start, detail: line.text });
      return result(false, line.start);
    }
    offset = line.next;

    if (size === 0) {
      const section = parseFieldSection(data, offset, issues);
      if (!section.terminated) {
        issues.push({ kind: 'incomplete-body', offset: section.end, detail: 'trailer-section' });
      }
      return result(section.terminated, section.end, section.fields);
    }

    const available = Math.min(size, data.length - offset);
    capture.push(data.subarray(offset, offset + available));
    if (available < size) {
      issues.push({ kind: 'incomplete-body', offset: data.length, detail: `${size - available}` });
      return result(false, data.length);
    }
    offset += size;

    const crlf = terminatorAt(data, offset);
    if (crlf === 0) {
      // a lone CR at the very end is a delimiter still in flight
      if (offset >= data.length || (offset === data.length - 1 && data[offset] === 0x0d)) {
        issues.push({ kind: 'incomplete-body', offset });
        return result(false, data.length);
      }
      issues.push({ kind: 'bad-chunk-delimiter', offset });
      return result(false, offset);
    }
    offset += crlf;
  }
}
