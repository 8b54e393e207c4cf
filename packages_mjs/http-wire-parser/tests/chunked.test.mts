/**
 * Tests for the chunked transfer coding decoder
 */

import { describe, it, expect } from 'vitest';
import { Buffer } from 'node:buffer';
import { decodeChunked, parseChunkSize } from '../src/chunked.mjs';

const bytes = (s: string): Buffer => Buffer.from(s, 'latin1');

describe('parseChunkSize', () => {
  it('should parse hex sizes', () => {
    expect(parseChunkSize('1a')).toBe(26);
    expect(parseChunkSize('FF')).toBe(255);
    expect(parseChunkSize('0')).toBe(0);
  });

  it('should ignore chunk extensions', () => {
    expect(parseChunkSize('10;name=value')).toBe(16);
    expect(parseChunkSize('10 ;ext')).toBe(16);
  });

  it('should reject non-hex sizes', () => {
    expect(parseChunkSize('zz')).toBeNull();
    expect(parseChunkSize('')).toBeNull();
    expect(parseChunkSize('-1')).toBeNull();
  });
});

describe('decodeChunked', () => {
  it('should decode a complete body with trailers', () => {
    const data = bytes('4\r\nWiki\r\n5\r\npedia\r\n0\r\nX-Trailer: yes\r\n\r\n');
    const result = decodeChunked(data, 0, 1024);

    expect(result.body.toString()).toBe('Wikipedia');
    expect(result.bodyLength).toBe(9);
    expect(result.complete).toBe(true);
    expect(result.end).toBe(data.length);
    expect(result.trailers.map((t) => [t.name, t.value])).toEqual([['X-Trailer', 'yes']]);
    expect(result.issues).toEqual([]);
  });

  it('should stop at a malformed chunk size and keep the partial body', () => {
    const data = bytes('3\r\nabc\r\nxyz\r\nmore\r\n0\r\n\r\n');
    const result = decodeChunked(data, 0, 1024);

    expect(result.body.toString()).toBe('abc');
    expect(result.complete).toBe(false);
    expect(result.issues).toEqual([{ kind: 'bad-chunk-size', offset: 8, detail: 'xyz' }]);
  });

  it('should report a missing delimiter after chunk data', () => {
    const data = bytes('3\r\nabcdef\r\n0\r\n\r\n');
    const result = decodeChunked(data, 0, 1024);

    expect(result.body.toString()).toBe('abc');
    expect(result.issues).toEqual([{ kind: 'bad-chunk-delimiter', offset: 6 }]);
  });

  it('should report a body that ends early', () => {
    const data = bytes('a\r\nabc');
    const result = decodeChunked(data, 0, 1024);

    expect(result.body.toString()).toBe('abc');
    expect(result.bodyLength).toBe(3);
    expect(result.complete).toBe(false);
    expect(result.issues).toEqual([{ kind: 'incomplete-body', offset: 6, detail: '7' }]);
  });

  it('should report a missing last-chunk', () => {
    const data = bytes('3\r\nabc\r\n');
    const result = decodeChunked(data, 0, 1024);

    expect(result.complete).toBe(false);
    expect(result.issues).toEqual([{ kind: 'incomplete-body', offset: 8 }]);
  });

  it('should decode from a starting offset', () => {
    const data = bytes('HEAD1\r\n2\r\nok\r\n0\r\n\r\n');
    const result = decodeChunked(data, 7, 1024);

    expect(result.body.toString()).toBe('ok');
    expect(result.complete).toBe(true);
  });

  it('should count bytes past the cap without keeping them', () => {
    const data = bytes('6\r\nabcdef\r\n0\r\n\r\n');
    const result = decodeChunked(data, 0, 2);

    expect(result.body.toString()).toBe('ab');
    expect(result.bodyLength).toBe(6);
    expect(result.truncated).toBe(true);
  });
});
