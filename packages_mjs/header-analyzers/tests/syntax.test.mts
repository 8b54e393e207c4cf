/**
 * Tests for shared field-value grammar helpers
 */

import { describe, it, expect } from 'vitest';
import {
  DELTA_SECONDS_MAX,
  HeaderSyntaxError,
  formatHttpDate,
  parseDeltaSeconds,
  parseHttpDate,
  parseNameValue,
  parseParameters,
  splitList,
  unquote,
} from '../src/index.mjs';

describe('splitList', () => {
  it('should ignore commas inside quoted strings and drop empty elements', () => {
    expect(splitList('a, "b, c", , d')).toEqual(['a', '"b, c"', 'd']);
  });
});

describe('unquote', () => {
  it('should remove quoted-pair escapes', () => {
    expect(unquote('"a\\"b"')).toBe('a"b');
  });

  it('should leave tokens alone', () => {
    expect(unquote('abc')).toBe('abc');
  });

  it('should reject unterminated strings', () => {
    expect(() => unquote('"abc')).toThrow(HeaderSyntaxError);
  });
});

describe('parseNameValue', () => {
  it('should lower-case names and unquote values', () => {
    expect(parseNameValue('Max-Age="5"')).toEqual({ name: 'max-age', value: '5', quoted: true });
    expect(parseNameValue('public')).toEqual({ name: 'public', value: null, quoted: false });
  });

  it('should reject values that are neither token nor quoted-string', () => {
    expect(() => parseNameValue('a=b c')).toThrow(HeaderSyntaxError);
  });
});

describe('parseParameters', () => {
  it('should require a value for every parameter', () => {
    expect(parseParameters(['charset=utf-8', 'q=0.5'])).toEqual({ charset: 'utf-8', q: '0.5' });
    expect(() => parseParameters(['charset'])).toThrow('Parameter charset has no value');
  });
});

describe('parseDeltaSeconds', () => {
  it('should clamp large values', () => {
    expect(parseDeltaSeconds('99999999999')).toBe(DELTA_SECONDS_MAX);
  });

  it('should reject signs and fractions', () => {
    expect(parseDeltaSeconds('-1')).toBeUndefined();
    expect(parseDeltaSeconds('1.5')).toBeUndefined();
  });
});

describe('parseHttpDate', () => {
  it('should reject impossible calendar dates', () => {
    expect(parseHttpDate('Sun, 31 Feb 1994 08:49:37 GMT')).toBeUndefined();
  });

  it('should reject lower-case day names', () => {
    expect(parseHttpDate('sun, 06 Nov 1994 08:49:37 GMT')).toBeUndefined();
  });

  it('should format epoch seconds as IMF-fixdate', () => {
    expect(formatHttpDate(784111777)).toBe('Sun, 06 Nov 1994 08:49:37 GMT');
  });
});
