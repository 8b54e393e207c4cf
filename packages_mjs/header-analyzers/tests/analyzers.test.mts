/**
 * Tests for the dedicated header analyzers
 */

import { describe, it, expect } from 'vitest';
import { analyzeHeader } from '../src/index.mjs';
import type { FieldContext } from '../src/index.mjs';

const RESPONSE: FieldContext = { statusCode: 200 };

function check(name: string, value: string | string[], context: FieldContext = RESPONSE) {
  const result = analyzeHeader(name, Array.isArray(value) ? value : [value], context);
  return { value: result.value, ids: result.notes.map((n) => n.id), notes: result.notes };
}

describe('Cache-Control', () => {
  it('should report a negative max-age naming the directive', () => {
    const { value, ids, notes } = check('Cache-Control', 'max-age=-1');
    expect(ids).toEqual(['BAD_CC_DELTA']);
    expect(notes[0].summary).toBe('The max-age Cache-Control directive needs a non-negative integer value.');
    expect(notes[0].vars).toMatchObject({ directive: 'max-age', value: '-1' });
    expect(value).toEqual({});
  });

  it('should accept but report quoted delta-seconds', () => {
    const { value, ids } = check('Cache-Control', 'max-age="60"');
    expect(ids).toEqual(['CC_QUOTED_DELTA']);
    expect(value).toEqual({ 'max-age': 60 });
  });

  it('should report duplicate directives and keep the last', () => {
    const { value, ids } = check('Cache-Control', ['max-age=5', 'max-age=10']);
    expect(ids).toEqual(['CC_DUPLICATE']);
    expect(value).toEqual({ 'max-age': 10 });
  });

  it('should not mistake built-in object keys for earlier directives', () => {
    const { value, ids } = check('Cache-Control', 'constructor, max-age=5');
    expect(ids).toEqual(['CC_UNKNOWN_DIRECTIVE']);
    expect(value).toEqual({ constructor: true, 'max-age': 5 });
  });

  it('should report public together with private', () => {
    const { value, ids } = check('Cache-Control', 'private, public');
    expect(ids).toEqual(['CC_PUBLIC_AND_PRIVATE']);
    expect(value).toEqual({ private: true, public: true });
  });

  it('should report request directives and unknown directives in responses', () => {
    expect(check('Cache-Control', 'only-if-cached').ids).toEqual(['CC_REQUEST_DIRECTIVE']);
    expect(check('Cache-Control', 'foo=bar').ids).toEqual(['CC_UNKNOWN_DIRECTIVE']);
  });

  it('should keep field-name arguments of no-cache', () => {
    expect(check('Cache-Control', 'no-cache="Set-Cookie"').value).toEqual({ 'no-cache': 'Set-Cookie' });
  });

  it('should accept max-stale without a value in requests', () => {
    const { value, ids } = check('Cache-Control', 'max-stale', {});
    expect(ids).toEqual([]);
    expect(value).toEqual({ 'max-stale': true });
  });

  it('should have no value when no directive can be read', () => {
    const { value, ids } = check('Cache-Control', '=');
    expect(ids).toEqual(['BAD_CC_SYNTAX', 'BAD_SYNTAX']);
    expect(value).toBeUndefined();
  });
});

describe('Pragma', () => {
  it('should report deprecation and no-cache in responses', () => {
    expect(check('Pragma', 'no-cache').ids).toEqual(['HEADER_DEPRECATED', 'PRAGMA_NO_CACHE']);
  });
});

describe('Age', () => {
  it('should parse delta-seconds', () => {
    expect(check('Age', '40')).toMatchObject({ value: 40, ids: [] });
  });

  it('should reject negative values', () => {
    expect(check('Age', '-5')).toMatchObject({ value: undefined, ids: ['AGE_NOT_INT'] });
  });
});

describe('HTTP-date headers', () => {
  it('should parse IMF-fixdate', () => {
    expect(check('Date', 'Sun, 06 Nov 1994 08:49:37 GMT')).toMatchObject({
      value: { time: 784111777, format: 'imf-fixdate' },
      ids: [],
    });
  });

  it('should report obsolete formats', () => {
    const { value, notes } = check('Last-Modified', 'Sunday, 06-Nov-94 08:49:37 GMT');
    expect(value).toEqual({ time: 784111777, format: 'rfc850' });
    expect(notes.map((n) => n.id)).toEqual(['DATE_OBSOLETE_FORMAT']);
    expect(notes[0].vars).toMatchObject({ field: 'Last-Modified', format: 'rfc850' });
  });

  it('should parse asctime', () => {
    expect(check('Expires', 'Sun Nov  6 08:49:37 1994').value).toEqual({ time: 784111777, format: 'asctime' });
  });

  it('should have no value for invalid dates', () => {
    expect(check('Expires', '0')).toMatchObject({ value: undefined, ids: ['BAD_SYNTAX'] });
  });
});

describe('ETag', () => {
  it('should parse weak tags', () => {
    expect(check('ETag', 'W/"abc"').value).toEqual({ weak: true, tag: 'abc' });
  });

  it('should reject unquoted tags', () => {
    expect(check('ETag', 'abc')).toMatchObject({ value: undefined, ids: ['BAD_SYNTAX'] });
  });
});

describe('Vary', () => {
  it('should lower-case field names and flag User-Agent', () => {
    expect(check('Vary', 'Accept-Encoding, User-Agent')).toMatchObject({
      value: ['accept-encoding', 'user-agent'],
      ids: ['VARY_USER_AGENT'],
    });
  });

  it('should treat * specially', () => {
    expect(check('Vary', '*').ids).toEqual(['VARY_ASTERISK']);
    expect(check('Vary', '*, Accept').ids).toEqual(['VARY_ASTERISK_WITH_FIELDS']);
  });

  it('should flag responses that vary on many headers', () => {
    const { notes } = check('Vary', 'a, b, c, d');
    expect(notes.map((n) => n.id)).toEqual(['VARY_COMPLEX']);
    expect(notes[0].summary).toBe('This resource varies in 4 ways.');
  });
});

describe('Content-Type', () => {
  it('should parse parameters and lower-case the charset', () => {
    expect(check('Content-Type', 'text/HTML; charset=UTF-8')).toMatchObject({
      value: { mediaType: 'text/html', type: 'text', subtype: 'html', params: { charset: 'utf-8' } },
      ids: [],
    });
  });

  it('should note text types without a charset', () => {
    expect(check('Content-Type', 'text/plain').ids).toEqual(['CONTENT_TYPE_NO_CHARSET']);
  });

  it('should reject values without a subtype', () => {
    expect(check('Content-Type', 'html')).toMatchObject({ value: undefined, ids: ['BAD_SYNTAX'] });
  });
});

describe('Content-Encoding', () => {
  it('should flag identity and unregistered codings', () => {
    expect(check('Content-Encoding', 'gzip, identity').ids).toEqual(['ENCODING_IDENTITY']);
    expect(check('Content-Encoding', 'snappy').ids).toEqual(['ENCODING_UNKNOWN']);
  });
});

describe('Transfer-Encoding', () => {
  it('should require chunked to be last', () => {
    const { value, notes } = check('Transfer-Encoding', 'chunked, gzip');
    expect(value).toEqual(['chunked', 'gzip']);
    expect(notes.map((n) => n.id)).toEqual(['TE_CHUNKED_NOT_LAST']);
    expect(notes[0].vars).toMatchObject({ value: 'chunked, gzip' });
  });

  it('should accept gzip then chunked', () => {
    expect(check('Transfer-Encoding', ['gzip', 'chunked'])).toMatchObject({ value: ['gzip', 'chunked'], ids: [] });
  });
});

describe('range headers', () => {
  it('should parse a satisfied Content-Range', () => {
    expect(check('Content-Range', 'bytes 0-9/100', { statusCode: 206 })).toMatchObject({
      value: { unit: 'bytes', first: 0, last: 9, complete: 100 },
      ids: [],
    });
  });

  it('should parse an unsatisfied Content-Range', () => {
    expect(check('Content-Range', 'bytes */100', { statusCode: 416 }).value).toEqual({ unit: 'bytes', complete: 100 });
  });

  it('should reject impossible ranges', () => {
    expect(check('Content-Range', 'bytes 10-5/100', { statusCode: 206 }).ids).toEqual(['BAD_SYNTAX']);
    expect(check('Content-Range', 'bytes 0-100/100', { statusCode: 206 }).ids).toEqual(['BAD_SYNTAX']);
  });

  it('should note Content-Range outside 206 and 416', () => {
    expect(check('Content-Range', 'bytes 0-9/100').ids).toEqual(['CONTENT_RANGE_MEANINGLESS']);
  });

  it('should reject none alongside other units', () => {
    expect(check('Accept-Ranges', 'none, bytes').ids).toEqual(['ACCEPT_RANGES_NONE_WITH_OTHERS']);
  });
});

describe('Location', () => {
  it('should resolve against the base URI', () => {
    const { value, ids } = check('Location', '../c', { statusCode: 301, baseUri: 'http://example.com/a/b' });
    expect(ids).toEqual([]);
    expect(value).toBe('http://example.com/c');
  });

  it('should keep the reference when there is no base URI', () => {
    expect(check('Location', '/next', { statusCode: 302 }).value).toBe('/next');
  });

  it('should note Location on a 200', () => {
    expect(check('Location', 'http://example.com/').ids).toEqual(['LOCATION_UNDEFINED']);
  });

  it('should reject spaces', () => {
    expect(check('Location', 'has space', { statusCode: 302 }).ids).toEqual(['BAD_SYNTAX']);
  });
});

describe('Retry-After', () => {
  it('should accept seconds or a date', () => {
    expect(check('Retry-After', '120', { statusCode: 503 }).value).toEqual({ seconds: 120 });
    expect(check('Retry-After', 'Sun, 06 Nov 1994 08:49:37 GMT', { statusCode: 503 }).value).toEqual({
      date: { time: 784111777, format: 'imf-fixdate' },
    });
  });
});

describe('Set-Cookie', () => {
  it('should require Secure with SameSite=None', () => {
    const { value, ids } = check('Set-Cookie', 'id=1; SameSite=None');
    expect(ids).toEqual(['SET_COOKIE_SAMESITE_NONE_INSECURE']);
    expect(value).toEqual([{ name: 'id', value: '1', attributes: { samesite: 'None' } }]);
  });

  it('should drop invalid attributes', () => {
    const { value, ids } = check('Set-Cookie', 'a=1; Max-Age=abc');
    expect(ids).toEqual(['SET_COOKIE_BAD_ATTRIBUTE']);
    expect(value).toEqual([{ name: 'a', value: '1', attributes: {} }]);
  });

  it('should have no value when no cookie is valid', () => {
    expect(check('Set-Cookie', 'novalue')).toMatchObject({
      value: undefined,
      ids: ['SET_COOKIE_BAD_PAIR', 'BAD_SYNTAX'],
    });
  });
});

describe('security headers', () => {
  it('should parse Strict-Transport-Security', () => {
    const { value, notes } = check('Strict-Transport-Security', 'max-age=31536000; includeSubDomains', {
      statusCode: 200,
      baseUri: 'https://example.com/',
    });
    expect(value).toEqual({ maxAge: 31536000, includeSubDomains: true, preload: false });
    expect(notes.map((n) => [n.id, n.level])).toEqual([['STS_SET', 'good']]);
  });

  it('should note Strict-Transport-Security over plain HTTP', () => {
    const { ids } = check('Strict-Transport-Security', 'max-age=60', {
      statusCode: 200,
      baseUri: 'http://example.com/',
    });
    expect(ids).toEqual(['STS_INSECURE']);
  });

  it('should require max-age', () => {
    expect(check('Strict-Transport-Security', 'includeSubDomains').ids).toEqual(['BAD_SYNTAX']);
  });

  it('should parse X-Frame-Options', () => {
    expect(check('X-Frame-Options', 'SAMEORIGIN')).toMatchObject({
      value: { policy: 'sameorigin' },
      ids: ['FRAME_OPTIONS_SET'],
    });
  });

  it('should only accept nosniff', () => {
    expect(check('X-Content-Type-Options', 'nosniff').value).toBe('nosniff');
    expect(check('X-Content-Type-Options', 'yes').ids).toEqual(['BAD_SYNTAX']);
  });

  it('should parse X-XSS-Protection', () => {
    expect(check('X-XSS-Protection', '1; mode=block').value).toEqual({ enabled: true, mode: 'block' });
    expect(check('X-XSS-Protection', '0').value).toEqual({ enabled: false });
  });

  it('should validate Access-Control-Allow-Origin', () => {
    expect(check('Access-Control-Allow-Origin', '*').ids).toEqual(['CORS_ANY_ORIGIN']);
    expect(check('Access-Control-Allow-Origin', 'https://example.com').ids).toEqual([]);
    expect(check('Access-Control-Allow-Origin', 'https://example.com/path').ids).toEqual(['BAD_SYNTAX']);
  });
});

describe('other headers', () => {
  it('should parse Link targets and parameters', () => {
    expect(check('Link', '<https://example.com/style.css>; rel=preload; as="style"').value).toEqual([
      { target: 'https://example.com/style.css', params: { rel: 'preload', as: 'style' } },
    ]);
  });

  it('should note lower-case methods in Allow', () => {
    expect(check('Allow', 'GET, get').ids).toEqual(['ALLOW_LOWERCASE_METHOD']);
  });

  it('should parse Keep-Alive parameters', () => {
    expect(check('Keep-Alive', 'timeout=5, max=100')).toMatchObject({
      value: { timeout: '5', max: '100' },
      ids: ['CONNECTION_KEEP_ALIVE_OBSOLETE'],
    });
  });

  it('should warn about directory components in download filenames', () => {
    const { value, ids } = check('Content-Disposition', 'attachment; filename="../x.txt"');
    expect(ids).toEqual(['DISPOSITION_FILENAME_PATH']);
    expect(value).toEqual({ type: 'attachment', params: { filename: '../x.txt' } });
  });

  it('should note Upgrade outside of 101 responses', () => {
    expect(check('Upgrade', 'h2c').ids).toEqual(['UPGRADE_NOT_REQUESTED']);
    expect(check('Upgrade', 'websocket', { statusCode: 101 }).ids).toEqual([]);
  });
});
