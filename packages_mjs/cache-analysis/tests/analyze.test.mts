/**
 * Tests for cross-header response analysis
 */

import { describe, it, expect } from 'vitest';
import { analyzeResponse, isCacheableMethod } from '../src/index.mjs';
import type { ResponseContext } from '../src/index.mjs';
import { NOW, NOW_DATE, response } from './helpers.mjs';

function analyze(head: string[], body = '', context: Partial<ResponseContext> = {}) {
  const { message, headers } = response(head, body);
  const result = analyzeResponse(message, headers, { receivedAt: NOW, ...context });
  return { ...result, ids: result.notes.map((n) => n.id) };
}

describe('freshness', () => {
  it('should subtract the current age from max-age', () => {
    const { facts, ids, notes } = analyze([
      'HTTP/1.1 200 OK',
      `Date: ${NOW_DATE}`,
      'Cache-Control: max-age=100',
      'Age: 40',
    ]);
    expect(facts).toMatchObject({
      freshnessLifetime: 100,
      freshnessSource: 'max-age',
      currentAge: 40,
      remainingFreshness: 60,
      cacheableBy: 'shared',
    });
    expect(ids).toEqual(['DATE_CORRECT', 'STOREABLE', 'FRESHNESS_FRESH', 'VALIDATOR_NONE']);
    expect(notes[2].summary).toBe('This response is fresh for 60 seconds.');
  });

  it('should clamp remaining freshness at zero and report staleness', () => {
    const { facts, ids } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=30', 'Age: 40']);
    expect(facts.remainingFreshness).toBe(0);
    expect(facts.currentAge).toBe(40);
    expect(ids).toContain('FRESHNESS_STALE');
    expect(ids).not.toContain('FRESHNESS_FRESH');
  });

  it('should use the apparent age when it exceeds Age', () => {
    const { facts } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=100', 'Age: 1'], '', {
      receivedAt: NOW + 3,
    });
    expect(facts.currentAge).toBe(3);
    expect(facts.remainingFreshness).toBe(97);
  });

  it('should prefer s-maxage for shared caches', () => {
    const shared = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: s-maxage=200, max-age=100']);
    expect(shared.facts).toMatchObject({ freshnessLifetime: 200, freshnessSource: 's-maxage' });

    const privateOnly = analyze([
      'HTTP/1.1 200 OK',
      `Date: ${NOW_DATE}`,
      'Cache-Control: s-maxage=200, max-age=100, private',
    ]);
    expect(privateOnly.facts).toMatchObject({
      freshnessLifetime: 100,
      freshnessSource: 'max-age',
      cacheableBy: 'private',
    });
  });

  it('should use Expires minus Date', () => {
    const { facts } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Expires: Sun, 06 Nov 1994 09:49:37 GMT']);
    expect(facts).toMatchObject({ freshnessLifetime: 3600, freshnessSource: 'expires', remainingFreshness: 3600 });
  });

  it('should treat an invalid Expires as already expired', () => {
    const { facts, ids } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Expires: 0']);
    expect(facts).toMatchObject({ freshnessLifetime: 0, freshnessSource: 'expires', remainingFreshness: 0 });
    expect(ids).toEqual(['DATE_CORRECT', 'STOREABLE', 'EXPIRES_INVALID', 'FRESHNESS_STALE', 'VALIDATOR_NONE']);
  });

  it('should fall back to the receive time when Date is missing', () => {
    const { facts, ids } = analyze(['HTTP/1.1 200 OK', 'Expires: Sun, 06 Nov 1994 09:49:37 GMT']);
    expect(facts.freshnessLifetime).toBe(3600);
    expect(ids).toEqual(['DATE_MISSING', 'STOREABLE', 'FRESHNESS_CLOCKLESS', 'FRESHNESS_FRESH', 'VALIDATOR_NONE']);
  });

  it('should calculate heuristic freshness from Last-Modified', () => {
    const { facts, ids } = analyze([
      'HTTP/1.1 200 OK',
      `Date: ${NOW_DATE}`,
      'Last-Modified: Sun, 06 Nov 1994 08:32:57 GMT',
    ]);
    expect(facts).toMatchObject({ freshnessLifetime: 100, freshnessSource: 'heuristic' });
    expect(facts.validators).toEqual({ strength: 'weak', etag: undefined, lastModified: NOW - 1000 });
    expect(ids).toEqual(['DATE_CORRECT', 'STOREABLE', 'FRESHNESS_HEURISTIC', 'FRESHNESS_FRESH']);
  });

  it('should cap heuristic freshness at one day', () => {
    const { facts } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Last-Modified: Sun, 06 Nov 1983 08:49:37 GMT']);
    expect(facts.freshnessLifetime).toBe(86400);
  });

  it('should report no-cache and must-revalidate', () => {
    const { ids } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: no-cache, must-revalidate']);
    expect(ids).toEqual([
      'DATE_CORRECT',
      'STOREABLE',
      'NO_CACHE',
      'MUST_REVALIDATE',
      'FRESHNESS_NONE',
      'VALIDATOR_NONE',
    ]);
  });
});

describe('cacheability', () => {
  it('should not store no-store responses', () => {
    const { facts, ids } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: no-store, max-age=60']);
    expect(facts.cacheableBy).toBe('none');
    expect(facts.freshnessLifetime).toBe('uncacheable');
    expect(ids).toContain('NO_STORE');
  });

  it('should not store responses to POST', () => {
    const { facts, ids } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=60'], '', {
      requestMethod: 'post',
    });
    expect(facts.cacheableBy).toBe('none');
    expect(ids).toContain('METHOD_UNCACHEABLE');
  });

  it('should only treat GET and HEAD as cacheable methods', () => {
    expect(['get', 'HEAD', 'POST', 'PUT'].map((m) => isCacheableMethod(m))).toEqual([true, true, false, false]);
  });

  it('should not store a 302 without explicit freshness', () => {
    const { facts, ids } = analyze(['HTTP/1.1 302 Found', `Date: ${NOW_DATE}`, 'Location: /next']);
    expect(facts.cacheableBy).toBe('none');
    expect(ids).toContain('STATUS_UNCACHEABLE');
  });

  it('should store a 302 with max-age', () => {
    const { facts } = analyze([
      'HTTP/1.1 302 Found',
      `Date: ${NOW_DATE}`,
      'Location: /next',
      'Cache-Control: max-age=60',
    ]);
    expect(facts.cacheableBy).toBe('shared');
  });

  it('should keep authenticated responses private unless marked public', () => {
    const requestHeaders = [{ name: 'Authorization', value: 'Bearer test-secret' }];
    const head = ['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=60'];
    expect(analyze(head, '', { requestHeaders }).facts.cacheableBy).toBe('private');
    expect(analyze(head, '', { requestHeaders }).ids).toContain('PRIVATE_AUTH');
    const marked = ['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=60, public'];
    expect(analyze(marked, '', { requestHeaders }).facts.cacheableBy).toBe('shared');
  });
});

describe('validators and dates', () => {
  it('should classify a strong ETag', () => {
    const { facts } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'ETag: "v1"']);
    expect(facts.validators).toEqual({ strength: 'strong', etag: { weak: false, tag: 'v1' }, lastModified: undefined });
  });

  it('should report Last-Modified after Date', () => {
    const { ids, notes } = analyze([
      'HTTP/1.1 200 OK',
      `Date: ${NOW_DATE}`,
      'Last-Modified: Sun, 06 Nov 1994 08:50:37 GMT',
    ]);
    expect(ids).toContain('LM_FUTURE');
    expect(notes.find((n) => n.id === 'LM_FUTURE')?.vars).toEqual({ delta: 60 });
  });

  it('should report clock skew', () => {
    const { ids, notes } = analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`], '', { receivedAt: NOW - 60 });
    expect(ids[0]).toBe('DATE_INCORRECT');
    expect(notes[0].summary).toBe("The server's clock is 60 seconds off.");
  });

  it('should not require Date on 5xx responses', () => {
    expect(analyze(['HTTP/1.1 503 Service Unavailable']).ids).not.toContain('DATE_MISSING');
  });
});

describe('message checks', () => {
  it('should confirm a correct Content-Length', () => {
    expect(analyze(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Content-Length: 5'], 'hello').ids).toContain('CL_CORRECT');
  });

  it('should ignore Content-Length on a chunked body', () => {
    const { ids } = analyze(
      ['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Transfer-Encoding: chunked', 'Content-Length: 10'],
      '5\r\nhello\r\n0\r\n\r\n'
    );
    expect(ids).not.toContain('CL_INCORRECT');
    expect(ids).not.toContain('CL_CORRECT');
  });

  it('should ignore Content-Length on a close-delimited body', () => {
    const { ids } = analyze(
      ['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Transfer-Encoding: gzip', 'Content-Length: 3'],
      'hello'
    );
    expect(ids).not.toContain('CL_INCORRECT');
    expect(ids).not.toContain('CL_CORRECT');
  });

  it('should report Content-Length that differs from the body read', () => {
    const { message } = response(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Content-Length: 5'], 'hello');
    const { headers } = response(['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Content-Length: 7'], 'hello');
    const { notes } = analyzeResponse(message, headers, { receivedAt: NOW });

    const mismatch = notes.filter((n) => n.id === 'CL_INCORRECT');
    expect(mismatch).toHaveLength(1);
    expect(mismatch[0]).toMatchObject({ level: 'bad', vars: { declared: 7, received: 5 } });
  });

  it('should report a redirect without Location', () => {
    expect(analyze(['HTTP/1.1 301 Moved Permanently', `Date: ${NOW_DATE}`]).ids).toContain('REDIRECT_WITHOUT_LOCATION');
  });

  it('should be idempotent', () => {
    const head = ['HTTP/1.1 200 OK', `Date: ${NOW_DATE}`, 'Cache-Control: max-age=100', 'ETag: W/"x"'];
    expect(analyze(head)).toEqual(analyze(head));
  });
});
