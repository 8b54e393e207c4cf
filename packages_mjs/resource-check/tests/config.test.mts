/**
 * Tests for configuration, errors and logging helpers
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_CHECKER_CONFIG,
  TransportError,
  configFromEnv,
  createLogger,
  mergeConfig,
  toTransportError,
} from '../src/index.mjs';
import { maskHeaders } from '../src/logger.mjs';

describe('mergeConfig', () => {
  it('should fill in defaults', () => {
    expect(mergeConfig()).toEqual({
      maxRedirects: 5,
      bodyCaptureCap: 8 * 1024 * 1024,
      fetchTimeout: 10_000,
      followRelatedFetches: true,
      rangeProbeBytes: 10,
      userAgent: 'http-conformance/0.1',
    });
    expect(DEFAULT_CHECKER_CONFIG).toEqual(mergeConfig({}));
  });

  it('should keep given values', () => {
    expect(mergeConfig({ maxRedirects: 0, followRelatedFetches: false })).toMatchObject({
      maxRedirects: 0,
      followRelatedFetches: false,
      fetchTimeout: 10_000,
    });
  });

  it('should list every rejected option', () => {
    try {
      mergeConfig({ maxRedirects: 21, bodyCaptureCap: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0].startsWith('maxRedirects: ')).toBe(true);
        expect(error.issues[1].startsWith('bodyCaptureCap: ')).toBe(true);
      }
    }
  });

  it('should reject fractional values', () => {
    expect(() => mergeConfig({ rangeProbeBytes: 2.5 })).toThrow(ConfigurationError);
  });
});

describe('configFromEnv', () => {
  it('should read CONFORMANCE_* variables', () => {
    const input = configFromEnv({
      CONFORMANCE_MAX_REDIRECTS: '2',
      CONFORMANCE_FOLLOW_RELATED_FETCHES: 'false',
      CONFORMANCE_USER_AGENT: 'probe/1',
      UNRELATED: 'x',
    });
    expect(input).toEqual({ maxRedirects: 2, followRelatedFetches: false, userAgent: 'probe/1' });
    expect(mergeConfig(input)).toMatchObject({ maxRedirects: 2, followRelatedFetches: false, rangeProbeBytes: 10 });
  });

  it('should leave empty variables to the defaults', () => {
    expect(mergeConfig(configFromEnv({ CONFORMANCE_FETCH_TIMEOUT: '' })).fetchTimeout).toBe(10_000);
  });

  it('should reject values that are not numbers', () => {
    expect(() => mergeConfig(configFromEnv({ CONFORMANCE_FETCH_TIMEOUT: 'soon' }))).toThrow(/fetchTimeout/);
  });

  it('should reject values that are not booleans', () => {
    expect(() => configFromEnv({ CONFORMANCE_FOLLOW_RELATED_FETCHES: 'maybe' })).toThrow(ConfigurationError);
  });
});

describe('toTransportError', () => {
  const withCode = (code: string) => Object.assign(new Error(code), { code });

  it('should map system error codes', () => {
    expect(toTransportError(withCode('ENOTFOUND')).code).toBe('dns');
    expect(toTransportError(withCode('ECONNREFUSED')).code).toBe('connect');
    expect(toTransportError(withCode('EPIPE')).code).toBe('reset');
    expect(toTransportError(withCode('UND_ERR_CONNECT_TIMEOUT')).code).toBe('timeout');
    expect(toTransportError(withCode('ERR_TLS_CERT_ALTNAME_INVALID')).code).toBe('tls');
    expect(toTransportError(withCode('DEPTH_ZERO_SELF_SIGNED_CERT')).code).toBe('tls');
  });

  it('should keep TransportErrors and the original cause', () => {
    const error = new TransportError('aborted', 'stopped');
    expect(toTransportError(error)).toBe(error);

    const cause = withCode('ECONNRESET');
    expect(toTransportError(cause).cause).toBe(cause);
    expect(toTransportError('boom')).toMatchObject({ name: 'TransportError', code: 'connect', message: 'boom' });
  });
});

describe('logging', () => {
  it('should take the level from LOG_LEVEL', () => {
    expect(createLogger({ LOG_LEVEL: 'debug' }).level).toBe('debug');
    expect(createLogger({}).level).toBe('info');
  });

  it('should mask credentials', () => {
    expect(
      maskHeaders([
        { name: 'Authorization', value: 'Bearer test-secret' },
        { name: 'Cookie', value: 'a=1' },
        { name: 'Accept', value: '*/*' },
      ])
    ).toEqual([
      { name: 'Authorization', value: 'Bearer tes********' },
      { name: 'Cookie', value: '***' },
      { name: 'Accept', value: '*/*' },
    ]);
  });
});
