/**
 * Security-related response headers
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { parseDeltaSeconds, parseNameValue, splitOutsideQuotes } from '../syntax.mjs';
import type { FrameOptions, StrictTransportSecurity, XssProtection } from '../types.mjs';

export const SECURITY_NOTES = defineNotes({
  STS_SET: {
    level: 'good',
    category: 'security',
    summary: 'This site requires clients to use HTTPS for {maxAge} seconds.',
    detail: 'Strict-Transport-Security tells browsers to only contact this host over HTTPS.',
    reference: rfc(6797, '6.1'),
  },
  STS_DISABLED: {
    level: 'info',
    category: 'security',
    summary: 'Strict-Transport-Security max-age=0 removes any existing HTTPS requirement.',
    detail: 'Browsers will forget previously recorded Strict-Transport-Security policies for this host.',
    reference: rfc(6797, '6.1.1'),
  },
  STS_INSECURE: {
    level: 'warning',
    category: 'security',
    summary: 'Strict-Transport-Security is ignored over plain HTTP.',
    detail: 'Browsers only honour this header when it is received over a secure connection.',
    reference: rfc(6797, '7.2'),
  },
  FRAME_OPTIONS_SET: {
    level: 'good',
    category: 'security',
    summary: 'The page can only be framed by {allowed}.',
    detail: 'X-Frame-Options limits which pages may embed this one, mitigating clickjacking.',
    reference: rfc(7034, '2.1'),
  },
  FRAME_OPTIONS_ALLOW_FROM: {
    level: 'warning',
    category: 'security',
    summary: 'X-Frame-Options ALLOW-FROM is not supported by current browsers.',
    detail: 'Use the frame-ancestors directive of Content-Security-Policy instead.',
    reference: rfc(7034, '2.1'),
  },
  CONTENT_TYPE_OPTIONS_SET: {
    level: 'good',
    category: 'security',
    summary: 'Browsers are told not to sniff the content type of this response.',
    detail: 'X-Content-Type-Options: nosniff prevents browsers from second-guessing Content-Type.',
    reference: rfc(9110, '8.3'),
  },
  XSS_PROTECTION_DISABLED: {
    level: 'info',
    category: 'security',
    summary: 'The legacy browser XSS filter is disabled for this response.',
    detail: 'X-XSS-Protection is not supported by current browsers; disabling it has no effect on them.',
    reference: rfc(9110, '5.1'),
  },
  XSS_PROTECTION_ENABLED: {
    level: 'info',
    category: 'security',
    summary: 'The legacy browser XSS filter is enabled for this response.',
    detail:
      'X-XSS-Protection is not supported by current browsers, and the filter it enables has ' +
      'itself been a source of vulnerabilities in older ones.',
    reference: rfc(9110, '5.1'),
  },
  CORS_ANY_ORIGIN: {
    level: 'info',
    category: 'security',
    summary: 'Any origin may read this response.',
    detail: 'Access-Control-Allow-Origin: * lets scripts on every site read this response without credentials.',
    reference: rfc(6454, '7'),
  },
});

/**
 * Strict-Transport-Security (RFC 6797 §6.1)
 */
export const strictTransportSecurity = defineHeader<StrictTransportSecurity>({
  name: 'Strict-Transport-Security',
  category: 'security',
  reference: rfc(6797, '6.1'),
  combine: 'singleton',
  parse({ value }, context) {
    const seen = new Set<string>();
    let maxAge: number | undefined;

    for (const part of splitOutsideQuotes(value, ';')) {
      const directive = parseNameValue(part);
      if (seen.has(directive.name)) {
        throw new HeaderSyntaxError(`the ${directive.name} directive appears more than once`, part);
      }
      seen.add(directive.name);
      if (directive.name === 'max-age') {
        maxAge = directive.value === null ? undefined : parseDeltaSeconds(directive.value);
        if (maxAge === undefined) {
          throw new HeaderSyntaxError('max-age needs a number of seconds', part);
        }
      }
    }
    if (maxAge === undefined) {
      throw new HeaderSyntaxError('the max-age directive is required', value);
    }

    if (context.field.baseUri?.startsWith('http:')) {
      context.note(SECURITY_NOTES.STS_INSECURE);
    } else if (maxAge === 0) {
      context.note(SECURITY_NOTES.STS_DISABLED);
    } else {
      context.note(SECURITY_NOTES.STS_SET, { maxAge });
    }

    return {
      maxAge,
      includeSubDomains: seen.has('includesubdomains'),
      preload: seen.has('preload'),
    };
  },
});

/**
 * X-Frame-Options (RFC 7034)
 */
export const xFrameOptions = defineHeader<FrameOptions>({
  name: 'X-Frame-Options',
  category: 'security',
  reference: rfc(7034, '2.1'),
  combine: 'singleton',
  parse({ value }, context) {
    const lower = value.toLowerCase();
    if (lower === 'deny') {
      context.note(SECURITY_NOTES.FRAME_OPTIONS_SET, { allowed: 'nobody' });
      return { policy: 'deny' };
    }
    if (lower === 'sameorigin') {
      context.note(SECURITY_NOTES.FRAME_OPTIONS_SET, { allowed: 'the same origin' });
      return { policy: 'sameorigin' };
    }
    const allowFrom = /^allow-from\s+(\S+)$/i.exec(value);
    if (allowFrom) {
      context.note(SECURITY_NOTES.FRAME_OPTIONS_ALLOW_FROM);
      return { policy: 'allow-from', origin: allowFrom[1] };
    }
    throw new HeaderSyntaxError('expected DENY, SAMEORIGIN or ALLOW-FROM', value);
  },
});

export const xContentTypeOptions = defineHeader<string>({
  name: 'X-Content-Type-Options',
  category: 'security',
  reference: rfc(9110, '8.3'),
  combine: 'list',
  combineDocumented: false,
  parse({ value }, context) {
    if (value.toLowerCase() !== 'nosniff') {
      throw new HeaderSyntaxError('the only defined value is "nosniff"', value);
    }
    context.note(SECURITY_NOTES.CONTENT_TYPE_OPTIONS_SET);
    return 'nosniff';
  },
});

export const xXssProtection = defineHeader<XssProtection>({
  name: 'X-XSS-Protection',
  category: 'security',
  reference: rfc(9110, '5.1'),
  combine: 'list',
  combineDocumented: false,
  parse({ value }, context) {
    const [flag, ...rest] = splitOutsideQuotes(value, ';');
    if (flag === '0' && rest.length === 0) {
      context.note(SECURITY_NOTES.XSS_PROTECTION_DISABLED);
      return { enabled: false };
    }
    if (flag !== '1') {
      throw new HeaderSyntaxError('expected 0 or 1', value);
    }

    const result: XssProtection = { enabled: true };
    for (const part of rest) {
      const { name, value: directiveValue } = parseNameValue(part);
      if ((name === 'mode' || name === 'report') && directiveValue !== null) {
        result[name] = directiveValue;
      } else {
        throw new HeaderSyntaxError(`unexpected directive "${part}"`, part);
      }
    }
    context.note(SECURITY_NOTES.XSS_PROTECTION_ENABLED);
    return result;
  },
});

const ORIGIN_RE = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/\s?#]+$/;

/**
 * Access-Control-Allow-Origin (Fetch standard, CORS protocol)
 */
export const accessControlAllowOrigin = defineHeader<string>({
  name: 'Access-Control-Allow-Origin',
  category: 'security',
  reference: rfc(6454, '7'),
  combine: 'singleton',
  parse({ value }, context) {
    if (value === '*') {
      context.note(SECURITY_NOTES.CORS_ANY_ORIGIN);
      return value;
    }
    if (value === 'null' || ORIGIN_RE.test(value)) {
      return value;
    }
    throw new HeaderSyntaxError('expected "*", "null" or a serialized origin', value);
  },
});
