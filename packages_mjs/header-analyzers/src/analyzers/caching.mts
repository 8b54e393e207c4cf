/**
 * Cache-Control, Pragma, Age and Warning (RFC 9111 §5)
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { COMMON_NOTES } from '../notes.mjs';
import { parseDeltaSeconds, parseNameValue } from '../syntax.mjs';
import type { NameValue } from '../syntax.mjs';
import type { CacheDirectives } from '../types.mjs';

export const CACHING_NOTES = defineNotes({
  BAD_CC_SYNTAX: {
    level: 'bad',
    category: 'caching',
    summary: 'The "{directive}" Cache-Control directive has invalid syntax.',
    detail:
      'Cache-Control directives are a token, optionally followed by "=" and a token or quoted-string. ' +
      '"{directive}" does not match that syntax and is ignored.',
    reference: rfc(9111, '5.2'),
  },
  BAD_CC_DELTA: {
    level: 'bad',
    category: 'caching',
    summary: 'The {directive} Cache-Control directive needs a non-negative integer value.',
    detail:
      'The {directive} directive takes a number of seconds (delta-seconds), but its value was ' +
      '"{value}". Caches will ignore it or treat the response as stale.',
    reference: rfc(9111, '1.2.2'),
  },
  CC_QUOTED_DELTA: {
    level: 'warning',
    category: 'caching',
    summary: 'The {directive} Cache-Control directive value is quoted.',
    detail:
      'The {directive} directive uses the token form; senders should not quote its value. Some ' +
      'caches will not recognise "{value}" when quoted.',
    reference: rfc(9111, '5.2'),
  },
  CC_DUPLICATE: {
    level: 'warning',
    category: 'caching',
    summary: 'The {directive} Cache-Control directive appears more than once.',
    detail:
      'A directive that appears more than once is ambiguous, and caches may choose different ' +
      'occurrences. The last value is used here.',
    reference: rfc(9111, '4.2.1'),
  },
  CC_REQUEST_DIRECTIVE: {
    level: 'warning',
    category: 'caching',
    summary: 'The {directive} Cache-Control directive is only defined for requests.',
    detail: '{directive} has no meaning in a response, so caches will ignore it here.',
    reference: rfc(9111, '5.2.1'),
  },
  CC_UNKNOWN_DIRECTIVE: {
    level: 'info',
    category: 'caching',
    summary: 'The {directive} Cache-Control directive is not recognised.',
    detail: 'Caches ignore directives they do not understand, so {directive} may have no effect.',
    reference: rfc(9111, '5.2.3'),
  },
  CC_PUBLIC_AND_PRIVATE: {
    level: 'warning',
    category: 'caching',
    summary: 'Cache-Control contains both public and private.',
    detail:
      'These directives contradict each other. Caches will most likely honour private, which is ' +
      'the more restrictive of the two.',
    reference: rfc(9111, '5.2.2.7'),
  },
  PRAGMA_NO_CACHE: {
    level: 'warning',
    category: 'caching',
    summary: 'Pragma: no-cache is a request directive, not a response directive.',
    detail:
      'Pragma: no-cache is only defined for requests; caches ignore it in responses. Use ' +
      'Cache-Control: no-cache to require revalidation.',
    reference: rfc(9111, '5.4'),
  },
  AGE_NOT_INT: {
    level: 'bad',
    category: 'caching',
    summary: 'The Age header\'s value should be a non-negative integer.',
    detail: 'Age is the number of seconds since the response was generated; "{value}" is not one.',
    reference: rfc(9111, '5.1'),
  },
});

const DELTA_DIRECTIVES = new Set([
  'max-age',
  's-maxage',
  'stale-while-revalidate',
  'stale-if-error',
  'min-fresh',
  'max-stale',
]);

const RESPONSE_DIRECTIVES = new Set([
  'max-age',
  's-maxage',
  'no-cache',
  'no-store',
  'no-transform',
  'public',
  'private',
  'must-revalidate',
  'proxy-revalidate',
  'must-understand',
  'immutable',
  'stale-while-revalidate',
  'stale-if-error',
]);

const REQUEST_ONLY_DIRECTIVES = new Set(['min-fresh', 'max-stale', 'only-if-cached']);

/**
 * Cache-Control (RFC 9111 §5.2)
 *
 * Invalid directives are reported and skipped; the header only has no typed
 * value when none of its directives could be read.
 */
export const cacheControl = defineHeader<CacheDirectives>({
  name: 'Cache-Control',
  category: 'caching',
  reference: rfc(9111, '5.2'),
  combine: 'list',
  parse({ elements }, context) {
    const directives = new Map<string, number | string | true>();
    const isResponse = context.field.statusCode !== undefined;
    let failed = 0;

    for (const element of elements) {
      let directive: NameValue;
      try {
        directive = parseNameValue(element);
      } catch (error) {
        if (!(error instanceof HeaderSyntaxError)) throw error;
        context.note(CACHING_NOTES.BAD_CC_SYNTAX, { directive: element });
        failed++;
        continue;
      }

      const { name, value, quoted } = directive;

      if (directives.has(name)) {
        context.note(CACHING_NOTES.CC_DUPLICATE, { directive: name });
      }

      if (DELTA_DIRECTIVES.has(name)) {
        if (value === null) {
          if (name === 'max-stale') {
            directives.set(name, true);
            continue;
          }
          context.note(CACHING_NOTES.BAD_CC_DELTA, { directive: name, value: '' });
          continue;
        }
        const seconds = parseDeltaSeconds(value);
        if (seconds === undefined) {
          context.note(CACHING_NOTES.BAD_CC_DELTA, { directive: name, value });
          continue;
        }
        if (quoted) {
          context.note(CACHING_NOTES.CC_QUOTED_DELTA, { directive: name, value });
        }
        directives.set(name, seconds);
      } else {
        directives.set(name, value ?? true);
      }

      if (isResponse && REQUEST_ONLY_DIRECTIVES.has(name)) {
        context.note(CACHING_NOTES.CC_REQUEST_DIRECTIVE, { directive: name });
      } else if (isResponse && !RESPONSE_DIRECTIVES.has(name) && !REQUEST_ONLY_DIRECTIVES.has(name)) {
        context.note(CACHING_NOTES.CC_UNKNOWN_DIRECTIVE, { directive: name });
      }
    }

    if (failed > 0 && failed === elements.length) {
      throw new HeaderSyntaxError('no valid directives');
    }
    if (directives.has('public') && directives.has('private')) {
      context.note(CACHING_NOTES.CC_PUBLIC_AND_PRIVATE);
    }

    return Object.fromEntries(directives);
  },
});

/**
 * Pragma (RFC 9111 §5.4)
 */
export const pragma = defineHeader<string[]>({
  name: 'Pragma',
  category: 'caching',
  reference: rfc(9111, '5.4'),
  combine: 'list',
  parse({ elements }, context) {
    const directives = elements.map((e) => e.toLowerCase());
    context.note(COMMON_NOTES.HEADER_DEPRECATED, { reason: 'RFC 9111 §5.4' });
    if (context.field.statusCode !== undefined && directives.includes('no-cache')) {
      context.note(CACHING_NOTES.PRAGMA_NO_CACHE);
    }
    return directives;
  },
});

/**
 * Age (RFC 9111 §5.1)
 */
export const age = defineHeader<number>({
  name: 'Age',
  category: 'caching',
  reference: rfc(9111, '5.1'),
  combine: 'singleton',
  parse({ value }, context) {
    const seconds = parseDeltaSeconds(value);
    if (seconds === undefined) {
      context.note(CACHING_NOTES.AGE_NOT_INT, { value });
    }
    return seconds;
  },
});

/**
 * Warning (obsoleted by RFC 9111 §5.5)
 */
export const warning = defineHeader<string[]>({
  name: 'Warning',
  category: 'caching',
  reference: rfc(9111, '5.5'),
  combine: 'list',
  parse({ elements }, context) {
    context.note(COMMON_NOTES.HEADER_DEPRECATED, { reason: 'RFC 9111 §5.5' });
    return elements;
  },
});
