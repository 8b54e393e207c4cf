/**
 * Server, Via, Allow and Link
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken, parseParameters, splitOutsideQuotes } from '../syntax.mjs';
import type { LinkValue } from '../types.mjs';

export const GENERAL_NOTES = defineNotes({
  VIA_PRESENT: {
    level: 'info',
    category: 'general',
    summary: 'One or more intermediaries are present.',
    detail: 'The Via header lists the proxies and gateways this response passed through: {value}.',
    reference: rfc(9110, '7.6.3'),
  },
  ALLOW_LOWERCASE_METHOD: {
    level: 'warning',
    category: 'general',
    summary: 'Allow lists the method "{method}" in lower case.',
    detail: 'Method names are case-sensitive; "{method}" is not the same method as "{upper}".',
    reference: rfc(9110, '9.1'),
  },
});

const LINK_TARGET_RE = /^<([^>]*)>$/;

/**
 * Server (RFC 9110 §10.2.4)
 */
export const server = defineHeader<string>({
  name: 'Server',
  category: 'general',
  reference: rfc(9110, '10.2.4'),
  combine: 'list',
  combineDocumented: false,
  parse: ({ value }) => value,
});

export const via = defineHeader<string[]>({
  name: 'Via',
  category: 'general',
  reference: rfc(9110, '7.6.3'),
  combine: 'list',
  parse({ elements, value }, context) {
    context.note(GENERAL_NOTES.VIA_PRESENT, { value });
    return elements;
  },
});

export const allow = defineHeader<string[]>({
  name: 'Allow',
  category: 'general',
  reference: rfc(9110, '10.2.1'),
  combine: 'list',
  parse({ elements }, context) {
    for (const method of elements) {
      if (!isToken(method)) {
        throw new HeaderSyntaxError(`"${method}" is not a method`, method);
      }
      const upper = method.toUpperCase();
      if (method !== upper && ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'PATCH'].includes(upper)) {
        context.note(GENERAL_NOTES.ALLOW_LOWERCASE_METHOD, { method, upper });
      }
    }
    return elements;
  },
});

/**
 * Link (RFC 8288 §3)
 */
export const link = defineHeader<LinkValue[]>({
  name: 'Link',
  category: 'general',
  reference: rfc(8288, '3'),
  combine: 'list',
  parse({ elements }) {
    return elements.map((element) => {
      const [target = '', ...params] = splitOutsideQuotes(element, ';');
      const match = LINK_TARGET_RE.exec(target);
      if (!match) {
        throw new HeaderSyntaxError('a link target has to be enclosed in angle brackets', element);
      }
      return { target: match[1], params: parseParameters(params) };
    });
  },
});
