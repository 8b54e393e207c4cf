/**
 * Set-Cookie (RFC 6265)
 *
 * Each field line is one cookie; lines are never comma-joined because
 * cookie dates contain commas.
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken } from '../syntax.mjs';
import type { AnalyzerContext, CookieValue } from '../types.mjs';

export const COOKIE_NOTES = defineNotes({
  SET_COOKIE_BAD_PAIR: {
    level: 'bad',
    category: 'cookies',
    summary: 'Set-Cookie number {index} does not start with a name=value pair.',
    detail: '"{line}" will be ignored by user agents.',
    reference: rfc(6265, '4.1.1'),
  },
  SET_COOKIE_BAD_ATTRIBUTE: {
    level: 'warning',
    category: 'cookies',
    summary: 'The {attribute} attribute of the {cookie} cookie is invalid.',
    detail: 'User agents ignore an attribute they cannot parse: "{value}".',
    reference: rfc(6265, '5.2'),
  },
  SET_COOKIE_SAMESITE_NONE_INSECURE: {
    level: 'warning',
    category: 'cookies',
    summary: 'The {cookie} cookie has SameSite=None without Secure.',
    detail: 'Browsers reject SameSite=None cookies that are not also marked Secure.',
    reference: rfc(6265, '4.1.2'),
  },
});

const SAMESITE_VALUES = new Set(['strict', 'lax', 'none']);

/**
 * Loose cookie-date check: browsers accept far more than HTTP-date
 */
function isCookieDate(value: string): boolean {
  return !Number.isNaN(Date.parse(value));
}

function parseCookie(line: string, index: number, context: AnalyzerContext): CookieValue | undefined {
  const [pair = '', ...attributeParts] = line.split(';').map((p) => p.trim());
  const eq = pair.indexOf('=');
  const name = eq === -1 ? '' : pair.substring(0, eq).trim();
  if (!isToken(name)) {
    context.note(COOKIE_NOTES.SET_COOKIE_BAD_PAIR, { index, line });
    return undefined;
  }

  const attributes: Record<string, string | true> = {};
  for (const part of attributeParts) {
    if (part.length === 0) continue;
    const sep = part.indexOf('=');
    const attribute = (sep === -1 ? part : part.substring(0, sep)).trim().toLowerCase();
    const value = sep === -1 ? true : part.substring(sep + 1).trim();

    const invalid =
      (attribute === 'expires' && (value === true || !isCookieDate(value))) ||
      (attribute === 'max-age' && (value === true || !/^-?\d+$/.test(value))) ||
      (attribute === 'samesite' && (value === true || !SAMESITE_VALUES.has(value.toLowerCase())));
    if (invalid) {
      context.note(COOKIE_NOTES.SET_COOKIE_BAD_ATTRIBUTE, {
        cookie: name,
        attribute,
        value: value === true ? '' : value,
      });
      continue;
    }
    attributes[attribute] = value;
  }

  const sameSite = attributes.samesite;
  if (typeof sameSite === 'string' && sameSite.toLowerCase() === 'none' && !('secure' in attributes)) {
    context.note(COOKIE_NOTES.SET_COOKIE_SAMESITE_NONE_INSECURE, { cookie: name });
  }

  return { name, value: pair.substring(eq + 1).trim(), attributes };
}

export const setCookie = defineHeader<CookieValue[]>({
  name: 'Set-Cookie',
  category: 'cookies',
  reference: rfc(6265, '4.1'),
  combine: 'separate',
  parse({ elements }, context) {
    const cookies: CookieValue[] = [];
    elements.forEach((line, i) => {
      const cookie = parseCookie(line, i + 1, context);
      if (cookie) cookies.push(cookie);
    });
    if (cookies.length === 0) {
      throw new HeaderSyntaxError('no valid cookies', elements.join('\n'));
    }
    return cookies;
  },
});
