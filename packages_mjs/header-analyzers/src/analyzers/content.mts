/**
 * Representation metadata: Content-Type, Content-Length, Content-Encoding,
 * Content-Language and Content-Disposition
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken, parseParameters, splitOutsideQuotes } from '../syntax.mjs';
import type { ContentDisposition, MediaType } from '../types.mjs';

export const CONTENT_NOTES = defineNotes({
  CONTENT_TYPE_NO_CHARSET: {
    level: 'info',
    category: 'general',
    summary: 'The {mediaType} response does not declare a charset.',
    detail:
      'Textual responses without a charset parameter leave the character encoding up to the ' +
      'recipient, which may guess differently than intended.',
    reference: rfc(9110, '8.3.2'),
  },
  ENCODING_UNKNOWN: {
    level: 'warning',
    category: 'conneg',
    summary: 'The {coding} content-coding is not registered.',
    detail: 'Clients will not be able to decode a content-coding they do not know.',
    reference: rfc(9110, '8.4.1'),
  },
  ENCODING_IDENTITY: {
    level: 'warning',
    category: 'conneg',
    summary: 'The identity content-coding should not be used in Content-Encoding.',
    detail: '"identity" is reserved for Accept-Encoding; a response that is not encoded should omit the header.',
    reference: rfc(9110, '8.4.1'),
  },
  DISPOSITION_FILENAME_PATH: {
    level: 'warning',
    category: 'security',
    summary: 'The filename in Content-Disposition contains path separators.',
    detail:
      'Recipients are required to ignore directory information in the suggested filename, ' +
      'so "{filename}" will not be saved where it seems to point.',
    reference: rfc(6266, '4.3'),
  },
  DISPOSITION_UNKNOWN_TYPE: {
    level: 'info',
    category: 'general',
    summary: 'The "{type}" disposition type is not recognized.',
    detail: 'Unknown disposition types are treated as "attachment" by recipients.',
    reference: rfc(6266, '4.2'),
  },
});

const KNOWN_CODINGS = new Set([
  'gzip',
  'x-gzip',
  'deflate',
  'compress',
  'x-compress',
  'br',
  'zstd',
  'dcb',
  'dcz',
]);

const LANGUAGE_TAG_RE = /^[A-Za-z]{1,8}(?:-[A-Za-z0-9]{1,8})*$/;

/**
 * Split `main; a=b; c=d` into the leading value and its parameters
 */
function splitWithParameters(value: string): { main: string; params: Record<string, string> } {
  const [main = '', ...rest] = splitOutsideQuotes(value, ';');
  return { main, params: parseParameters(rest) };
}

/**
 * Parse a media type with parameters (RFC 9110 §8.3.1)
 */
export function parseMediaType(value: string): MediaType {
  const { main, params } = splitWithParameters(value);
  const slash = main.indexOf('/');
  const type = main.substring(0, slash).toLowerCase();
  const subtype = main.substring(slash + 1).toLowerCase();
  if (slash === -1 || !isToken(type) || !isToken(subtype)) {
    throw new HeaderSyntaxError(`"${main}" is not a type/subtype`, main);
  }
  if ('charset' in params) {
    params.charset = params.charset.toLowerCase();
  }
  return { mediaType: `${type}/${subtype}`, type, subtype, params };
}

export const contentType = defineHeader<MediaType>({
  name: 'Content-Type',
  category: 'general',
  reference: rfc(9110, '8.3'),
  combine: 'singleton',
  parse({ value }, context) {
    const mediaType = parseMediaType(value);
    if (mediaType.type === 'text' && !('charset' in mediaType.params)) {
      context.note(CONTENT_NOTES.CONTENT_TYPE_NO_CHARSET, { mediaType: mediaType.mediaType });
    }
    return mediaType;
  },
});

/**
 * Content-Length (RFC 9110 §8.6)
 *
 * A list of identical values ("42, 42") is accepted; differing values are not.
 */
export const contentLength = defineHeader<number>({
  name: 'Content-Length',
  category: 'general',
  reference: rfc(9110, '8.6'),
  combine: 'singleton',
  allowIdenticalRepeats: true,
  parse({ value }) {
    const parts = value.split(',').map((p) => p.trim());
    for (const part of parts) {
      if (!/^\d+$/.test(part)) {
        throw new HeaderSyntaxError(`"${part}" is not a decimal number`, part);
      }
    }
    if (parts.some((p) => p !== parts[0])) {
      throw new HeaderSyntaxError(`conflicting values ${parts.join(', ')}`, value);
    }
    return Number(parts[0]);
  },
});

export const contentEncoding = defineHeader<string[]>({
  name: 'Content-Encoding',
  category: 'conneg',
  reference: rfc(9110, '8.4'),
  combine: 'list',
  parse({ elements }, context) {
    const codings = elements.map((e) => e.toLowerCase());
    for (const coding of codings) {
      if (!isToken(coding)) {
        throw new HeaderSyntaxError(`"${coding}" is not a content-coding`, coding);
      }
      if (coding === 'identity') {
        context.note(CONTENT_NOTES.ENCODING_IDENTITY);
      } else if (!KNOWN_CODINGS.has(coding)) {
        context.note(CONTENT_NOTES.ENCODING_UNKNOWN, { coding });
      }
    }
    return codings;
  },
});

export const contentLanguage = defineHeader<string[]>({
  name: 'Content-Language',
  category: 'general',
  reference: rfc(9110, '8.5'),
  combine: 'list',
  parse({ elements }) {
    for (const tag of elements) {
      if (!LANGUAGE_TAG_RE.test(tag)) {
        throw new HeaderSyntaxError(`"${tag}" is not a language tag`, tag);
      }
    }
    return elements;
  },
});

/**
 * Content-Disposition (RFC 6266)
 */
export const contentDisposition = defineHeader<ContentDisposition>({
  name: 'Content-Disposition',
  category: 'general',
  reference: rfc(6266, '4'),
  combine: 'singleton',
  parse({ value }, context) {
    const { main, params } = splitWithParameters(value);
    const type = main.toLowerCase();
    if (!isToken(type)) {
      throw new HeaderSyntaxError(`"${main}" is not a disposition type`, main);
    }
    if (type !== 'inline' && type !== 'attachment' && type !== 'form-data') {
      context.note(CONTENT_NOTES.DISPOSITION_UNKNOWN_TYPE, { type });
    }
    const filename = params.filename;
    if (filename !== undefined && /[/\\]/.test(filename)) {
      context.note(CONTENT_NOTES.DISPOSITION_FILENAME_PATH, { filename });
    }
    return { type, params };
  },
});
