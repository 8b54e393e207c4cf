/**
 * Connection management and message framing headers
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken, parseNameValue, splitOutsideQuotes } from '../syntax.mjs';

export const CONNECTION_NOTES = defineNotes({
  TE_CHUNKED_NOT_LAST: {
    level: 'bad',
    category: 'connection',
    summary: 'The chunked transfer-coding has to be applied last, exactly once.',
    detail:
      'Transfer-Encoding is "{value}". When chunked is used it has to be the final coding and ' +
      'must not be applied more than once, otherwise the message length cannot be determined.',
    reference: rfc(9112, '6.1'),
  },
  TE_IDENTITY: {
    level: 'bad',
    category: 'connection',
    summary: 'The identity transfer-coding is no longer defined.',
    detail: '"identity" was removed from HTTP/1.1; recipients may reject a message that uses it.',
    reference: rfc(9112, '6.1'),
  },
  TE_UNKNOWN: {
    level: 'warning',
    category: 'connection',
    summary: 'The {coding} transfer-coding is not registered.',
    detail: 'A recipient that does not understand a transfer-coding cannot read the message body.',
    reference: rfc(9112, '7'),
  },
  CONNECTION_KEEP_ALIVE_OBSOLETE: {
    level: 'info',
    category: 'connection',
    summary: 'The Keep-Alive header is a legacy HTTP/1.0 extension.',
    detail:
      'HTTP/1.1 connections are persistent by default; Keep-Alive is only understood by some ' +
      'HTTP/1.0 implementations and is otherwise ignored.',
    reference: rfc(7230, 'A.1.2'),
  },
  UPGRADE_NOT_REQUESTED: {
    level: 'info',
    category: 'connection',
    summary: 'The server is offering to upgrade the connection to {protocols}.',
    detail: 'Clients may ignore this; it only takes effect in a 101 (Switching Protocols) response.',
    reference: rfc(9110, '7.8'),
  },
});

const KNOWN_TRANSFER_CODINGS = new Set([
  'chunked',
  'gzip',
  'x-gzip',
  'deflate',
  'compress',
  'x-compress',
  'trailers',
]);

const PROTOCOL_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+(?:\/[!#$%&'*+\-.^_`|~0-9A-Za-z]+)?$/;

/**
 * Read a list of lower-cased tokens, rejecting anything else
 */
function tokenList(elements: readonly string[], what: string): string[] {
  return elements.map((element) => {
    if (!isToken(element)) {
      throw new HeaderSyntaxError(`"${element}" is not a ${what}`, element);
    }
    return element.toLowerCase();
  });
}

export const transferEncoding = defineHeader<string[]>({
  name: 'Transfer-Encoding',
  category: 'connection',
  reference: rfc(9112, '6.1'),
  combine: 'list',
  parse({ elements, value }, context) {
    // transfer-codings may carry parameters; only the coding name matters here
    const codings = tokenList(
      elements.map((e) => splitOutsideQuotes(e, ';')[0] ?? ''),
      'transfer-coding'
    );

    const chunkedAt = codings.indexOf('chunked');
    if (chunkedAt !== -1 && (chunkedAt !== codings.length - 1 || codings.lastIndexOf('chunked') !== chunkedAt)) {
      context.note(CONNECTION_NOTES.TE_CHUNKED_NOT_LAST, { value });
    }
    for (const coding of new Set(codings)) {
      if (coding === 'identity') {
        context.note(CONNECTION_NOTES.TE_IDENTITY);
      } else if (!KNOWN_TRANSFER_CODINGS.has(coding)) {
        context.note(CONNECTION_NOTES.TE_UNKNOWN, { coding });
      }
    }
    return codings;
  },
});

export const trailer = defineHeader<string[]>({
  name: 'Trailer',
  category: 'connection',
  reference: rfc(9110, '6.6.2'),
  combine: 'list',
  parse: ({ elements }) => tokenList(elements, 'field name'),
});

export const connection = defineHeader<string[]>({
  name: 'Connection',
  category: 'connection',
  reference: rfc(9110, '7.6.1'),
  combine: 'list',
  parse: ({ elements }) => tokenList(elements, 'connection option'),
});

export const keepAlive = defineHeader<Readonly<Record<string, string | true>>>({
  name: 'Keep-Alive',
  category: 'connection',
  reference: rfc(7230, 'A.1.2'),
  combine: 'list',
  combineDocumented: false,
  parse({ elements }, context) {
    const params: Record<string, string | true> = {};
    for (const element of elements) {
      const { name, value } = parseNameValue(element);
      params[name] = value ?? true;
    }
    context.note(CONNECTION_NOTES.CONNECTION_KEEP_ALIVE_OBSOLETE);
    return params;
  },
});

export const upgrade = defineHeader<string[]>({
  name: 'Upgrade',
  category: 'connection',
  reference: rfc(9110, '7.8'),
  combine: 'list',
  parse({ elements }, context) {
    for (const protocol of elements) {
      if (!PROTOCOL_RE.test(protocol)) {
        throw new HeaderSyntaxError(`"${protocol}" is not a protocol`, protocol);
      }
    }
    if (context.field.statusCode !== undefined && context.field.statusCode !== 101) {
      context.note(CONNECTION_NOTES.UPGRADE_NOT_REQUESTED, { protocols: elements.join(', ') });
    }
    return elements;
  },
});
